import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { RuleIoError } from "./errors.js";

const RULE_FILE_EXTENSIONS = [".yaml", ".yml"] as const;

interface WalkContext {
  readonly files: string[];
  readonly visitedDirs: Set<string>;
}

/**
 * Recursively find every YAML file under `rootPath`, following symlinks.
 * Ignore files and hidden-file conventions are not honored: rule
 * directories are curated. Results are sorted by path component.
 */
export async function discoverRuleFiles(rootPath: string): Promise<string[]> {
  const context: WalkContext = { files: [], visitedDirs: new Set() };
  await walkDirectory(rootPath, context);
  return context.files.sort(comparePaths);
}

export function isRuleDefinitionFile(fileName: string): boolean {
  return RULE_FILE_EXTENSIONS.some((ext) => fileName.endsWith(ext));
}

/**
 * Orders paths component by component, comparing UTF-8 bytes, so that
 * `a/b.yaml` sorts before `a-c.yaml` on every platform.
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(path.sep);
  const right = b.split(path.sep);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i += 1) {
    const order = Buffer.compare(
      Buffer.from(left[i] ?? "", "utf8"),
      Buffer.from(right[i] ?? "", "utf8"),
    );
    if (order !== 0) {
      return order;
    }
  }
  return left.length - right.length;
}

async function walkDirectory(
  currentPath: string,
  context: WalkContext,
): Promise<void> {
  const realCurrent = await attempt("resolve directory", currentPath, () =>
    fs.realpath(currentPath),
  );
  if (context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  let dirEntries: Dirent[] = await attempt(
    "read directory",
    currentPath,
    () => fs.readdir(currentPath, { withFileTypes: true }),
  );
  // Visit order decides which path wins when two links share a target.
  dirEntries = dirEntries.sort((a, b) => comparePaths(a.name, b.name));

  for (const dirent of dirEntries) {
    const entryPath = path.join(currentPath, dirent.name);

    if (dirent.isSymbolicLink()) {
      const stats = await attempt("follow symlink", entryPath, () =>
        fs.stat(entryPath),
      );
      if (stats.isDirectory()) {
        await walkDirectory(entryPath, context);
      } else if (stats.isFile()) {
        addRuleFile(entryPath, dirent.name, context);
      }
      continue;
    }

    if (dirent.isDirectory()) {
      await walkDirectory(entryPath, context);
      continue;
    }

    if (dirent.isFile()) {
      addRuleFile(entryPath, dirent.name, context);
    }
  }
}

function addRuleFile(
  filePath: string,
  fileName: string,
  context: WalkContext,
): void {
  if (isRuleDefinitionFile(fileName)) {
    context.files.push(filePath);
  }
}

async function attempt<T>(
  operation: string,
  targetPath: string,
  action: () => Promise<T>,
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw new RuleIoError(operation, targetPath, error);
  }
}
