import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { RuleIoError } from "../rules/errors.js";
import { discoverRuleFiles } from "../rules/rule-discovery.js";
import type { RuleSourceContents } from "../rules/types.js";

const BUILTIN_LABEL = "builtin";

export async function resolveBuiltinRulesDirectory(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  // src/cli when run from sources, dist/src/cli once built.
  const candidates = [
    path.resolve(moduleDir, "..", "..", "rules"),
    path.resolve(moduleDir, "..", "..", "..", "rules"),
    path.resolve(process.cwd(), "rules"),
  ];
  for (const candidate of candidates) {
    if (await existsDirectory(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    "Unable to find built-in rules directory. Pass rule files or directories explicitly.",
  );
}

/**
 * Read the bundled rule files into memory, labelled `builtin/<relative path>`.
 */
export async function readBuiltinRuleSources(
  rulesDir?: string,
): Promise<RuleSourceContents[]> {
  const rootPath = rulesDir ?? (await resolveBuiltinRulesDirectory());
  const files = await discoverRuleFiles(rootPath);
  const sources: RuleSourceContents[] = [];
  for (const filePath of files) {
    let contents: Buffer;
    try {
      contents = await fs.readFile(filePath);
    } catch (error) {
      throw new RuleIoError("read rules file", filePath, error);
    }
    sources.push({ path: toBuiltinLabel(rootPath, filePath), contents });
  }
  return sources;
}

function toBuiltinLabel(rootPath: string, filePath: string): string {
  const relative = path.relative(rootPath, filePath);
  return [BUILTIN_LABEL, ...relative.split(path.sep)].join(path.posix.sep);
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
