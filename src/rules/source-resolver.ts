import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { InvalidRuleSourceError } from "./errors.js";
import type { SourceKind } from "./types.js";

/**
 * Decide whether an input path is a rules file or a rules directory.
 * Symlinks are followed; anything that does not stat as a regular file or
 * directory is rejected.
 */
export async function classifySource(sourcePath: string): Promise<SourceKind> {
  let stats: Stats;
  try {
    stats = await fs.stat(sourcePath);
  } catch (error) {
    throw new InvalidRuleSourceError(sourcePath, error);
  }

  if (stats.isFile()) {
    return "file";
  }
  if (stats.isDirectory()) {
    return "directory";
  }
  throw new InvalidRuleSourceError(sourcePath);
}
