import fs from "node:fs/promises";
import path from "node:path";

export async function writeText(
  filePath: string,
  contents: string,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}

export function ruleYaml(...ids: string[]): string {
  const lines = ["rules:"];
  for (const id of ids) {
    lines.push(`  - id: ${id}`, `    name: Rule ${id}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Await a promise that must reject with `type`, and return the error.
 */
export async function captureError<E extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected promise to reject with ${type.name}`);
}
