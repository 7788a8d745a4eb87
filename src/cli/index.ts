#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { parseLogLevel, setLogLevel } from "../util/logger.js";
import { parseFormat, runLoadCommand } from "./load-command.js";

const LOG_LEVEL_ENV = "RULEPACK_LOG_LEVEL";

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("rulepack")
  .version(toolVersion)
  .option("--verbose", "Log load progress (same as --log-level debug)")
  .option("--log-level <level>", "Log level (debug|info|warn|error)")
  .hook("preAction", (command) => {
    const options = command.opts<{ verbose?: boolean; logLevel?: string }>();
    const configured = options.logLevel ?? process.env[LOG_LEVEL_ENV];
    if (options.verbose) {
      setLogLevel("debug");
    } else if (configured) {
      setLogLevel(parseLogLevel(configured));
    }
  });

program
  .command("load")
  .description("Load rules from files and directories (built-in rules if none)")
  .argument("[paths...]", "Rule files or directories")
  .option("--files", "Treat every path as a single rules file")
  .option("--format <format>", "Output format (summary|json|yaml)", "summary")
  .option("--out <file>", "Write output to file")
  .action(
    async (
      paths: string[],
      options: { files?: boolean; format: string; out?: string },
    ) => {
      try {
        const result = await runLoadCommand({
          paths,
          format: parseFormat(options.format),
          filesOnly: Boolean(options.files),
          out: options.out,
        });
        if (!options.out) {
          await writeStdout(result.output + "\n");
        }
      } catch (error) {
        await writeError(error);
        process.exitCode = 1;
      }
    },
  );

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  for (const rootPath of [path.resolve(dir, "..", ".."), path.resolve(dir, "..", "..", "..")]) {
    try {
      const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
      const json = JSON.parse(raw) as { version?: string };
      return json.version ?? "0.0.0";
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw error;
      }
    }
  }
  return "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
