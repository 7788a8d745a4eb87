import fs from "node:fs/promises";
import { createLoggingObserver } from "../rules/logging-observer.js";
import type { ReadonlyRuleCollection } from "../rules/rule-collection.js";
import { serializeRules } from "../rules/rule-document.js";
import { createRuleLoader } from "../rules/rule-loader.js";
import type { LoadObserver, RuleRecord } from "../rules/types.js";
import { createLogger } from "../util/logger.js";
import { readBuiltinRuleSources } from "./runtime-paths.js";

export type LoadOutputFormat = "summary" | "json" | "yaml";

export interface LoadCommandOptions {
  readonly paths: readonly string[];
  readonly format: LoadOutputFormat;
  readonly filesOnly?: boolean;
  readonly out?: string;
  readonly builtinRulesDir?: string;
  readonly observer?: LoadObserver;
}

export interface LoadCommandResult {
  readonly rules: ReadonlyRuleCollection;
  readonly sources: number;
  readonly output: string;
}

const log = createLogger("load");

export async function runLoadCommand(
  options: LoadCommandOptions,
): Promise<LoadCommandResult> {
  const loader = createRuleLoader({
    observer: options.observer ?? createLoggingObserver(log),
  });

  let rules: ReadonlyRuleCollection;
  let sources: number;
  if (options.paths.length === 0) {
    const builtin = await readBuiltinRuleSources(options.builtinRulesDir);
    rules = loader.loadContents(builtin);
    sources = builtin.length;
  } else if (options.filesOnly) {
    rules = await loader.loadFiles(options.paths);
    sources = options.paths.length;
  } else {
    rules = await loader.loadPaths(options.paths);
    sources = options.paths.length;
  }

  const output = renderOutput(rules, sources, options.format);
  if (options.out) {
    await fs.writeFile(options.out, output + "\n", "utf8");
  }
  return { rules, sources, output };
}

export function parseFormat(value: string): LoadOutputFormat {
  if (value === "summary" || value === "json" || value === "yaml") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function renderOutput(
  rules: ReadonlyRuleCollection,
  sources: number,
  format: LoadOutputFormat,
): string {
  if (format === "json") {
    return JSON.stringify(rules.toJSON(), null, 2);
  }
  if (format === "yaml") {
    return serializeRules(rules).trimEnd();
  }
  return renderSummary(rules, sources);
}

function renderSummary(rules: ReadonlyRuleCollection, sources: number): string {
  const lines = [
    `Loaded ${rules.size} ${plural(rules.size, "rule")} from ${sources} ${plural(sources, "source")}`,
  ];
  for (const rule of rules) {
    lines.push(`- ${describeRule(rule)}`);
  }
  return lines.join("\n");
}

export function describeRule(rule: RuleRecord): string {
  const id = typeof rule.id === "string" ? rule.id : undefined;
  const name = typeof rule.name === "string" ? rule.name : undefined;
  if (id && name) {
    return `${id}: ${name}`;
  }
  return id ?? name ?? "(unnamed rule)";
}

function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}
