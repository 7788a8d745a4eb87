import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  describeRule,
  parseFormat,
  runLoadCommand,
} from "../../src/cli/load-command.js";
import {
  readBuiltinRuleSources,
  resolveBuiltinRulesDirectory,
} from "../../src/cli/runtime-paths.js";
import { RuleIoError } from "../../src/rules/errors.js";
import type { LoadEvent } from "../../src/rules/types.js";
import { captureError, ruleYaml, writeText } from "../helpers.js";

const repoRulesDir = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "rules",
);

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rulepack-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("load command", () => {
  it("loads the built-in rules when no paths are given", async () => {
    const events: LoadEvent[] = [];

    const result = await runLoadCommand({
      paths: [],
      format: "summary",
      observer: (event) => events.push(event),
    });

    expect(result.output).toBe(
      [
        "Loaded 3 rules from 2 sources",
        "- rulepack.generic.1: Generic Password Assignment",
        "- rulepack.generic.2: Generic API Key Assignment",
        "- rulepack.pem.1: PEM-Encoded Private Key",
      ].join("\n"),
    );
    expect(events.filter((event) => event.type === "file-parsed")).toEqual([
      { type: "file-parsed", path: "builtin/generic.yaml", rules: 2 },
      { type: "file-parsed", path: "builtin/private-keys.yml", rules: 1 },
    ]);
  });

  it("loads explicit paths as JSON", async () => {
    const file = path.join(tempDir, "custom.yaml");
    await writeText(file, ruleYaml("custom.1"));

    const result = await runLoadCommand({ paths: [file], format: "json" });

    expect(JSON.parse(result.output)).toEqual({
      rules: [{ id: "custom.1", name: "Rule custom.1" }],
    });
    expect(result.sources).toBe(1);
  });

  it("writes YAML that parses back to the same rules", async () => {
    const dir = path.join(tempDir, "rules");
    await writeText(path.join(dir, "a.yaml"), ruleYaml("a.1", "a.2"));

    const result = await runLoadCommand({ paths: [dir], format: "yaml" });

    expect(yaml.load(result.output)).toEqual({
      rules: [
        { id: "a.1", name: "Rule a.1" },
        { id: "a.2", name: "Rule a.2" },
      ],
    });
  });

  it("writes output to a file", async () => {
    const file = path.join(tempDir, "custom.yaml");
    const out = path.join(tempDir, "summary.txt");
    await writeText(file, ruleYaml("custom.1"));

    const result = await runLoadCommand({
      paths: [file],
      format: "summary",
      out,
    });

    expect(result.output).toBe(
      "Loaded 1 rule from 1 source\n- custom.1: Rule custom.1",
    );
    expect(await fs.readFile(out, "utf8")).toBe(`${result.output}\n`);
  });

  it("treats every path as a file with --files", async () => {
    const dir = path.join(tempDir, "rules");
    await writeText(path.join(dir, "a.yaml"), ruleYaml("a.1"));

    const error = await captureError(
      runLoadCommand({ paths: [dir], format: "summary", filesOnly: true }),
      RuleIoError,
    );

    expect(error.path).toBe(dir);
  });
});

describe("runtime paths", () => {
  it("finds the bundled rules directory", async () => {
    expect(await resolveBuiltinRulesDirectory()).toBe(repoRulesDir);
  });

  it("labels built-in sources relative to the rules directory", async () => {
    const dir = path.join(tempDir, "bundled");
    await writeText(path.join(dir, "nested", "x.yaml"), ruleYaml("x.1"));

    const sources = await readBuiltinRuleSources(dir);

    expect(sources.map((source) => source.path)).toEqual([
      "builtin/nested/x.yaml",
    ]);
  });
});

describe("output helpers", () => {
  it("describes rules by id and name", () => {
    expect(describeRule({ id: "a.1", name: "Alpha" })).toBe("a.1: Alpha");
    expect(describeRule({ id: "a.1" })).toBe("a.1");
    expect(describeRule({ name: "Alpha" })).toBe("Alpha");
    expect(describeRule({ pattern: "x" })).toBe("(unnamed rule)");
  });

  it("rejects unknown formats", () => {
    expect(parseFormat("yaml")).toBe("yaml");
    expect(() => parseFormat("sarif")).toThrow("Unsupported format: sarif");
  });
});
