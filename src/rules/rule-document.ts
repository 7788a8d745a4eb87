import yaml from "js-yaml";
import type {
  RuleRecord,
  RuleRecordContext,
  RuleRecordDecoder,
  RulesDocument,
} from "./types.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Parse one `{ rules: [...] }` YAML document into its records, in document
 * order. Throws a plain `Error` on malformed input; callers add the path.
 */
export function parseRulesDocument<T>(
  contents: string | Uint8Array,
  decode: RuleRecordDecoder<T>,
): T[] {
  const text = typeof contents === "string" ? contents : utf8.decode(contents);
  const doc: unknown = yaml.load(text);
  if (!isRecord(doc)) {
    throw new Error(
      "expected a mapping with a `rules` list at the document root",
    );
  }

  if (!("rules" in doc)) {
    throw new Error("missing `rules` list");
  }

  const entries = doc.rules;
  if (!Array.isArray(entries)) {
    throw new Error("`rules` must be a list");
  }

  return entries.map((value: unknown, index) => decode(value, { index }));
}

/**
 * Default decoder: any mapping is a rule record.
 */
export function asRuleRecord(
  value: unknown,
  context: RuleRecordContext,
): RuleRecord {
  if (!isRecord(value)) {
    throw new Error(`rules[${context.index}] must be a mapping`);
  }
  return value;
}

export function serializeRules<T>(records: Iterable<T>): string {
  const doc: RulesDocument<T> = { rules: Array.from(records) };
  return yaml.dump(doc, { lineWidth: 120, noRefs: true });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
