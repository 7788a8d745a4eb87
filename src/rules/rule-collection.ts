import type { RuleRecord, RulesDocument } from "./types.js";

/**
 * The view of a loaded rule set handed to consumers.
 */
export interface ReadonlyRuleCollection<T = RuleRecord> extends Iterable<T> {
  readonly size: number;
  isEmpty(): boolean;
  toArray(): T[];
  toJSON(): RulesDocument<T>;
}

/**
 * Ordered, append-only list of rule records. Records keep the order in which
 * they were merged; nothing is deduplicated.
 */
export class RuleCollection<T = RuleRecord>
  implements ReadonlyRuleCollection<T>
{
  private readonly records: T[] = [];

  constructor(records: Iterable<T> = []) {
    this.merge(records);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  merge(records: Iterable<T>): this {
    // Snapshot first so merging a collection into itself terminates.
    const incoming = Array.from(records);
    for (const record of incoming) {
      this.records.push(record);
    }
    return this;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.records.values();
  }

  toArray(): T[] {
    return [...this.records];
  }

  toJSON(): RulesDocument<T> {
    return { rules: this.toArray() };
  }
}
