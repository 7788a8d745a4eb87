/**
 * One entry of a rules document. The loader keeps records opaque: any
 * mapping is accepted and its fields are never inspected.
 */
export type RuleRecord = Readonly<Record<string, unknown>>;

export interface RuleRecordContext {
  readonly index: number;
}

/**
 * Turns one raw `rules[]` entry into a record. Throwing rejects the whole
 * document; the loader attributes the error to the source path.
 */
export type RuleRecordDecoder<T> = (
  value: unknown,
  context: RuleRecordContext,
) => T;

export interface RulesDocument<T = RuleRecord> {
  readonly rules: readonly T[];
}

/**
 * An in-memory rules source, such as a rule set bundled with an
 * application. `path` is only a label for diagnostics.
 */
export interface RuleSourceContents {
  readonly path: string;
  readonly contents: string | Uint8Array;
}

export type SourceKind = "file" | "directory";

export type LoadUnit = "paths" | "files" | "contents";

export type LoadEvent =
  | {
      readonly type: "source-resolved";
      readonly path: string;
      readonly kind: SourceKind;
    }
  | {
      readonly type: "directory-scanned";
      readonly path: string;
      readonly files: number;
    }
  | {
      readonly type: "file-parsed";
      readonly path: string;
      readonly rules: number;
    }
  | {
      readonly type: "batch-loaded";
      readonly sources: number;
      readonly rules: number;
      readonly unit: LoadUnit;
    };

export type LoadObserver = (event: LoadEvent) => void;
