export type RuleLoadErrorKind = "parse" | "io" | "invalid-input";

export abstract class RuleLoadError extends Error {
  abstract readonly kind: RuleLoadErrorKind;
  readonly path: string;

  protected constructor(message: string, path: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.path = path;
  }
}

/**
 * A rules document that is not valid YAML or does not have the
 * `{ rules: [...] }` shape.
 */
export class RuleParseError extends RuleLoadError {
  readonly kind = "parse";

  constructor(path: string, cause: unknown) {
    super(
      `Failed to load rules YAML from ${path}: ${describeCause(cause)}`,
      path,
      cause,
    );
  }
}

export class RuleIoError extends RuleLoadError {
  readonly kind = "io";
  readonly operation: string;

  constructor(operation: string, path: string, cause: unknown) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, path, cause);
    this.operation = operation;
  }
}

/**
 * A top-level input that is neither a regular file nor a directory.
 */
export class InvalidRuleSourceError extends RuleLoadError {
  readonly kind = "invalid-input";

  constructor(path: string, cause?: unknown) {
    super(
      `Unhandled input type: ${path} is neither a file nor a directory`,
      path,
      cause,
    );
  }
}

export function isRuleLoadError(error: unknown): error is RuleLoadError {
  return error instanceof RuleLoadError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
