/**
 * Error kinds raised by the API guard
 *
 * Every failure the engine can raise carries a `kind` discriminant so callers can
 * decide how to report it without string matching.
 */

export type GuardErrorKind =
  | "ExportUnavailable"
  | "MalformedExport"
  | "MalformedBaseline"
  | "BaselineMissing"
  | "SerializationError"
  | "ConfigNotFound"
  | "ConfigInvalid";

export abstract class GuardError extends Error {
  abstract readonly kind: GuardErrorKind;
}

/**
 * The export command failed, timed out, or left no symbol graph behind
 */
export class ExportUnavailableError extends GuardError {
  readonly kind = "ExportUnavailable" as const;

  constructor(
    readonly target: string,
    message: string,
    readonly output: string = ""
  ) {
    super(output ? `${message}\n${output}` : message);
    this.name = "ExportUnavailableError";
  }
}

export class MalformedExportError extends GuardError {
  readonly kind = "MalformedExport" as const;

  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`Malformed symbol graph ${source}: ${issues.join("; ")}`);
    this.name = "MalformedExportError";
  }
}

export class MalformedBaselineError extends GuardError {
  readonly kind = "MalformedBaseline" as const;

  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Malformed API baseline ${path}: ${issues.join("; ")}`);
    this.name = "MalformedBaselineError";
  }
}

/**
 * No baseline has been recorded for the target yet; run an update first
 */
export class BaselineMissingError extends GuardError {
  readonly kind = "BaselineMissing" as const;

  constructor(
    readonly target: string,
    readonly path: string
  ) {
    super(`API baseline missing for target: ${target} (expected ${path})`);
    this.name = "BaselineMissingError";
  }
}

export class SerializationError extends GuardError {
  readonly kind = "SerializationError" as const;

  constructor(
    readonly path: string,
    readonly valueType: string
  ) {
    super(`Unsupported JSON value at ${path}: ${valueType}`);
    this.name = "SerializationError";
  }
}

export class ConfigNotFoundError extends GuardError {
  readonly kind = "ConfigNotFound" as const;

  constructor(readonly path: string) {
    super(`Config not found: ${path}`);
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigInvalidError extends GuardError {
  readonly kind = "ConfigInvalid" as const;

  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Config decode failed (${path}): ${issues.join("; ")}`);
    this.name = "ConfigInvalidError";
  }
}

export interface ErrorInfo {
  kind: GuardErrorKind | "Unexpected";
  message: string;
}

export function isGuardError(error: unknown): error is GuardError {
  return error instanceof GuardError;
}

/**
 * Flatten any thrown value into a reportable shape
 */
export function describeError(error: unknown): ErrorInfo {
  if (isGuardError(error)) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { kind: "Unexpected", message: error.message };
  }
  return { kind: "Unexpected", message: String(error) };
}
