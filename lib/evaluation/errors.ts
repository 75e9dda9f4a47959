export type EvaluationErrorKind =
  | "NoJsonFound"
  | "MalformedJson"
  | "MissingKeys"
  | "CriteriaMismatch"
  | "ModelRequestFailed";

function describeCause(cause: unknown, fallback: string): string {
  return cause instanceof Error ? cause.message : fallback;
}

function describeMismatch(missing: string[], unexpected: string[]): string {
  return [
    missing.length > 0 ? `missing: ${missing.join(", ")}` : null,
    unexpected.length > 0 ? `unexpected: ${unexpected.join(", ")}` : null,
  ]
    .filter(Boolean)
    .join("; ");
}

export class EvaluationError extends Error {
  constructor(
    readonly kind: EvaluationErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class NoJsonFoundError extends EvaluationError {
  constructor(readonly raw: string) {
    super("NoJsonFound", `Model did not return JSON.\nRaw output:\n${raw}`);
  }
}

export class MalformedJsonError extends EvaluationError {
  constructor(
    readonly candidate: string,
    cause: unknown,
  ) {
    super("MalformedJson", `Model returned malformed JSON: ${describeCause(cause, "invalid_json")}`, {
      cause,
    });
  }
}

export class MissingKeysError extends EvaluationError {
  constructor(readonly missing: string[], data: unknown) {
    super(
      "MissingKeys",
      `JSON missing expected keys (${missing.join(", ")}).\nGot:\n${JSON.stringify(data, null, 2)}`,
    );
  }
}

export class CriteriaMismatchError extends EvaluationError {
  constructor(
    readonly missing: string[],
    readonly unexpected: string[],
  ) {
    super("CriteriaMismatch", `Criteria keys mismatch (${describeMismatch(missing, unexpected)}).`);
  }
}

export class ModelRequestFailedError extends EvaluationError {
  constructor(cause: unknown) {
    super("ModelRequestFailed", `Model request failed: ${describeCause(cause, "Unknown model error")}`, {
      cause,
    });
  }
}

/** Fatal at startup; kept outside the per-request taxonomy. */
export class ConfigurationMissingError extends Error {
  readonly kind = "ConfigurationMissing";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationMissing";
  }
}
