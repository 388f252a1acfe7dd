export type KgErrorCode =
  | "MALFORMED_DOCUMENT"
  | "INVALID_CLIENT_ID"
  | "INVALID_FACT"
  | "UNKNOWN_FACT"
  | "CONFIG_INVALID"
  | "UNGROUNDED_OUTPUT"
  | "GENERATOR_FAILED"
  | "INTERNAL";

export type KgFailureArtifact = {
  code: KgErrorCode;
  reason: string;
  details: string[];
  next_action: string;
};

export class KgError extends Error {
  readonly code: KgErrorCode;
  readonly details: string[];
  readonly next_action: string;

  constructor(params: {
    code: KgErrorCode;
    reason: string;
    details?: string[];
    next_action?: string;
    cause?: unknown;
  }) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "KgError";
    this.code = params.code;
    this.details = params.details ?? [];
    this.next_action = params.next_action ?? "Inspect the event log for this request and retry.";
  }

  toFailureArtifact(): KgFailureArtifact {
    return {
      code: this.code,
      reason: this.message,
      details: this.details,
      next_action: this.next_action,
    };
  }
}

/** The uploaded bytes are not a readable report; nothing was stored. */
export class MalformedDocumentError extends KgError {
  constructor(reason: string, details: string[] = [], cause?: unknown) {
    super({
      code: "MALFORMED_DOCUMENT",
      reason,
      details,
      next_action: "Export the report as UTF-8 text (one form feed per page) and upload it again.",
      cause,
    });
    this.name = "MalformedDocumentError";
  }
}

export class KgConfigError extends KgError {
  constructor(reason: string, details: string[] = []) {
    super({
      code: "CONFIG_INVALID",
      reason,
      details,
      next_action: "Fix the configuration file and restart the process.",
    });
    this.name = "KgConfigError";
  }
}

/**
 * Generated text referenced something outside the supplied facts.
 * The text must not be shown to the user.
 */
export class UngroundedOutputError extends KgError {
  readonly output_text: string;

  constructor(reason: string, details: string[], output_text: string) {
    super({
      code: "UNGROUNDED_OUTPUT",
      reason,
      details,
      next_action: "Do not display the draft. Retry with fewer facts or use the template generator.",
    });
    this.name = "UngroundedOutputError";
    this.output_text = output_text;
  }
}

/** Failure artifact for anything thrown; errors outside KgError are reported as INTERNAL. */
export function toFailureArtifact(error: unknown): KgFailureArtifact {
  if (error instanceof KgError) {
    return error.toFailureArtifact();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    code: "INTERNAL",
    reason,
    details: error instanceof Error && error.name !== "Error" ? [error.name] : [],
    next_action: "Report this failure with the event log attached; it is not caused by the input.",
  };
}
