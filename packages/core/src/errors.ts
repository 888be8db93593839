// ---------------------------------------------------------------------------
// Error taxonomy — every failure the relay reports carries a machine-readable
// code and structured context for the logger.
// ---------------------------------------------------------------------------

export type RelayErrorCode =
  | "CONFIG_INVALID"
  | "UPSTREAM_UNAVAILABLE"
  | "UPSTREAM_RATE_LIMITED"
  | "DELIVERY_FAILED"
  | "STATE_UNREADABLE"
  | "STATE_UNWRITABLE";

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: RelayErrorCode,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RelayError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/** Malformed repository spec or missing/invalid setting. Fatal at startup. */
export class ConfigurationError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[], context: Record<string, unknown> = {}) {
    super(
      `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      "CONFIG_INVALID",
      context,
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * The source-control API could not answer. The repository is skipped for
 * this cycle and its checkpoint is left where it was.
 */
export class UpstreamUnavailableError extends RelayError {
  readonly status: number | undefined;
  readonly rateLimited: boolean;
  readonly resetAt: Date | undefined;

  constructor(
    message: string,
    details: {
      status?: number | undefined;
      rateLimited?: boolean | undefined;
      resetAt?: Date | undefined;
      cause?: unknown;
    } = {},
  ) {
    const rateLimited = details.rateLimited ?? false;
    super(
      message,
      rateLimited ? "UPSTREAM_RATE_LIMITED" : "UPSTREAM_UNAVAILABLE",
      {
        status: details.status,
        resetAt: details.resetAt?.toISOString(),
      },
      { cause: details.cause },
    );
    this.name = "UpstreamUnavailableError";
    this.status = details.status;
    this.rateLimited = rateLimited;
    this.resetAt = details.resetAt;
  }
}

/** The webhook rejected a message or could not be reached. */
export class DeliveryFailedError extends RelayError {
  readonly status: number | undefined;

  constructor(
    message: string,
    details: { status?: number | undefined; cause?: unknown } = {},
  ) {
    super(
      message,
      "DELIVERY_FAILED",
      { status: details.status },
      { cause: details.cause },
    );
    this.name = "DeliveryFailedError";
    this.status = details.status;
  }
}

export class PersistenceError extends RelayError {
  constructor(
    message: string,
    code: "STATE_UNREADABLE" | "STATE_UNWRITABLE",
    details: { path?: string | undefined; cause?: unknown } = {},
  ) {
    super(message, code, { path: details.path }, { cause: details.cause });
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
