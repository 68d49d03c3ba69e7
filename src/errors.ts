/**
 * Error taxonomy.
 *
 *  - TransientDependencyError: embedding / LLM timeout, network failure or a
 *    payload we cannot use. Always degraded at the component that saw it.
 *  - MalformedInputError: empty query, zero options, corrupt chunk metadata.
 *    Handled with conservative defaults, never surfaced to the end user.
 *  - ConfigurationError: missing or misaligned artifacts, bad provider
 *    settings. Fatal: startup aborts.
 */

export interface ErrorJSON {
  code: string;
  name: string;
  message: string;
  details?: Record<string, unknown>;
}

export abstract class EngineError extends Error {
  abstract readonly code: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  toJSON(): ErrorJSON {
    return { code: this.code, name: this.name, message: this.message };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

export type DependencyName = "embedding" | "llm";
export type TransientReason = "timeout" | "aborted" | "http" | "network" | "bad_response";

export class TransientDependencyError extends EngineError {
  readonly code = "TRANSIENT_DEPENDENCY";

  constructor(
    readonly dependency: DependencyName,
    readonly reason: TransientReason,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(`${dependency} call failed (${reason}): ${message}`, options);
    this.name = "TransientDependencyError";
    this.status = options?.status;
  }

  /** HTTP status when the failure came from an upstream response. */
  readonly status?: number;

  override toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { dependency: this.dependency, reason: this.reason, status: this.status },
    };
  }
}

export class MalformedInputError extends EngineError {
  readonly code = "MALFORMED_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class ConfigurationError extends EngineError {
  readonly code = "CONFIGURATION";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Normalise anything caught into a message string for logging. */
export function describeError(e: unknown): string {
  if (e instanceof EngineError) return e.toString();
  if (e instanceof Error) return e.message;
  return String(e);
}
