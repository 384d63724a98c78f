import type { CallFailure, ProviderId } from "./types.js";

export type OracleErrorKind = "timeout" | "request" | "invalid_response" | "not_configured";

/**
 * A single evaluator call failed. Everything except a missing API key is
 * treated as transient and may be retried once by the dispatch scheduler.
 */
export class OracleError extends Error {
  readonly transient: boolean;

  constructor(
    message: string,
    public readonly kind: OracleErrorKind,
    public readonly provider: ProviderId,
    public readonly callIndex: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "OracleError";
    this.transient = kind !== "not_configured";
  }
}

/** Fewer evaluator calls succeeded than the configured quorum. Fatal for that answer only. */
export class InsufficientEvidenceError extends Error {
  constructor(
    public readonly answerId: string,
    public readonly succeeded: number,
    public readonly requested: number,
    public readonly quorum: number,
    public readonly failures: readonly CallFailure[],
  ) {
    super(`Answer ${answerId}: ${succeeded}/${requested} evaluator calls succeeded, quorum is ${quorum}`);
    this.name = "InsufficientEvidenceError";
  }
}
