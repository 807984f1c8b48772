/**
 * Error taxonomy shared by the broker, the session bridge and the adapters.
 *
 * Expected outcomes (unknown id, lost claim race) are returned as typed results
 * by the components themselves. BridgeError is for what the caller cannot
 * resolve by looking at a result: timeouts, upstream failures, capacity limits
 * and malformed input.
 */

export type BridgeErrorKind =
  | "not_found"
  | "conflict"
  | "timeout"
  | "upstream_failure"
  | "capacity_exceeded"
  | "invalid_input";

export class BridgeError extends Error {
  readonly kind: BridgeErrorKind;

  constructor(kind: BridgeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.kind = kind;
  }
}

export function isBridgeError(err: unknown, kind?: BridgeErrorKind): err is BridgeError {
  if (!(err instanceof BridgeError)) return false;
  return kind === undefined || err.kind === kind;
}

/** Message text for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
