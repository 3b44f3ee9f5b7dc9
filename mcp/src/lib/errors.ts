/**
 * Error taxonomy for the tally pipeline.
 *
 * NetworkError and InterfaceMismatchError raised while acquiring mandatory data
 * abort the run. DecodeError is always recovered per item by the caller.
 * A slate index past the end is not an error at all: the client reports `null`.
 */

export const ErrorCode = {
  Network: "network_error",
  Decode: "decode_error",
  InterfaceMismatch: "interface_mismatch",
  Config: "invalid_config",
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class ChiefError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends ChiefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.Network, message, options);
  }
}

export class DecodeError extends ChiefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.Decode, message, options);
  }
}

export class InterfaceMismatchError extends ChiefError {
  constructor(
    public readonly address: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(ErrorCode.InterfaceMismatch, message, options);
  }
}

export class ConfigError extends ChiefError {
  constructor(public readonly invalid: string[]) {
    super(ErrorCode.Config, `Invalid configuration: ${invalid.join(", ")}`);
  }
}

/** Result of one pooled external call. */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ChiefError };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap anything thrown by a network collaborator, keeping taxonomy errors as they are. */
export function toChiefError(err: unknown, context: string): ChiefError {
  if (err instanceof ChiefError) return err;
  return new NetworkError(`${context}: ${errorMessage(err)}`, { cause: err });
}
