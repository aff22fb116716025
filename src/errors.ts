/**
 * Error types raised by the beam design core.
 *
 * Every failure is a local computation error: the same inputs always fail the
 * same way, so shells report the message and carry on.
 */

export type BeamDesignErrorCode =
  | "unknown_variant"
  | "domain_error"
  | "degenerate_span"
  | "invalid_input";

export class BeamDesignError extends Error {
  readonly code: BeamDesignErrorCode;

  constructor(code: BeamDesignErrorCode, message: string) {
    super(message);
    this.name = "BeamDesignError";
    this.code = code;
  }
}

/** Variant string outside the four supported support conditions. */
export class UnknownVariantError extends BeamDesignError {
  constructor(raw: string, allowed: readonly string[]) {
    super("unknown_variant", `Unknown beam type '${raw}'. Must be one of: ${allowed.join(", ")}`);
    this.name = "UnknownVariantError";
  }
}

/** Input that would take a formula outside its domain (sqrt of a negative, division by zero). */
export class DomainError extends BeamDesignError {
  constructor(message: string) {
    super("domain_error", message);
    this.name = "DomainError";
  }
}

export class DegenerateSpanError extends BeamDesignError {
  constructor(span: number) {
    super("degenerate_span", `span_m must be a positive number (got ${span}).`);
    this.name = "DegenerateSpanError";
  }
}

export class InvalidInputError extends BeamDesignError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

export function isBeamDesignError(err: unknown): err is BeamDesignError {
  return err instanceof BeamDesignError;
}

/** Bad environment configuration, raised once at start-up. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
