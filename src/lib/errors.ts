/**
 * Error classes for the in-silico PCR library.
 *
 * Only structurally invalid input is thrown. Biologically plausible
 * "no signal" outcomes (nothing binds, no product survives) are reported
 * as warnings on the simulation result instead.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error carrying a stable error code, e.g. `ERR_CONFIG_INVALID`
 */
export class InsilicoError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;

  constructor(message: string, code: string, details: ErrorDetails = {}) {
    super(`${code}: ${message}`);
    this.name = 'InsilicoError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised when a configuration object contains unknown keys or invalid values
 */
export class ConfigError extends InsilicoError {
  constructor(message: string, code: string, details: ErrorDetails = {}) {
    super(message, code, details);
    this.name = 'ConfigError';
  }
}
