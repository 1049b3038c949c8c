/**
 * Error kinds raised by the geotechnical formulas.
 *
 * InvalidInputError: a caller-supplied parameter is outside its documented domain.
 * DomainError: an intermediate transcendental step left its mathematical domain,
 * or a result came out NaN/Infinity.
 */

export type GeotechErrorCode = "INVALID_INPUT" | "DOMAIN_ERROR";

export abstract class GeotechError extends Error {
  abstract readonly code: GeotechErrorCode;
}

export class InvalidInputError extends GeotechError {
  readonly code = "INVALID_INPUT";

  constructor(
    readonly parameter: string,
    readonly value: unknown,
    requirement: string,
  ) {
    super(`${parameter} ${requirement}. Got ${String(value)}.`);
    this.name = "InvalidInputError";
  }
}

export class DomainError extends GeotechError {
  readonly code = "DOMAIN_ERROR";

  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`${operation}: ${message}`);
    this.name = "DomainError";
  }
}

export function isGeotechError(err: unknown): err is GeotechError {
  return err instanceof GeotechError;
}
