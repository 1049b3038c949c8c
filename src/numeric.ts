/**
 * Numeric leaf used by every formula group: angle conversion, approximate
 * equality, and transcendental wrappers that raise DomainError instead of
 * letting NaN or Infinity through.
 */
import { DomainError, InvalidInputError } from "./errors.js";

/** Unit weight of water, kN/m^3 */
export const GAMMA_WATER = 9.81;

// ─── Angles ──────────────────────────────────────────────────────────────────

/** Convert degrees to radians */
export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Convert radians to degrees */
export function radToDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}

// ─── Comparison ──────────────────────────────────────────────────────────────

/** True iff |a - b| <= tolerance. */
export function approxEqual(a: number, b: number, tolerance: number): boolean {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new InvalidInputError("tolerance", tolerance, "must be a finite number of 0 or greater");
  }
  return Math.abs(a - b) <= tolerance;
}

// ─── Guarded transcendentals ─────────────────────────────────────────────────

export function ensureFinite(value: number, operation: string): number {
  if (!Number.isFinite(value)) {
    throw new DomainError(operation, `result is not a finite number (${value})`);
  }
  return value;
}

/**
 * Tangent of an angle given in degrees. The angle must lie strictly inside
 * (-90, 90); formulas built on tan(45 +/- phi/2) stay inside it for 0 <= phi < 90.
 */
export function tanDeg(deg: number): number {
  if (!Number.isFinite(deg) || deg <= -90 || deg >= 90) {
    throw new DomainError("tan", `angle ${deg} deg is outside (-90, 90)`);
  }
  return ensureFinite(Math.tan(degToRad(deg)), "tan");
}

export function sinDeg(deg: number): number {
  return ensureFinite(Math.sin(degToRad(deg)), "sin");
}

export function cosDeg(deg: number): number {
  return ensureFinite(Math.cos(degToRad(deg)), "cos");
}

export function safeSqrt(x: number): number {
  if (!(x >= 0)) {
    throw new DomainError("sqrt", `argument ${x} is negative`);
  }
  return ensureFinite(Math.sqrt(x), "sqrt");
}

export function safeExp(x: number): number {
  return ensureFinite(Math.exp(x), "exp");
}

export function safeLn(x: number): number {
  if (!(x > 0)) {
    throw new DomainError("ln", `argument ${x} is not positive`);
  }
  return ensureFinite(Math.log(x), "ln");
}

// ─── Display ─────────────────────────────────────────────────────────────────

export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
