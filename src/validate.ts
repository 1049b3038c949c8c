/**
 * Argument guards shared by every formula group. Each returns the value it
 * checked so calls can be inlined into expressions.
 */
import { InvalidInputError } from "./errors.js";

export function requireFinite(name: string, value: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidInputError(name, value, "must be a finite number");
  }
  return value;
}

export function requirePositive(name: string, value: number): number {
  requireFinite(name, value);
  if (value <= 0) {
    throw new InvalidInputError(name, value, "must be greater than 0");
  }
  return value;
}

export function requireNonNegative(name: string, value: number): number {
  requireFinite(name, value);
  if (value < 0) {
    throw new InvalidInputError(name, value, "must be 0 or greater");
  }
  return value;
}

/** Checks that `value` lies in `[min, max]`, or `[min, max)` when `maxExclusive` is set. */
export function requireInRange(
  name: string,
  value: number,
  min: number,
  max: number,
  maxExclusive: boolean = false,
): number {
  requireFinite(name, value);
  const aboveMax = maxExclusive ? value >= max : value > max;
  if (value < min || aboveMax) {
    throw new InvalidInputError(
      name,
      value,
      `must be in [${min}, ${max}${maxExclusive ? ")" : "]"}`,
    );
  }
  return value;
}

export function requireGreaterThan(name: string, value: number, bound: number): number {
  requireFinite(name, value);
  if (value <= bound) {
    throw new InvalidInputError(name, value, `must be greater than ${bound}`);
  }
  return value;
}

/** Friction angle in degrees, 0 <= phi < 90. */
export function requireFrictionAngle(phi_deg: number, name: string = "phi_deg"): number {
  return requireInRange(name, phi_deg, 0, 90, true);
}
