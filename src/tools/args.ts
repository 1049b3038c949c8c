/**
 * Argument readers for tool `execute` handlers. The model sends loosely typed
 * JSON; these coerce with Number() and reject anything that is not finite.
 */
import { InvalidInputError } from "../errors.js";

export type ToolArgs = Record<string, unknown>;

export function asArgs(args: unknown): ToolArgs {
  if (args === null || args === undefined) return {};
  if (typeof args !== "object" || Array.isArray(args)) {
    throw new InvalidInputError("arguments", args, "must be a JSON object");
  }
  return Object.fromEntries(Object.entries(args));
}

export function numberArg(args: ToolArgs, key: string): number {
  const raw = args[key];
  if (raw === undefined || raw === null || raw === "") {
    throw new InvalidInputError(key, raw, "is required");
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(key, raw, "must be a finite number");
  }
  return value;
}

export function optionalNumberArg(args: ToolArgs, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined || raw === null) return undefined;
  return numberArg(args, key);
}

export function enumArg<T extends string>(args: ToolArgs, key: string, allowed: readonly T[]): T {
  const raw = String(args[key] ?? "");
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new InvalidInputError(key, args[key], `must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

export function numberListArg(args: ToolArgs, key: string): number[] {
  const raw = args[key];
  if (!Array.isArray(raw)) {
    throw new InvalidInputError(key, raw, "must be an array of numbers");
  }
  return raw.map((item, idx) => {
    const value = Number(item);
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(`${key}[${idx}]`, item, "must be a finite number");
    }
    return value;
  });
}
