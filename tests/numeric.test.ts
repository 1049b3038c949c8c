import test from "node:test";
import assert from "node:assert/strict";
import {
  approxEqual,
  cosDeg,
  degToRad,
  ensureFinite,
  radToDeg,
  round,
  safeExp,
  safeLn,
  safeSqrt,
  sinDeg,
  tanDeg,
} from "../src/numeric.js";
import { DomainError, InvalidInputError, isGeotechError } from "../src/errors.js";

test("converts between degrees and radians", () => {
  assert.equal(degToRad(180), Math.PI);
  assert.equal(radToDeg(Math.PI / 2), 90);
  assert.equal(degToRad(0), 0);
});

test("approxEqual is an inclusive absolute tolerance check", () => {
  assert.equal(approxEqual(1, 1.04, 0.05), true);
  assert.equal(approxEqual(1, 1.2, 0.05), false);
  assert.equal(approxEqual(2, 2, 0), true);
  assert.throws(() => approxEqual(1, 1, -0.1), InvalidInputError);
  assert.throws(() => approxEqual(1, 1, Number.NaN), InvalidInputError);
});

test("tanDeg rejects angles outside (-90, 90)", () => {
  assert.ok(Math.abs(tanDeg(45) - 1) < 1e-12);
  assert.throws(() => tanDeg(90), DomainError);
  assert.throws(() => tanDeg(-90), DomainError);
  assert.throws(() => tanDeg(Number.POSITIVE_INFINITY), DomainError);
});

test("sinDeg and cosDeg take degrees", () => {
  assert.ok(Math.abs(sinDeg(30) - 0.5) < 1e-12);
  assert.ok(Math.abs(cosDeg(60) - 0.5) < 1e-12);
});

test("safeSqrt, safeExp and safeLn raise DomainError outside their domains", () => {
  assert.equal(safeSqrt(9), 3);
  assert.throws(() => safeSqrt(-1), DomainError);
  assert.throws(() => safeSqrt(Number.NaN), DomainError);
  assert.throws(() => safeExp(1000), DomainError);
  assert.ok(Math.abs(safeLn(Math.E) - 1) < 1e-12);
  assert.throws(() => safeLn(0), DomainError);
});

test("ensureFinite names the failing operation", () => {
  assert.equal(ensureFinite(2.5, "x"), 2.5);
  assert.throws(() => ensureFinite(Number.NaN, "settle"), {
    name: "DomainError",
    message: "settle: result is not a finite number (NaN)",
  });
});

test("errors carry a code and are recognised by isGeotechError", () => {
  const err = new InvalidInputError("Fs", 0, "must be greater than 0");
  assert.equal(err.code, "INVALID_INPUT");
  assert.equal(err.parameter, "Fs");
  assert.equal(err.message, "Fs must be greater than 0. Got 0.");
  assert.equal(isGeotechError(err), true);
  assert.equal(new DomainError("tan", "bad").code, "DOMAIN_ERROR");
  assert.equal(isGeotechError(new Error("plain")), false);
});

test("round keeps the requested decimals", () => {
  assert.equal(round(1.23456, 2), 1.23);
  assert.equal(round(0.0555556, 4), 0.0556);
});
