import test from "node:test";
import assert from "node:assert/strict";
import {
  bearingCapacityDesign,
  bearingFactorOfSafety,
  overburdenPressure,
  terzaghiBearingCapacity,
  terzaghiBearingCapacityShaped,
  terzaghiFactors,
  terzaghiNc,
  terzaghiNgamma,
  terzaghiNq,
} from "../src/tools/geotech/bearing-capacity.js";
import { InvalidInputError } from "../src/errors.js";

const near = (actual: number, expected: number, tol: number) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected} +/- ${tol}, got ${actual}`);

test("factors at phi = 0 take the cohesive values", () => {
  near(terzaghiNq(0), 1, 1e-12);
  near(terzaghiNc(0), 5.7, 0.02);
  assert.equal(terzaghiNgamma(0), 0);
});

test("factors match Terzaghi's table at 30 degrees", () => {
  const { Nc, Nq, Ngamma } = terzaghiFactors(30);
  near(Nc, 37.16, 0.01);
  near(Nq, 22.46, 0.01);
  near(Ngamma, 27.08, 0.01);
});

test("Nc rises from its cohesive limit without dipping near phi = 0", () => {
  let prev = terzaghiNc(0);
  for (let k = -36; k <= -12; k++) {
    const phi = Math.pow(10, k / 4);
    const next = terzaghiNc(phi);
    assert.ok(next > prev, `Nc at phi=${phi}`);
    prev = next;
  }
});

test("factors are positive and strictly increasing on [0, 50)", () => {
  let prev = terzaghiFactors(0);
  for (let step = 1; step < 500; step++) {
    const phi = step / 10;
    const next = terzaghiFactors(phi);
    assert.ok(next.Nc > prev.Nc, `Nc at phi=${phi}`);
    assert.ok(next.Nq > prev.Nq, `Nq at phi=${phi}`);
    assert.ok(next.Ngamma > prev.Ngamma, `Ngamma at phi=${phi}`);
    assert.ok(next.Nc > 0 && next.Nq > 0 && next.Ngamma > 0);
    prev = next;
  }
});

test("factors reject phi outside [0, 50]", () => {
  assert.throws(() => terzaghiNq(-1), InvalidInputError);
  assert.throws(() => terzaghiNc(51), InvalidInputError);
  assert.throws(() => terzaghiNgamma(Number.NaN), InvalidInputError);
});

test("strip footing ultimate capacity", () => {
  // c=10, q=18, gamma=18, B=2, phi=30
  near(terzaghiBearingCapacity(10, 18, 18, 2, 30), 1263.35, 0.01);
  // undrained clay: 50 * 5.712 + 20 * 1
  near(terzaghiBearingCapacity(50, 20, 18, 1.5, 0), 305.62, 0.01);
});

test("shape multipliers change the cohesion and self-weight terms", () => {
  near(terzaghiBearingCapacityShaped("square", 10, 18, 18, 2, 30), 1277.33, 0.01);
  const strip = terzaghiBearingCapacityShaped("strip", 10, 18, 18, 2, 30);
  assert.equal(strip, terzaghiBearingCapacity(10, 18, 18, 2, 30));
  const circular = terzaghiBearingCapacityShaped("circular", 10, 18, 18, 2, 30);
  const square = terzaghiBearingCapacityShaped("square", 10, 18, 18, 2, 30);
  near(square - circular, 0.1 * 18 * 2 * terzaghiNgamma(30), 1e-9);
});

test("capacity validates c, q, gamma and B", () => {
  assert.throws(() => terzaghiBearingCapacity(-1, 18, 18, 2, 30), InvalidInputError);
  assert.throws(() => terzaghiBearingCapacity(10, -1, 18, 2, 30), InvalidInputError);
  assert.throws(() => terzaghiBearingCapacity(10, 18, 0, 2, 30), InvalidInputError);
  assert.throws(() => terzaghiBearingCapacity(10, 18, 18, 0, 30), InvalidInputError);
});

test("allowable capacity divides by the factor of safety", () => {
  assert.equal(bearingCapacityDesign(900, 3), 300);
  assert.equal(bearingCapacityDesign(1263.35, 2.5), 1263.35 / 2.5);
  assert.throws(() => bearingCapacityDesign(900, 0), InvalidInputError);
  assert.throws(() => bearingCapacityDesign(900, -2), InvalidInputError);
});

test("overburden and achieved factor of safety", () => {
  assert.equal(overburdenPressure(18, 1.5), 27);
  assert.equal(bearingFactorOfSafety(600, 200), 3);
  assert.throws(() => bearingFactorOfSafety(600, 0), InvalidInputError);
  assert.throws(() => overburdenPressure(18, -1), InvalidInputError);
});
