import test from "node:test";
import assert from "node:assert/strict";
import {
  criticalGradientFromUnitWeight,
  criticalHydraulicGradient,
  darcyFlowRate,
  darcyVelocity,
  hydraulicGradient,
  isPiping,
  pipingSafetyFactor,
  seepageForce,
  seepageVelocity,
} from "../src/tools/geotech/seepage.js";
import { InvalidInputError } from "../src/errors.js";

const near = (actual: number, expected: number, tol: number) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected} +/- ${tol}, got ${actual}`);

test("Darcy velocity and flow rate", () => {
  near(darcyFlowRate(1.0e-4, 0.2, 10.0), 0.0002, 1e-5);
  near(darcyVelocity(1e-5, 0.5), 5e-6, 1e-18);
  assert.equal(darcyFlowRate(1e-4, 0.2, 0), 0);
  assert.throws(() => darcyVelocity(0, 0.5), InvalidInputError);
  assert.throws(() => darcyFlowRate(1e-4, 0.2, -1), InvalidInputError);
});

test("hydraulic gradient requires a positive flow length", () => {
  assert.equal(hydraulicGradient(2, 4), 0.5);
  assert.throws(() => hydraulicGradient(2, 0), InvalidInputError);
  assert.throws(() => hydraulicGradient(2, -4), InvalidInputError);
});

test("seepage velocity and seepage force", () => {
  near(seepageVelocity(2, 0.4), 5, 1e-12);
  assert.throws(() => seepageVelocity(2, 0), InvalidInputError);
  assert.throws(() => seepageVelocity(2, 1), InvalidInputError);
  near(seepageForce(2, 3), 58.86, 1e-9);
});

test("critical hydraulic gradient", () => {
  near(criticalHydraulicGradient(2.65, 0.8), 0.917, 0.01);
  near(criticalGradientFromUnitWeight(20), 1.0387, 0.0001);
  assert.throws(() => criticalHydraulicGradient(1, 0.8), InvalidInputError);
  assert.throws(() => criticalHydraulicGradient(2.65, -1), InvalidInputError);
  assert.throws(() => criticalGradientFromUnitWeight(9), InvalidInputError);
});

test("piping is an exact threshold", () => {
  const icr = criticalHydraulicGradient(2.65, 0.8);
  assert.equal(isPiping(icr, icr), true);
  assert.equal(isPiping(icr - 1e-12, icr), false);
  assert.equal(isPiping(1.0, 0.917), true);
  assert.equal(isPiping(0.5, 0.917), false);
  assert.throws(() => isPiping(Number.NaN, 0.917), InvalidInputError);
});

test("piping factor of safety", () => {
  near(pipingSafetyFactor(0.5, 0.917), 1.834, 1e-9);
  assert.throws(() => pipingSafetyFactor(0, 0.917), InvalidInputError);
});
