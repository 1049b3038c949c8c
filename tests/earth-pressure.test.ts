import test from "node:test";
import assert from "node:assert/strict";
import {
  atRestCoefficient,
  atRestCoefficientOverconsolidated,
  atRestForce,
  atRestPressure,
  coulombActiveCoefficient,
  coulombActiveForce,
  coulombPassiveCoefficient,
  rankineActiveCoefficient,
  rankineActiveForce,
  rankineActivePressure,
  rankineActivePressureCohesive,
  rankinePassiveCoefficient,
  rankinePassiveForce,
  rankinePassivePressure,
  rankinePassivePressureCohesive,
  tensionCrackDepth,
} from "../src/tools/geotech/earth-pressure.js";
import { DomainError, InvalidInputError } from "../src/errors.js";

const near = (actual: number, expected: number, tol: number) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected} +/- ${tol}, got ${actual}`);

test("Rankine coefficients at 30 degrees", () => {
  near(rankineActiveCoefficient(30), 0.333, 0.01);
  near(rankinePassiveCoefficient(30), 3.0, 0.1);
  near(rankineActiveCoefficient(0), 1, 1e-12);
  near(rankinePassiveCoefficient(0), 1, 1e-12);
});

test("passive exceeds active for phi in (0, 45)", () => {
  for (let phi = 0.5; phi < 45; phi += 0.5) {
    assert.ok(rankinePassiveCoefficient(phi) > rankineActiveCoefficient(phi), `phi=${phi}`);
  }
});

test("Ka decreases and Kp increases with phi", () => {
  let prevKa = rankineActiveCoefficient(0);
  let prevKp = rankinePassiveCoefficient(0);
  for (let phi = 1; phi < 90; phi += 1) {
    const Ka = rankineActiveCoefficient(phi);
    const Kp = rankinePassiveCoefficient(phi);
    assert.ok(Ka < prevKa, `Ka at phi=${phi}`);
    assert.ok(Kp > prevKp, `Kp at phi=${phi}`);
    prevKa = Ka;
    prevKp = Kp;
  }
});

test("Rankine coefficients reject phi outside [0, 90)", () => {
  assert.throws(() => rankineActiveCoefficient(-1), InvalidInputError);
  assert.throws(() => rankineActiveCoefficient(90), InvalidInputError);
  assert.throws(() => rankinePassiveCoefficient(95), InvalidInputError);
  assert.throws(() => rankinePassiveCoefficient(Number.NaN), InvalidInputError);
});

test("Rankine pressure and force reference values", () => {
  near(rankineActivePressure(0.333, 18.0, 3.0), 18.0, 0.5);
  near(rankineActiveForce(0.333, 18.0, 5.0), 75.0, 1.0);
  assert.equal(rankineActivePressure(0.5, 20, 0), 0);
  assert.equal(rankinePassivePressure(3, 20, 2), 120);
  assert.equal(rankinePassiveForce(3, 20, 2), 120);
});

test("pressure and force validate their inputs", () => {
  assert.throws(() => rankineActivePressure(0.333, 0, 3), InvalidInputError);
  assert.throws(() => rankineActivePressure(0.333, 18, -1), InvalidInputError);
  assert.throws(() => rankineActiveForce(0.333, 18, -0.1), InvalidInputError);
  assert.throws(() => rankineActiveForce(0, 18, 5), InvalidInputError);
});

test("cohesive Rankine pressures and tension crack", () => {
  const Ka = rankineActiveCoefficient(30);
  const Kp = rankinePassiveCoefficient(30);
  near(rankineActivePressureCohesive(Ka, 18, 3, 10), 6.453, 0.001);
  near(rankinePassivePressureCohesive(Kp, 18, 3, 10), 196.641, 0.001);
  near(tensionCrackDepth(Ka, 18, 10), 1.9245, 0.0001);
  assert.equal(rankineActivePressureCohesive(Ka, 18, 1, 10), 0);
  assert.throws(() => rankineActivePressureCohesive(Ka, 18, 3, -5), InvalidInputError);
});

test("Coulomb reduces to Rankine with a smooth vertical wall and level backfill", () => {
  for (const phi of [0, 15, 30, 40]) {
    near(coulombActiveCoefficient(phi, 0), rankineActiveCoefficient(phi), 1e-9);
    near(coulombPassiveCoefficient(phi, 0), rankinePassiveCoefficient(phi), 1e-9);
  }
});

test("Coulomb coefficients with wall friction, inclination and slope", () => {
  near(coulombActiveCoefficient(30, 20), 0.2973, 0.0001);
  near(coulombPassiveCoefficient(30, 20), 6.1054, 0.0001);
  near(coulombActiveCoefficient(30, 20, 10, 10), 0.4376, 0.0001);
  near(coulombActiveForce(0.3, 18, 5), 67.5, 1e-9);
});

test("Coulomb validates angle combinations", () => {
  assert.throws(() => coulombActiveCoefficient(30, 35), InvalidInputError);
  assert.throws(() => coulombActiveCoefficient(30, -1), InvalidInputError);
  assert.throws(() => coulombActiveCoefficient(30, 10, 0, 35), InvalidInputError);
  assert.throws(() => coulombActiveCoefficient(30, 10, 90), InvalidInputError);
  assert.throws(() => coulombPassiveCoefficient(30, 10, -95), InvalidInputError);
});

test("Coulomb rejects walls leaning past the friction angle", () => {
  assert.throws(() => coulombActiveCoefficient(30, 0, -60), DomainError);
  assert.throws(() => coulombActiveCoefficient(30, 0, -70), DomainError);
  assert.throws(() => coulombPassiveCoefficient(30, 0, 60), DomainError);
  assert.ok(coulombActiveCoefficient(30, 0, -55) > 0);
});

test("Coulomb passive fails when the wedge has no finite solution", () => {
  assert.throws(() => coulombPassiveCoefficient(45, 45, 0, 45), DomainError);
});

test("at-rest coefficients and loads", () => {
  near(atRestCoefficient(30), 0.5, 1e-12);
  near(atRestCoefficientOverconsolidated(30, 4), 1.0, 1e-12);
  near(atRestCoefficientOverconsolidated(30, 1), atRestCoefficient(30), 1e-12);
  near(atRestPressure(0.5, 18, 4), 36, 1e-12);
  near(atRestForce(0.5, 18, 4), 72, 1e-12);
  assert.throws(() => atRestCoefficientOverconsolidated(30, 0.5), InvalidInputError);
  assert.throws(() => atRestCoefficient(90), InvalidInputError);
});
