import test from "node:test";
import assert from "node:assert/strict";
import {
  bulkUnitWeight,
  degreeOfSaturation,
  dryDensity,
  dryUnitWeight,
  porosity,
  saturatedUnitWeight,
  submergedUnitWeight,
  voidRatio,
  voidRatioFromPhases,
  waterContent,
} from "../src/tools/geotech/soil-phase.js";
import { InvalidInputError } from "../src/errors.js";

const near = (actual: number, expected: number, tol: number) =>
  assert.ok(Math.abs(actual - expected) <= tol, `expected ${expected} +/- ${tol}, got ${actual}`);

test("void ratio and porosity", () => {
  near(voidRatio(0.25), 1 / 3, 1e-12);
  near(porosity(0.5), 1 / 3, 1e-12);
  assert.equal(voidRatio(0), 0);
  assert.throws(() => voidRatio(1), InvalidInputError);
  assert.throws(() => voidRatio(-0.1), InvalidInputError);
  assert.throws(() => porosity(-0.2), InvalidInputError);
});

test("porosity(voidRatio(n)) returns n", () => {
  for (let step = 1; step < 100; step++) {
    const n = step / 100;
    near(porosity(voidRatio(n)), n, 1e-12);
  }
});

test("degree of saturation is a percentage", () => {
  assert.equal(degreeOfSaturation(0.3, 0.6), 50);
  assert.equal(degreeOfSaturation(0, 0.6), 0);
  assert.equal(degreeOfSaturation(0.6, 0.6), 100);
  assert.throws(() => degreeOfSaturation(0.7, 0.6), InvalidInputError);
  assert.throws(() => degreeOfSaturation(0.1, 0), InvalidInputError);
});

test("water content and dry density", () => {
  assert.equal(waterContent(25, 100), 25);
  near(dryDensity(1.9, 20), 1.9 / 1.2, 1e-12);
  assert.equal(dryDensity(1.9, 0), 1.9);
  assert.throws(() => dryDensity(0, 20), InvalidInputError);
  assert.throws(() => dryDensity(1.9, -5), InvalidInputError);
  assert.throws(() => waterContent(25, 0), InvalidInputError);
});

test("void ratio from water content, Gs and saturation", () => {
  near(voidRatioFromPhases(20, 2.7, 100), 0.54, 1e-12);
  assert.throws(() => voidRatioFromPhases(20, 2.7, 0), InvalidInputError);
});

test("unit weights", () => {
  near(dryUnitWeight(2.7, 0.7), 15.5806, 0.0001);
  near(saturatedUnitWeight(2.7, 0.7), 19.6200, 0.0001);
  near(bulkUnitWeight(2.7, 0.7, 50), 17.6003, 0.0001);
  near(bulkUnitWeight(2.7, 0.7, 100), saturatedUnitWeight(2.7, 0.7), 1e-12);
  near(submergedUnitWeight(19.62), 9.81, 1e-12);
  assert.throws(() => submergedUnitWeight(9), InvalidInputError);
  assert.throws(() => bulkUnitWeight(2.7, 0.7, 120), InvalidInputError);
});
