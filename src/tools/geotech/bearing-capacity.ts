/**
 * Shallow foundation bearing capacity per Terzaghi's theory.
 *
 * Factors follow Terzaghi's closed form for Nq (log-spiral failure zone) and
 * Nc = (Nq - 1) cot(phi); Ngamma uses the 2 (Nq + 1) tan(phi) fit.
 * Cohesion and pressures in kPa, unit weight in kN/m^3, widths in m.
 */
import { ensureFinite, round, safeExp, tanDeg, sinDeg, degToRad } from "../../numeric.js";
import { requireInRange, requireNonNegative, requirePositive } from "../../validate.js";
import { asArgs, enumArg, numberArg, optionalNumberArg } from "../args.js";
import { textResult, type ToolDefinition } from "../types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type FootingShape = "strip" | "square" | "circular";

const FOOTING_SHAPES: readonly FootingShape[] = ["strip", "square", "circular"];

export interface BearingCapacityFactors {
  readonly Nc: number;
  readonly Nq: number;
  readonly Ngamma: number;
}

interface BearingCapacityReport {
  footing_shape: FootingShape;
  factors: BearingCapacityFactors;
  overburden_kpa: number;
  ultimate_capacity_kpa: number;
  allowable_capacity_kpa: number;
  factor_of_safety_target: number;
  applied_pressure_kpa?: number;
  factor_of_safety?: number;
  status?: "PASS" | "FAIL";
}

// ─── Constants ───────────────────────────────────────────────────────────────

/** Terzaghi's factors are tabulated up to 50 degrees. */
const PHI_MAX_DEG = 50;

/** lim phi->0 of (Nq - 1) cot(phi) = 1 + 3*pi/2 (the classical 5.7) */
const NC_COHESIVE = 1 + (3 * Math.PI) / 2;

/** Shape multipliers on the cohesion and self-weight terms. */
const SHAPE_FACTORS: Record<FootingShape, { sc: number; sgamma: number }> = {
  strip: { sc: 1.0, sgamma: 0.5 },
  square: { sc: 1.3, sgamma: 0.4 },
  circular: { sc: 1.3, sgamma: 0.3 },
};

const DEFAULT_FACTOR_OF_SAFETY = 3.0;

// ─── Terzaghi factors ────────────────────────────────────────────────────────

function requireBearingPhi(phi_deg: number): number {
  return requireInRange("phi_deg", phi_deg, 0, PHI_MAX_DEG);
}

/**
 * ln Nq. With 2 cos^2(45 + phi/2) = 1 - sin(phi) this is
 * 2 (3*pi/4 - phi/2) tan(phi) - ln(1 - sin(phi)), which stays exact near 0
 * where Nq - 1 would otherwise cancel.
 */
function terzaghiLnNq(phi_deg: number): number {
  const phi = degToRad(phi_deg);
  return 2 * (0.75 * Math.PI - phi / 2) * tanDeg(phi_deg) - Math.log1p(-sinDeg(phi_deg));
}

/** Nq = a^2 / (2 cos^2(45 + phi/2)), a = exp((3*pi/4 - phi/2) tan(phi)) */
export function terzaghiNq(phi_deg: number): number {
  requireBearingPhi(phi_deg);
  return ensureFinite(safeExp(terzaghiLnNq(phi_deg)), "terzaghiNq");
}

/** Nc = (Nq - 1) cot(phi), 5.71 for phi = 0 */
export function terzaghiNc(phi_deg: number): number {
  requireBearingPhi(phi_deg);
  if (phi_deg === 0) {
    return NC_COHESIVE;
  }
  return ensureFinite(Math.expm1(terzaghiLnNq(phi_deg)) / tanDeg(phi_deg), "terzaghiNc");
}

/** Ngamma = 2 (Nq + 1) tan(phi), 0 for phi = 0 */
export function terzaghiNgamma(phi_deg: number): number {
  requireBearingPhi(phi_deg);
  return ensureFinite(2 * (terzaghiNq(phi_deg) + 1) * tanDeg(phi_deg), "terzaghiNgamma");
}

export function terzaghiFactors(phi_deg: number): BearingCapacityFactors {
  return {
    Nc: terzaghiNc(phi_deg),
    Nq: terzaghiNq(phi_deg),
    Ngamma: terzaghiNgamma(phi_deg),
  };
}

// ─── Capacity ────────────────────────────────────────────────────────────────

/** q = gamma * Df, the overburden at founding level */
export function overburdenPressure(gamma: number, Df: number): number {
  requirePositive("gamma", gamma);
  requireNonNegative("Df", Df);
  return ensureFinite(gamma * Df, "overburdenPressure");
}

/**
 * Ultimate capacity with Terzaghi's shape multipliers:
 *   strip    c Nc     + q Nq + 0.5 gamma B Ngamma
 *   square   1.3 c Nc + q Nq + 0.4 gamma B Ngamma
 *   circular 1.3 c Nc + q Nq + 0.3 gamma B Ngamma   (B = diameter)
 */
export function terzaghiBearingCapacityShaped(
  shape: FootingShape,
  c: number,
  q: number,
  gamma: number,
  B: number,
  phi_deg: number,
): number {
  requireNonNegative("c", c);
  requireNonNegative("q", q);
  requirePositive("gamma", gamma);
  requirePositive("B", B);
  const { Nc, Nq, Ngamma } = terzaghiFactors(phi_deg);
  const { sc, sgamma } = SHAPE_FACTORS[shape];
  return ensureFinite(sc * c * Nc + q * Nq + sgamma * gamma * B * Ngamma, "terzaghiBearingCapacity");
}

/** Strip footing: qu = c Nc + q Nq + 0.5 gamma B Ngamma */
export function terzaghiBearingCapacity(c: number, q: number, gamma: number, B: number, phi_deg: number): number {
  return terzaghiBearingCapacityShaped("strip", c, q, gamma, B, phi_deg);
}

/** Allowable capacity qa = qu / Fs */
export function bearingCapacityDesign(qu: number, Fs: number): number {
  requireNonNegative("qu", qu);
  requirePositive("Fs", Fs);
  return ensureFinite(qu / Fs, "bearingCapacityDesign");
}

export function bearingFactorOfSafety(qu: number, qApplied: number): number {
  requireNonNegative("qu", qu);
  requirePositive("qApplied", qApplied);
  return ensureFinite(qu / qApplied, "bearingFactorOfSafety");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

function evaluate(params: Record<string, unknown>): BearingCapacityReport {
  const shape = params.footing_shape === undefined ? "strip" : enumArg(params, "footing_shape", FOOTING_SHAPES);
  const phi = numberArg(params, "phi_deg");
  const c = optionalNumberArg(params, "cohesion_kpa") ?? 0;
  const gamma = numberArg(params, "unit_weight_kn_m3");
  const B = numberArg(params, "width_m");
  const Df = optionalNumberArg(params, "depth_m") ?? 0;
  const Fs = optionalNumberArg(params, "factor_of_safety") ?? DEFAULT_FACTOR_OF_SAFETY;
  const applied = optionalNumberArg(params, "applied_pressure_kpa");

  const factors = terzaghiFactors(phi);
  const q = overburdenPressure(gamma, Df);
  const qu = terzaghiBearingCapacityShaped(shape, c, q, gamma, B, phi);
  const qa = bearingCapacityDesign(qu, Fs);

  const report: BearingCapacityReport = {
    footing_shape: shape,
    factors: {
      Nc: round(factors.Nc, 2),
      Nq: round(factors.Nq, 2),
      Ngamma: round(factors.Ngamma, 2),
    },
    overburden_kpa: round(q, 2),
    ultimate_capacity_kpa: round(qu, 2),
    allowable_capacity_kpa: round(qa, 2),
    factor_of_safety_target: Fs,
  };

  if (applied !== undefined) {
    const fos = bearingFactorOfSafety(qu, applied);
    report.applied_pressure_kpa = applied;
    report.factor_of_safety = round(fos, 2);
    report.status = fos >= Fs ? "PASS" : "FAIL";
  }
  return report;
}

export function createBearingCapacityToolDefinition(): ToolDefinition<{ footing_shape: FootingShape; status?: "PASS" | "FAIL" }> {
  return {
    name: "geotech_bearing_capacity",
    label: "Terzaghi Bearing Capacity",
    description:
      "Compute Terzaghi bearing capacity factors (Nc, Nq, Ngamma), ultimate and allowable " +
      "bearing capacity for strip, square or circular shallow footings, and optionally check an " +
      "applied pressure against the target factor of safety.",
    parameters: {
      type: "object",
      properties: {
        footing_shape: {
          type: "string",
          enum: FOOTING_SHAPES,
          description: "Footing shape: strip, square or circular (default strip).",
        },
        phi_deg: {
          type: "number",
          description: "Soil friction angle in degrees (0 to 50).",
        },
        cohesion_kpa: {
          type: "number",
          description: "Soil cohesion in kPa (default 0).",
        },
        unit_weight_kn_m3: {
          type: "number",
          description: "Soil unit weight in kN/m^3.",
        },
        width_m: {
          type: "number",
          description: "Footing width B in meters (diameter for circular footings).",
        },
        depth_m: {
          type: "number",
          description: "Embedment depth Df in meters (default 0).",
        },
        factor_of_safety: {
          type: "number",
          description: "Target factor of safety for the allowable capacity (default 3).",
        },
        applied_pressure_kpa: {
          type: "number",
          description: "Applied foundation pressure in kPa to check (optional).",
        },
      },
      required: ["phi_deg", "unit_weight_kn_m3", "width_m"],
    },
    execute: async (_toolCallId: string, args: unknown) => {
      const report = evaluate(asArgs(args));
      return textResult(report, { footing_shape: report.footing_shape, status: report.status });
    },
  };
}
