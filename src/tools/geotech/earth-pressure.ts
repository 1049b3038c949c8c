/**
 * Lateral earth pressure: Rankine, Coulomb and at-rest coefficients, pressures
 * and resultant forces on retaining walls.
 *
 * Angles are in degrees, unit weights in kN/m^3, depths in m, pressures in kPa
 * and forces in kN per metre run of wall.
 */
import { DomainError, InvalidInputError } from "../../errors.js";
import { cosDeg, ensureFinite, round, safeSqrt, sinDeg, tanDeg } from "../../numeric.js";
import {
  requireFinite,
  requireFrictionAngle,
  requireInRange,
  requireNonNegative,
  requirePositive,
} from "../../validate.js";
import { asArgs, enumArg, numberArg, optionalNumberArg } from "../args.js";
import { textResult, type ToolDefinition } from "../types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

type EarthPressureMethod = "rankine" | "coulomb" | "at_rest";

const METHODS: readonly EarthPressureMethod[] = ["rankine", "coulomb", "at_rest"];

interface EarthPressureReport {
  method: EarthPressureMethod;
  active_coefficient?: number;
  passive_coefficient?: number;
  at_rest_coefficient?: number;
  active_pressure_at_base_kpa?: number;
  passive_pressure_at_base_kpa?: number;
  at_rest_pressure_at_base_kpa?: number;
  active_force_kn_per_m?: number;
  passive_force_kn_per_m?: number;
  at_rest_force_kn_per_m?: number;
  tension_crack_depth_m?: number;
}

// ─── Rankine ─────────────────────────────────────────────────────────────────

/** Ka = tan^2(45 - phi/2) */
export function rankineActiveCoefficient(phi_deg: number): number {
  requireFrictionAngle(phi_deg);
  return ensureFinite(Math.pow(tanDeg(45 - phi_deg / 2), 2), "rankineActiveCoefficient");
}

/** Kp = tan^2(45 + phi/2) */
export function rankinePassiveCoefficient(phi_deg: number): number {
  requireFrictionAngle(phi_deg);
  return ensureFinite(Math.pow(tanDeg(45 + phi_deg / 2), 2), "rankinePassiveCoefficient");
}

function linearPressure(K: number, gamma: number, z: number): number {
  requirePositive("K", K);
  requirePositive("gamma", gamma);
  requireNonNegative("z", z);
  return K * gamma * z;
}

/** Resultant of a triangular distribution K*gamma*z over 0..H. */
function triangularForce(K: number, gamma: number, H: number): number {
  requirePositive("K", K);
  requirePositive("gamma", gamma);
  requireNonNegative("H", H);
  return 0.5 * K * gamma * H * H;
}

/** sigma_a = Ka * gamma * z */
export function rankineActivePressure(Ka: number, gamma: number, z: number): number {
  return ensureFinite(linearPressure(Ka, gamma, z), "rankineActivePressure");
}

/** Pa = 0.5 * Ka * gamma * H^2, acting at H/3 above the base */
export function rankineActiveForce(Ka: number, gamma: number, H: number): number {
  return ensureFinite(triangularForce(Ka, gamma, H), "rankineActiveForce");
}

export function rankinePassivePressure(Kp: number, gamma: number, z: number): number {
  return ensureFinite(linearPressure(Kp, gamma, z), "rankinePassivePressure");
}

export function rankinePassiveForce(Kp: number, gamma: number, H: number): number {
  return ensureFinite(triangularForce(Kp, gamma, H), "rankinePassiveForce");
}

/**
 * Active pressure in a c-phi soil: Ka*gamma*z - 2c*sqrt(Ka). Within the tension
 * crack the wall carries no pressure, so the result is floored at 0.
 */
export function rankineActivePressureCohesive(Ka: number, gamma: number, z: number, c: number): number {
  requireNonNegative("c", c);
  const sigma = linearPressure(Ka, gamma, z) - 2 * c * safeSqrt(Ka);
  return ensureFinite(Math.max(0, sigma), "rankineActivePressureCohesive");
}

/** Kp*gamma*z + 2c*sqrt(Kp) */
export function rankinePassivePressureCohesive(Kp: number, gamma: number, z: number, c: number): number {
  requireNonNegative("c", c);
  return ensureFinite(linearPressure(Kp, gamma, z) + 2 * c * safeSqrt(Kp), "rankinePassivePressureCohesive");
}

/** z_c = 2c / (gamma * sqrt(Ka)) */
export function tensionCrackDepth(Ka: number, gamma: number, c: number): number {
  requirePositive("Ka", Ka);
  requirePositive("gamma", gamma);
  requireNonNegative("c", c);
  return ensureFinite((2 * c) / (gamma * safeSqrt(Ka)), "tensionCrackDepth");
}

// ─── Coulomb ─────────────────────────────────────────────────────────────────

/*
 * theta: inclination of the wall back from the vertical.
 * beta: backfill slope from the horizontal.
 * delta: wall-soil interface friction, 0 <= delta <= phi.
 */

function validateCoulombAngles(phi_deg: number, delta_deg: number, theta_deg: number, beta_deg: number): void {
  requireFrictionAngle(phi_deg);
  requireInRange("delta_deg", delta_deg, 0, phi_deg);
  requireFinite("theta_deg", theta_deg);
  if (Math.abs(theta_deg) >= 90) {
    throw new InvalidInputError("theta_deg", theta_deg, "must be in (-90, 90)");
  }
  requireInRange("beta_deg", beta_deg, -phi_deg, phi_deg);
}

/**
 * Ka = cos^2(phi - theta) /
 *      [cos^2(theta) cos(delta + theta) (1 + sqrt(sin(phi + delta) sin(phi - beta) /
 *       (cos(delta + theta) cos(theta - beta))))^2]
 */
export function coulombActiveCoefficient(
  phi_deg: number,
  delta_deg: number,
  theta_deg: number = 0,
  beta_deg: number = 0,
): number {
  validateCoulombAngles(phi_deg, delta_deg, theta_deg, beta_deg);

  if (phi_deg - theta_deg >= 90) {
    throw new DomainError("coulombActiveCoefficient", "phi - theta must stay below 90 degrees");
  }
  const cosDeltaTheta = cosDeg(delta_deg + theta_deg);
  const cosThetaBeta = cosDeg(theta_deg - beta_deg);
  if (cosDeltaTheta <= 0 || cosThetaBeta <= 0) {
    throw new DomainError("coulombActiveCoefficient", "wall and backfill angles leave no sliding wedge");
  }

  const root = safeSqrt((sinDeg(phi_deg + delta_deg) * sinDeg(phi_deg - beta_deg)) / (cosDeltaTheta * cosThetaBeta));
  const cosTheta = cosDeg(theta_deg);
  const denominator = cosTheta * cosTheta * cosDeltaTheta * Math.pow(1 + root, 2);
  return ensureFinite(Math.pow(cosDeg(phi_deg - theta_deg), 2) / denominator, "coulombActiveCoefficient");
}

/**
 * Kp = cos^2(phi + theta) /
 *      [cos^2(theta) cos(delta - theta) (1 - sqrt(sin(phi + delta) sin(phi + beta) /
 *       (cos(delta - theta) cos(beta - theta))))^2]
 */
export function coulombPassiveCoefficient(
  phi_deg: number,
  delta_deg: number,
  theta_deg: number = 0,
  beta_deg: number = 0,
): number {
  validateCoulombAngles(phi_deg, delta_deg, theta_deg, beta_deg);

  if (phi_deg + theta_deg >= 90) {
    throw new DomainError("coulombPassiveCoefficient", "phi + theta must stay below 90 degrees");
  }
  const cosDeltaTheta = cosDeg(delta_deg - theta_deg);
  const cosBetaTheta = cosDeg(beta_deg - theta_deg);
  if (cosDeltaTheta <= 0 || cosBetaTheta <= 0) {
    throw new DomainError("coulombPassiveCoefficient", "wall and backfill angles leave no sliding wedge");
  }

  const root = safeSqrt((sinDeg(phi_deg + delta_deg) * sinDeg(phi_deg + beta_deg)) / (cosDeltaTheta * cosBetaTheta));
  if (root >= 1) {
    throw new DomainError("coulombPassiveCoefficient", "passive wedge has no finite solution for these angles");
  }
  const cosTheta = cosDeg(theta_deg);
  const denominator = cosTheta * cosTheta * cosDeltaTheta * Math.pow(1 - root, 2);
  return ensureFinite(Math.pow(cosDeg(phi_deg + theta_deg), 2) / denominator, "coulombPassiveCoefficient");
}

/** Pa = 0.5 * Ka * gamma * H^2, inclined at delta to the wall normal */
export function coulombActiveForce(Ka: number, gamma: number, H: number): number {
  return ensureFinite(triangularForce(Ka, gamma, H), "coulombActiveForce");
}

// ─── At rest ─────────────────────────────────────────────────────────────────

/** Jaky: K0 = 1 - sin(phi) */
export function atRestCoefficient(phi_deg: number): number {
  requireFrictionAngle(phi_deg);
  return ensureFinite(1 - sinDeg(phi_deg), "atRestCoefficient");
}

/** Mayne & Kulhawy: K0 = (1 - sin(phi)) * OCR^sin(phi) */
export function atRestCoefficientOverconsolidated(phi_deg: number, ocr: number): number {
  requireFrictionAngle(phi_deg);
  requireFinite("ocr", ocr);
  if (ocr < 1) {
    throw new InvalidInputError("ocr", ocr, "must be 1 or greater");
  }
  const sinPhi = sinDeg(phi_deg);
  return ensureFinite((1 - sinPhi) * Math.pow(ocr, sinPhi), "atRestCoefficientOverconsolidated");
}

export function atRestPressure(K0: number, gamma: number, z: number): number {
  return ensureFinite(linearPressure(K0, gamma, z), "atRestPressure");
}

export function atRestForce(K0: number, gamma: number, H: number): number {
  return ensureFinite(triangularForce(K0, gamma, H), "atRestForce");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

function evaluate(method: EarthPressureMethod, args: Record<string, unknown>): EarthPressureReport {
  const phi = numberArg(args, "phi_deg");
  const gamma = numberArg(args, "unit_weight_kn_m3");
  const H = numberArg(args, "height_m");

  if (method === "at_rest") {
    const ocr = optionalNumberArg(args, "ocr");
    const K0 = ocr === undefined ? atRestCoefficient(phi) : atRestCoefficientOverconsolidated(phi, ocr);
    return {
      method,
      at_rest_coefficient: round(K0, 4),
      at_rest_pressure_at_base_kpa: round(atRestPressure(K0, gamma, H), 2),
      at_rest_force_kn_per_m: round(atRestForce(K0, gamma, H), 2),
    };
  }

  if (method === "coulomb") {
    const delta = optionalNumberArg(args, "wall_friction_deg") ?? 0;
    const theta = optionalNumberArg(args, "wall_inclination_deg") ?? 0;
    const beta = optionalNumberArg(args, "backfill_slope_deg") ?? 0;
    const Ka = coulombActiveCoefficient(phi, delta, theta, beta);
    const Kp = coulombPassiveCoefficient(phi, delta, theta, beta);
    return {
      method,
      active_coefficient: round(Ka, 4),
      passive_coefficient: round(Kp, 4),
      active_force_kn_per_m: round(coulombActiveForce(Ka, gamma, H), 2),
      passive_force_kn_per_m: round(rankinePassiveForce(Kp, gamma, H), 2),
    };
  }

  const c = optionalNumberArg(args, "cohesion_kpa") ?? 0;
  const Ka = rankineActiveCoefficient(phi);
  const Kp = rankinePassiveCoefficient(phi);
  const report: EarthPressureReport = {
    method,
    active_coefficient: round(Ka, 4),
    passive_coefficient: round(Kp, 4),
    active_pressure_at_base_kpa: round(rankineActivePressureCohesive(Ka, gamma, H, c), 2),
    passive_pressure_at_base_kpa: round(rankinePassivePressureCohesive(Kp, gamma, H, c), 2),
    active_force_kn_per_m: round(rankineActiveForce(Ka, gamma, H), 2),
    passive_force_kn_per_m: round(rankinePassiveForce(Kp, gamma, H), 2),
  };
  if (c > 0) {
    report.tension_crack_depth_m = round(tensionCrackDepth(Ka, gamma, c), 3);
  }
  return report;
}

export function createEarthPressureToolDefinition(): ToolDefinition<{ method: EarthPressureMethod }> {
  return {
    name: "geotech_earth_pressure",
    label: "Lateral Earth Pressure",
    description:
      "Compute lateral earth pressure coefficients, base pressures and resultant forces on a " +
      "retaining wall using Rankine (optionally with cohesion), Coulomb (wall friction, wall " +
      "inclination, sloping backfill) or at-rest (Jaky, optional OCR) theory.",
    parameters: {
      type: "object",
      properties: {
        method: {
          type: "string",
          enum: METHODS,
          description: "Theory to apply: rankine, coulomb or at_rest.",
        },
        phi_deg: {
          type: "number",
          description: "Soil internal friction angle in degrees (0 to <90).",
        },
        unit_weight_kn_m3: {
          type: "number",
          description: "Soil unit weight in kN/m^3.",
        },
        height_m: {
          type: "number",
          description: "Retained height in meters.",
        },
        cohesion_kpa: {
          type: "number",
          description: "Soil cohesion in kPa (rankine only, default 0).",
        },
        wall_friction_deg: {
          type: "number",
          description: "Wall-soil friction angle delta in degrees, 0 to phi (coulomb only, default 0).",
        },
        wall_inclination_deg: {
          type: "number",
          description: "Inclination of the wall back from vertical in degrees (coulomb only, default 0).",
        },
        backfill_slope_deg: {
          type: "number",
          description: "Backfill slope from horizontal in degrees, at most phi (coulomb only, default 0).",
        },
        ocr: {
          type: "number",
          description: "Overconsolidation ratio, 1 or greater (at_rest only, optional).",
        },
      },
      required: ["method", "phi_deg", "unit_weight_kn_m3", "height_m"],
    },
    execute: async (_toolCallId: string, args: unknown) => {
      const params = asArgs(args);
      const method = enumArg(params, "method", METHODS);
      const report = evaluate(method, params);
      return textResult(report, { method });
    },
  };
}
