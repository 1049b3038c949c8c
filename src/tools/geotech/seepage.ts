/**
 * Groundwater seepage: Darcy flow, hydraulic gradients and the piping
 * (heave) check against the critical gradient.
 */
import { GAMMA_WATER, ensureFinite, round } from "../../numeric.js";
import {
  requireFinite,
  requireGreaterThan,
  requireInRange,
  requireNonNegative,
  requirePositive,
} from "../../validate.js";
import { asArgs, enumArg, numberArg, optionalNumberArg } from "../args.js";
import { textResult, type ToolDefinition } from "../types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

type SeepageMethod = "darcy" | "piping";

const METHODS: readonly SeepageMethod[] = ["darcy", "piping"];

// ─── Darcy flow ──────────────────────────────────────────────────────────────

/** v = k i (discharge velocity, m/s) */
export function darcyVelocity(k: number, i: number): number {
  requirePositive("k", k);
  requireFinite("i", i);
  return ensureFinite(k * i, "darcyVelocity");
}

/** Q = k i A (m^3/s) */
export function darcyFlowRate(k: number, i: number, A: number): number {
  requireNonNegative("A", A);
  return ensureFinite(darcyVelocity(k, i) * A, "darcyFlowRate");
}

/** i = dh / L */
export function hydraulicGradient(deltaH: number, L: number): number {
  requireFinite("deltaH", deltaH);
  requirePositive("L", L);
  return ensureFinite(deltaH / L, "hydraulicGradient");
}

/** Average velocity through the pores: vs = v / n */
export function seepageVelocity(v: number, n: number): number {
  requireFinite("v", v);
  requireInRange("n", n, 0, 1, true);
  requireGreaterThan("n", n, 0);
  return ensureFinite(v / n, "seepageVelocity");
}

/** Seepage force on a soil volume: J = i gamma_w V (kN) */
export function seepageForce(i: number, V: number, gammaW: number = GAMMA_WATER): number {
  requireFinite("i", i);
  requireNonNegative("V", V);
  requirePositive("gammaW", gammaW);
  return ensureFinite(i * gammaW * V, "seepageForce");
}

// ─── Piping ──────────────────────────────────────────────────────────────────

/** icr = (Gs - 1) / (1 + e) */
export function criticalHydraulicGradient(Gs: number, e: number): number {
  requireGreaterThan("Gs", Gs, 1);
  requireGreaterThan("e", e, -1);
  return ensureFinite((Gs - 1) / (1 + e), "criticalHydraulicGradient");
}

/** icr = gamma' / gamma_w = (gamma_sat - gamma_w) / gamma_w */
export function criticalGradientFromUnitWeight(gammaSat: number, gammaW: number = GAMMA_WATER): number {
  requirePositive("gammaW", gammaW);
  requireGreaterThan("gammaSat", gammaSat, gammaW);
  return ensureFinite((gammaSat - gammaW) / gammaW, "criticalGradientFromUnitWeight");
}

/** Threshold decision: piping occurs once the exit gradient reaches icr. */
export function isPiping(i: number, icr: number): boolean {
  requireFinite("i", i);
  requireFinite("icr", icr);
  return i >= icr;
}

/** Fs = icr / i */
export function pipingSafetyFactor(i: number, icr: number): number {
  requirePositive("i", i);
  requireNonNegative("icr", icr);
  return ensureFinite(icr / i, "pipingSafetyFactor");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

function gradientFrom(params: Record<string, unknown>): number {
  const direct = optionalNumberArg(params, "gradient");
  if (direct !== undefined) return direct;
  return hydraulicGradient(numberArg(params, "head_loss_m"), numberArg(params, "flow_length_m"));
}

function evaluate(method: SeepageMethod, params: Record<string, unknown>): Record<string, unknown> {
  const i = gradientFrom(params);

  if (method === "darcy") {
    const k = numberArg(params, "permeability_m_s");
    const A = optionalNumberArg(params, "area_m2");
    const n = optionalNumberArg(params, "porosity");
    const v = darcyVelocity(k, i);
    const report: Record<string, unknown> = { method, hydraulic_gradient: round(i, 4), darcy_velocity_m_s: v };
    if (A !== undefined) report.flow_rate_m3_s = darcyFlowRate(k, i, A);
    if (n !== undefined) report.seepage_velocity_m_s = seepageVelocity(v, n);
    return report;
  }

  const icr = criticalHydraulicGradient(numberArg(params, "specific_gravity"), numberArg(params, "void_ratio"));
  const piping = isPiping(i, icr);
  return {
    method,
    hydraulic_gradient: round(i, 4),
    critical_gradient: round(icr, 4),
    factor_of_safety: i > 0 ? round(pipingSafetyFactor(i, icr), 3) : null,
    piping,
    status: piping ? "FAIL" : "PASS",
  };
}

export function createSeepageToolDefinition(): ToolDefinition<{ method: SeepageMethod }> {
  return {
    name: "geotech_seepage",
    label: "Seepage & Piping",
    description:
      "Compute Darcy discharge velocity, flow rate and seepage velocity, or check an exit " +
      "gradient against the critical hydraulic gradient for piping/heave.",
    parameters: {
      type: "object",
      properties: {
        method: {
          type: "string",
          enum: METHODS,
          description: "darcy (flow) or piping (critical gradient check).",
        },
        gradient: { type: "number", description: "Hydraulic gradient i (or give head_loss_m and flow_length_m)." },
        head_loss_m: { type: "number", description: "Head loss in meters." },
        flow_length_m: { type: "number", description: "Flow path length in meters." },
        permeability_m_s: { type: "number", description: "Hydraulic conductivity k in m/s (darcy)." },
        area_m2: { type: "number", description: "Cross-sectional flow area in m^2 (darcy, optional)." },
        porosity: { type: "number", description: "Porosity n, 0 to <1 (darcy, optional)." },
        specific_gravity: { type: "number", description: "Specific gravity of solids Gs (piping)." },
        void_ratio: { type: "number", description: "Void ratio e (piping)." },
      },
      required: ["method"],
    },
    execute: async (_toolCallId: string, args: unknown) => {
      const params = asArgs(args);
      const method = enumArg(params, "method", METHODS);
      return textResult(evaluate(method, params), { method });
    },
  };
}
