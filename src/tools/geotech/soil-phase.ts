/**
 * Soil phase relationships. Water content and degree of saturation are
 * percentages everywhere in this module; unit weights are kN/m^3.
 */
import { InvalidInputError } from "../../errors.js";
import { GAMMA_WATER, ensureFinite, round } from "../../numeric.js";
import { requireGreaterThan, requireInRange, requireNonNegative, requirePositive } from "../../validate.js";
import { asArgs, enumArg, numberArg, optionalNumberArg } from "../args.js";
import { textResult, type ToolDefinition } from "../types.js";

type SoilPhaseMethod = "from_porosity" | "from_void_ratio" | "from_volumes" | "from_masses" | "unit_weights";

const METHODS: readonly SoilPhaseMethod[] = [
  "from_porosity",
  "from_void_ratio",
  "from_volumes",
  "from_masses",
  "unit_weights",
];

/** e = n / (1 - n) */
export function voidRatio(n: number): number {
  requireInRange("n", n, 0, 1, true);
  return ensureFinite(n / (1 - n), "voidRatio");
}

/** n = e / (1 + e) */
export function porosity(e: number): number {
  requireNonNegative("e", e);
  return ensureFinite(e / (1 + e), "porosity");
}

/** S = Vw / Vv * 100 (%) */
export function degreeOfSaturation(Vw: number, Vv: number): number {
  requirePositive("Vv", Vv);
  requireInRange("Vw", Vw, 0, Vv);
  return ensureFinite((Vw / Vv) * 100, "degreeOfSaturation");
}

/** rho_d = rho / (1 + w/100) */
export function dryDensity(rho: number, w: number): number {
  requirePositive("rho", rho);
  requireNonNegative("w", w);
  return ensureFinite(rho / (1 + w / 100), "dryDensity");
}

/** w = Ww / Ws * 100 (%) */
export function waterContent(Ww: number, Ws: number): number {
  requireNonNegative("Ww", Ww);
  requirePositive("Ws", Ws);
  return ensureFinite((Ww / Ws) * 100, "waterContent");
}

/** Se = w Gs, with S and w in percent */
export function voidRatioFromPhases(w: number, Gs: number, S: number): number {
  requireNonNegative("w", w);
  requirePositive("Gs", Gs);
  requireInRange("S", S, 0, 100);
  if (S === 0) {
    throw new InvalidInputError("S", S, "must be greater than 0");
  }
  return ensureFinite(((w / 100) * Gs) / (S / 100), "voidRatioFromPhases");
}

function requireGsAndE(Gs: number, e: number): void {
  requirePositive("Gs", Gs);
  requireNonNegative("e", e);
}

/** gamma_d = Gs gamma_w / (1 + e) */
export function dryUnitWeight(Gs: number, e: number, gammaW: number = GAMMA_WATER): number {
  requireGsAndE(Gs, e);
  requirePositive("gammaW", gammaW);
  return ensureFinite((Gs * gammaW) / (1 + e), "dryUnitWeight");
}

/** gamma_sat = (Gs + e) gamma_w / (1 + e) */
export function saturatedUnitWeight(Gs: number, e: number, gammaW: number = GAMMA_WATER): number {
  requireGsAndE(Gs, e);
  requirePositive("gammaW", gammaW);
  return ensureFinite(((Gs + e) * gammaW) / (1 + e), "saturatedUnitWeight");
}

/** gamma = (Gs + S e / 100) gamma_w / (1 + e) */
export function bulkUnitWeight(Gs: number, e: number, S: number, gammaW: number = GAMMA_WATER): number {
  requireGsAndE(Gs, e);
  requireInRange("S", S, 0, 100);
  requirePositive("gammaW", gammaW);
  return ensureFinite(((Gs + (S / 100) * e) * gammaW) / (1 + e), "bulkUnitWeight");
}

/** gamma' = gamma_sat - gamma_w */
export function submergedUnitWeight(gammaSat: number, gammaW: number = GAMMA_WATER): number {
  requirePositive("gammaW", gammaW);
  requireGreaterThan("gammaSat", gammaSat, gammaW);
  return ensureFinite(gammaSat - gammaW, "submergedUnitWeight");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

function evaluate(method: SoilPhaseMethod, params: Record<string, unknown>): Record<string, unknown> {
  switch (method) {
    case "from_porosity": {
      const n = numberArg(params, "porosity");
      return { method, porosity: n, void_ratio: round(voidRatio(n), 4) };
    }
    case "from_void_ratio": {
      const e = numberArg(params, "void_ratio");
      return { method, void_ratio: e, porosity: round(porosity(e), 4) };
    }
    case "from_volumes": {
      const S = degreeOfSaturation(numberArg(params, "water_volume"), numberArg(params, "void_volume"));
      return { method, degree_of_saturation_pct: round(S, 2) };
    }
    case "from_masses": {
      const w = waterContent(numberArg(params, "water_mass"), numberArg(params, "solids_mass"));
      const report: Record<string, unknown> = { method, water_content_pct: round(w, 2) };
      const rho = optionalNumberArg(params, "bulk_density");
      if (rho !== undefined) report.dry_density = round(dryDensity(rho, w), 4);
      return report;
    }
    case "unit_weights": {
      const Gs = numberArg(params, "specific_gravity");
      const e = numberArg(params, "void_ratio");
      const S = optionalNumberArg(params, "degree_of_saturation_pct");
      const gammaSat = saturatedUnitWeight(Gs, e);
      const report: Record<string, unknown> = {
        method,
        dry_unit_weight_kn_m3: round(dryUnitWeight(Gs, e), 3),
        saturated_unit_weight_kn_m3: round(gammaSat, 3),
        submerged_unit_weight_kn_m3: round(submergedUnitWeight(gammaSat), 3),
      };
      if (S !== undefined) report.bulk_unit_weight_kn_m3 = round(bulkUnitWeight(Gs, e, S), 3);
      return report;
    }
    default: {
      const exhaustive: never = method;
      throw new InvalidInputError("method", exhaustive, "is not supported");
    }
  }
}

export function createSoilPhaseToolDefinition(): ToolDefinition<{ method: SoilPhaseMethod }> {
  return {
    name: "geotech_soil_phase",
    label: "Soil Phase Relationships",
    description:
      "Convert between porosity and void ratio, compute degree of saturation, water content, " +
      "dry density and dry/saturated/submerged/bulk unit weights.",
    parameters: {
      type: "object",
      properties: {
        method: {
          type: "string",
          enum: METHODS,
          description: "from_porosity, from_void_ratio, from_volumes, from_masses or unit_weights.",
        },
        porosity: { type: "number", description: "Porosity n, 0 to <1." },
        void_ratio: { type: "number", description: "Void ratio e." },
        water_volume: { type: "number", description: "Volume of water Vw (any consistent unit)." },
        void_volume: { type: "number", description: "Volume of voids Vv (same unit as water_volume)." },
        water_mass: { type: "number", description: "Mass of water Ww." },
        solids_mass: { type: "number", description: "Mass of solids Ws (same unit as water_mass)." },
        bulk_density: { type: "number", description: "Bulk density rho (from_masses, optional)." },
        specific_gravity: { type: "number", description: "Specific gravity of solids Gs." },
        degree_of_saturation_pct: { type: "number", description: "Degree of saturation in percent (unit_weights, optional)." },
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
