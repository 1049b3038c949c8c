/**
 * Settlement and one-dimensional (Terzaghi) consolidation.
 *
 * Unit conventions are part of each contract: compressibility av and volume
 * compressibility mv are per MPa, the compression modulus Es and elastic
 * modulus in MPa, stresses in kPa, thicknesses in m, settlements in m.
 */
import { InvalidInputError } from "../../errors.js";
import { ensureFinite, round, safeExp, safeLn, safeSqrt } from "../../numeric.js";
import {
  requireGreaterThan,
  requireInRange,
  requireNonNegative,
  requirePositive,
} from "../../validate.js";
import { asArgs, enumArg, numberArg, numberListArg, optionalNumberArg } from "../args.js";
import { textResult, type ToolDefinition } from "../types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type Drainage = "single" | "double";

const DRAINAGE_TYPES: readonly Drainage[] = ["single", "double"];

/** early: U = 2 sqrt(Tv/pi); late: U = 1 - (8/pi^2) exp(-pi^2 Tv / 4) */
export type ConsolidationRegime = "early" | "late";

type SettlementMethod =
  | "layer_av"
  | "layer_es"
  | "compression_index"
  | "elastic"
  | "consolidation_final"
  | "time_rate"
  | "time_to_degree"
  | "total";

const METHODS: readonly SettlementMethod[] = [
  "layer_av",
  "layer_es",
  "compression_index",
  "elastic",
  "consolidation_final",
  "time_rate",
  "time_to_degree",
  "total",
];

// ─── Constants ───────────────────────────────────────────────────────────────

const KPA_PER_MPA = 1000;

/** Tv where the early and late curves intersect; U there is U_CROSSOVER. */
export const TV_CROSSOVER = 0.2130333;
const U_CROSSOVER = 2 * Math.sqrt(TV_CROSSOVER / Math.PI);

const DEFAULT_SERIES_TERMS = 100;

// ─── Layer settlement ────────────────────────────────────────────────────────

/** s = av * sigma_z * Hi / (1 + e0), av in 1/MPa, sigma_z in kPa */
export function settlementLayer(av: number, e0: number, sigma_z: number, Hi: number): number {
  requireNonNegative("av", av);
  requireGreaterThan("e0", e0, -1);
  requireNonNegative("sigma_z", sigma_z);
  requireNonNegative("Hi", Hi);
  return ensureFinite((av * (sigma_z / KPA_PER_MPA) * Hi) / (1 + e0), "settlementLayer");
}

/** s = (sigma_z / Es) * Hi, Es in MPa, sigma_z in kPa */
export function settlementLayerEs(Es: number, sigma_z: number, Hi: number): number {
  requirePositive("Es", Es);
  requireNonNegative("sigma_z", sigma_z);
  requireNonNegative("Hi", Hi);
  return ensureFinite((sigma_z / KPA_PER_MPA / Es) * Hi, "settlementLayerEs");
}

/** Normally consolidated clay: s = Cc H / (1 + e0) * log10((sigma0 + dSigma) / sigma0) */
export function settlementCompressionIndex(
  Cc: number,
  e0: number,
  H: number,
  sigma0: number,
  deltaSigma: number,
): number {
  requireNonNegative("Cc", Cc);
  requireGreaterThan("e0", e0, -1);
  requireNonNegative("H", H);
  requirePositive("sigma0", sigma0);
  requireNonNegative("deltaSigma", deltaSigma);
  const logRatio = safeLn((sigma0 + deltaSigma) / sigma0) / Math.LN10;
  return ensureFinite(((Cc * H) / (1 + e0)) * logRatio, "settlementCompressionIndex");
}

/** Immediate settlement of a flexible footing: s = q B (1 - nu^2) If / Es */
export function settlementElastic(q: number, B: number, Es: number, nu: number, If: number = 1): number {
  requireNonNegative("q", q);
  requirePositive("B", B);
  requirePositive("Es", Es);
  requireInRange("nu", nu, 0, 0.5, true);
  requirePositive("If", If);
  return ensureFinite((q * B * (1 - nu * nu) * If) / (Es * KPA_PER_MPA), "settlementElastic");
}

/** Layer-wise summation. */
export function totalSettlement(layers: readonly number[]): number {
  let total = 0;
  layers.forEach((s, idx) => {
    total += requireNonNegative(`layers[${idx}]`, s);
  });
  return ensureFinite(total, "totalSettlement");
}

// ─── Consolidation ───────────────────────────────────────────────────────────

/** Longest distance water travels to a drainage boundary. */
export function drainagePathLength(thickness: number, drainage: Drainage): number {
  requirePositive("thickness", thickness);
  return drainage === "double" ? thickness / 2 : thickness;
}

/** Tv = Cv t / H^2, H being the drainage path length */
export function timeFactor(Cv: number, t: number, H: number): number {
  requirePositive("Cv", Cv);
  requireNonNegative("t", t);
  requirePositive("H", H);
  return ensureFinite((Cv * t) / (H * H), "timeFactor");
}

function earlyDegree(Tv: number): number {
  return 2 * safeSqrt(Tv / Math.PI);
}

function lateDegree(Tv: number): number {
  return 1 - (8 / (Math.PI * Math.PI)) * safeExp((-Math.PI * Math.PI * Tv) / 4);
}

/**
 * Which curve applies at Tv. The early curve lies below the late one up to
 * their intersection (TV_CROSSOVER) and above it afterwards, so picking the
 * lower of the two keeps U continuous and non-decreasing.
 */
export function consolidationRegime(Tv: number): ConsolidationRegime {
  requireNonNegative("Tv", Tv);
  return earlyDegree(Tv) <= lateDegree(Tv) ? "early" : "late";
}

/** Average degree of consolidation U in [0, 1] for time factor Tv. */
export function consolidationDegree(Tv: number): number {
  const regime = consolidationRegime(Tv);
  const U = regime === "early" ? earlyDegree(Tv) : lateDegree(Tv);
  return ensureFinite(Math.min(1, Math.max(0, U)), "consolidationDegree");
}

/** U = 1 - sum 2/M^2 exp(-M^2 Tv), M = (2m + 1) pi / 2 */
export function consolidationDegreeSeries(Tv: number, terms: number = DEFAULT_SERIES_TERMS): number {
  requireNonNegative("Tv", Tv);
  if (!Number.isInteger(terms) || terms < 1) {
    throw new InvalidInputError("terms", terms, "must be a positive integer");
  }
  // sum 2/M^2 = 1 exactly; a truncated sum would leave U(0) slightly above 0
  if (Tv === 0) return 0;
  let sum = 0;
  for (let m = 0; m < terms; m++) {
    const M = ((2 * m + 1) * Math.PI) / 2;
    sum += (2 / (M * M)) * Math.exp(-M * M * Tv);
  }
  return ensureFinite(Math.min(1, Math.max(0, 1 - sum)), "consolidationDegreeSeries");
}

/** Inverse of consolidationDegree, 0 <= U < 1. */
export function timeFactorForDegree(U: number): number {
  requireInRange("U", U, 0, 1, true);
  if (U <= U_CROSSOVER) {
    return (Math.PI * U * U) / 4;
  }
  return ensureFinite((-4 / (Math.PI * Math.PI)) * safeLn(((Math.PI * Math.PI) / 8) * (1 - U)), "timeFactorForDegree");
}

/** t = Tv(U) H^2 / Cv, in the time unit Cv is expressed in */
export function timeForConsolidation(U: number, Cv: number, H: number): number {
  requirePositive("Cv", Cv);
  requirePositive("H", H);
  return ensureFinite((timeFactorForDegree(U) * H * H) / Cv, "timeForConsolidation");
}

/** s_inf = mv sigma_z H, mv in 1/MPa, sigma_z in kPa */
export function consolidationSettlementFinal(mv: number, sigma_z: number, H: number): number {
  requirePositive("mv", mv);
  requireNonNegative("sigma_z", sigma_z);
  requireNonNegative("H", H);
  return ensureFinite(mv * (sigma_z / KPA_PER_MPA) * H, "consolidationSettlementFinal");
}

/** s(t) = s_inf U(Tv) */
export function consolidationSettlementAtTime(finalSettlement: number, Tv: number): number {
  requireNonNegative("finalSettlement", finalSettlement);
  return ensureFinite(finalSettlement * consolidationDegree(Tv), "consolidationSettlementAtTime");
}

// ─── Tool definition ─────────────────────────────────────────────────────────

function drainagePath(params: Record<string, unknown>): number {
  const thickness = numberArg(params, "thickness_m");
  const drainage = params.drainage === undefined ? "double" : enumArg(params, "drainage", DRAINAGE_TYPES);
  return drainagePathLength(thickness, drainage);
}

function evaluate(method: SettlementMethod, params: Record<string, unknown>): Record<string, unknown> {
  switch (method) {
    case "layer_av": {
      const s = settlementLayer(
        numberArg(params, "av_per_mpa"),
        numberArg(params, "e0"),
        numberArg(params, "stress_kpa"),
        numberArg(params, "thickness_m"),
      );
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    case "layer_es": {
      const s = settlementLayerEs(
        numberArg(params, "es_mpa"),
        numberArg(params, "stress_kpa"),
        numberArg(params, "thickness_m"),
      );
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    case "compression_index": {
      const s = settlementCompressionIndex(
        numberArg(params, "cc"),
        numberArg(params, "e0"),
        numberArg(params, "thickness_m"),
        numberArg(params, "initial_stress_kpa"),
        numberArg(params, "stress_kpa"),
      );
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    case "elastic": {
      const s = settlementElastic(
        numberArg(params, "stress_kpa"),
        numberArg(params, "width_m"),
        numberArg(params, "es_mpa"),
        optionalNumberArg(params, "poisson_ratio") ?? 0.3,
        optionalNumberArg(params, "influence_factor") ?? 1,
      );
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    case "consolidation_final": {
      const s = consolidationSettlementFinal(
        numberArg(params, "mv_per_mpa"),
        numberArg(params, "stress_kpa"),
        numberArg(params, "thickness_m"),
      );
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    case "time_rate": {
      const H = drainagePath(params);
      const Tv = timeFactor(numberArg(params, "cv_m2_per_s"), numberArg(params, "time_s"), H);
      const U = consolidationDegree(Tv);
      const report: Record<string, unknown> = {
        method,
        drainage_path_m: H,
        time_factor: round(Tv, 5),
        degree_of_consolidation: round(U, 4),
        regime: consolidationRegime(Tv),
      };
      const finalSettlement = optionalNumberArg(params, "final_settlement_m");
      if (finalSettlement !== undefined) {
        report.settlement_at_time_m = round(consolidationSettlementAtTime(finalSettlement, Tv), 5);
      }
      return report;
    }
    case "time_to_degree": {
      const H = drainagePath(params);
      const U = numberArg(params, "degree");
      const t = timeForConsolidation(U, numberArg(params, "cv_m2_per_s"), H);
      return {
        method,
        drainage_path_m: H,
        time_factor: round(timeFactorForDegree(U), 5),
        time_s: round(t, 0),
        time_days: round(t / 86400, 1),
      };
    }
    case "total": {
      const s = totalSettlement(numberListArg(params, "layer_settlements_m"));
      return { method, settlement_m: round(s, 5), settlement_mm: round(s * 1000, 2) };
    }
    default: {
      const exhaustive: never = method;
      throw new InvalidInputError("method", exhaustive, "is not supported");
    }
  }
}

export function createSettlementToolDefinition(): ToolDefinition<{ method: SettlementMethod }> {
  return {
    name: "geotech_settlement",
    label: "Settlement & Consolidation",
    description:
      "Compute foundation settlement (compressibility coefficient, compression modulus, " +
      "compression index or elastic form), final consolidation settlement, Terzaghi time factor " +
      "and degree of consolidation, or the time to reach a given degree of consolidation.",
    parameters: {
      type: "object",
      properties: {
        method: {
          type: "string",
          enum: METHODS,
          description:
            "layer_av, layer_es, compression_index, elastic, consolidation_final, time_rate, time_to_degree or total.",
        },
        av_per_mpa: { type: "number", description: "Coefficient of compressibility av in 1/MPa (layer_av)." },
        mv_per_mpa: { type: "number", description: "Coefficient of volume compressibility mv in 1/MPa (consolidation_final)." },
        es_mpa: { type: "number", description: "Compression or elastic modulus in MPa (layer_es, elastic)." },
        cc: { type: "number", description: "Compression index Cc (compression_index)." },
        e0: { type: "number", description: "Initial void ratio." },
        stress_kpa: { type: "number", description: "Additional vertical stress (or footing pressure for elastic) in kPa." },
        initial_stress_kpa: { type: "number", description: "Initial effective vertical stress in kPa (compression_index)." },
        thickness_m: { type: "number", description: "Layer thickness in meters." },
        width_m: { type: "number", description: "Footing width in meters (elastic)." },
        poisson_ratio: { type: "number", description: "Poisson's ratio (elastic, default 0.3)." },
        influence_factor: { type: "number", description: "Influence factor If (elastic, default 1)." },
        drainage: {
          type: "string",
          enum: DRAINAGE_TYPES,
          description: "single or double drainage (time_rate, time_to_degree; default double).",
        },
        cv_m2_per_s: { type: "number", description: "Coefficient of consolidation Cv in m^2/s." },
        time_s: { type: "number", description: "Elapsed time in seconds (time_rate)." },
        degree: { type: "number", description: "Target degree of consolidation, 0 to <1 (time_to_degree)." },
        final_settlement_m: { type: "number", description: "Final consolidation settlement in m (time_rate, optional)." },
        layer_settlements_m: {
          type: "array",
          items: { type: "number" },
          description: "Per-layer settlements in m to sum (total).",
        },
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
