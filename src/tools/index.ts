/**
 * Barrel file — exports all tool definitions for geoformula.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Geotechnical ───────────────────────────────────────────────────────────
import { createEarthPressureToolDefinition } from "./geotech/earth-pressure.js";
import { createBearingCapacityToolDefinition } from "./geotech/bearing-capacity.js";
import { createSettlementToolDefinition } from "./geotech/settlement.js";
import { createSeepageToolDefinition } from "./geotech/seepage.js";
import { createSoilPhaseToolDefinition } from "./geotech/soil-phase.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export {
  createEarthPressureToolDefinition,
  createBearingCapacityToolDefinition,
  createSettlementToolDefinition,
  createSeepageToolDefinition,
  createSoilPhaseToolDefinition,
};

export type { ToolDefinition, ToolResult } from "./types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    createEarthPressureToolDefinition(),
    createBearingCapacityToolDefinition(),
    createSettlementToolDefinition(),
    createSeepageToolDefinition(),
    createSoilPhaseToolDefinition(),
  ];
}
