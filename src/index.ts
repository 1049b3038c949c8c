/**
 * geoformula library entry: closed-form geotechnical formulas, grouped by
 * namespace and also exported by name.
 */
export * as numeric from "./numeric.js";
export * as earthPressure from "./tools/geotech/earth-pressure.js";
export * as bearingCapacity from "./tools/geotech/bearing-capacity.js";
export * as settlement from "./tools/geotech/settlement.js";
export * as seepage from "./tools/geotech/seepage.js";
export * as soilPhase from "./tools/geotech/soil-phase.js";

export * from "./errors.js";
export * from "./numeric.js";
export * from "./tools/geotech/earth-pressure.js";
export * from "./tools/geotech/bearing-capacity.js";
export * from "./tools/geotech/settlement.js";
export * from "./tools/geotech/seepage.js";
export * from "./tools/geotech/soil-phase.js";
export { createAllToolDefinitions } from "./tools/index.js";
export type { ToolDefinition, ToolResult } from "./tools/index.js";
