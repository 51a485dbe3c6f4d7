/**
 * Heatmiser Module - Public API
 *
 * Heatmiser V3 thermostat driver: frames, DCB decoding and per-zone handles.
 */

// Types and constants
export type {
  HotWaterState,
  RunMode,
  Thermostat,
  ThermostatModel,
  ThermostatReading,
} from "./schema.js";

export { DCB, FRAME, THERMOSTAT_MODELS } from "./schema.js";

// Service functions
export { createThermostat } from "./service.js";
export type { ThermostatOptions } from "./service.js";

// Pure transformations (for testing)
export {
  buildReadFrame,
  buildWriteFrame,
  crc16,
  decodeTemperature,
  parseDcb,
  parseModel,
  parseReadResponse,
  parseWriteAck,
  supportsHotWater,
  verifyFrame,
} from "./transform.js";
