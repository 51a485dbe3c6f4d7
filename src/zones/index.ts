/**
 * Zones Module - Public API
 */

export type {
  HotWaterZone,
  SensorKind,
  Zone,
  ZoneEntry,
  ZoneFile,
  ZoneRegistry,
} from "./schema.js";

export { HOT_WATER_KEY, ZoneFileSchema } from "./schema.js";

export { formatZoneConfigError } from "./errors.js";
export type { ZoneConfigError } from "./errors.js";

export { loadZoneRegistry } from "./service.js";

export { buildZoneRegistry, parseZoneFile } from "./transform.js";
