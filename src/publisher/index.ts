/**
 * Publisher Module - Public API
 */

export type {
  HotWaterEntry,
  MessagePublisher,
  OutboundMessage,
  PollResults,
  StatePublisher,
  ZoneAction,
  ZoneMode,
  ZoneOverrides,
  ZoneState,
} from "./schema.js";

export { PollResultsSchema, ZONE_ATTRIBUTES, ZoneStateSchema } from "./schema.js";

export { createStatePublisher } from "./service.js";
export type { StatePublisherDeps } from "./service.js";

export {
  deriveAction,
  deriveMode,
  hotWaterStateMessage,
  pollResultMessages,
  readZoneState,
  selectTemperature,
  snapshotZone,
  stateTopic,
  zoneStateMessages,
} from "./transform.js";
