/**
 * Bridge Module - Public API
 */

export type { Bridge, BridgeOptions, CommandTopic } from "./schema.js";

export { formatCommandParseError } from "./errors.js";
export type { CommandParseError } from "./errors.js";

export { createBridge } from "./service.js";
export type { BridgeDeps } from "./service.js";

export {
  commandTopics,
  parseCommandTopic,
  parseHotWaterPayload,
  parseModePayload,
  parseTargetPayload,
} from "./transform.js";
