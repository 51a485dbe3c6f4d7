/**
 * Discovery Module - Public API
 */

export type {
  ClimateDiscoveryPayload,
  DiscoveryOptions,
  SwitchDiscoveryPayload,
} from "./schema.js";

export { publishDiscovery } from "./service.js";

export {
  buildClimateDiscovery,
  buildHotWaterDiscovery,
  capitalize,
  discoveryMessages,
} from "./transform.js";
