/**
 * Hub Module - Public API
 *
 * Connection to the UH1 hub and the device error vocabulary shared by the
 * driver and the transport arbiter.
 */

// Types
export type {
  HubConfig,
  HubConnection,
  HubConnectionFactory,
  HubConnectionOptions,
  HubEnv,
} from "./schema.js";

// Errors
export {
  crcMismatch,
  formatDeviceError,
  invalidHubConfig,
  invalidResponse,
  invalidValue,
  ioError,
  isTransientDeviceError,
  notConnected,
  timeout,
  unexpected,
  unsupported,
} from "./errors.js";
export type { DeviceError, HubConfigError } from "./errors.js";

// Service functions
export { createHubConnection } from "./service.js";

// Pure transformations (for testing)
export {
  describeHubConfig,
  expectedFrameLength,
  parseSocketUrl,
  resolveHubConfig,
} from "./transform.js";
