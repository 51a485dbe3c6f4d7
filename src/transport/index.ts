/**
 * Transport Module - Public API
 *
 * Exclusive, retrying access to the hub connection.
 */

export type {
  HubOperation,
  RetryPolicy,
  TransportArbiter,
  TransportArbiterOptions,
} from "./schema.js";

export { exhausted, formatTransportError, operationFailed } from "./errors.js";
export type { TransportError } from "./errors.js";

export { createTransportArbiter } from "./service.js";
