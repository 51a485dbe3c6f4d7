/**
 * Transport Module - Error Types
 *
 * Outcomes of an arbitrated hub operation that did not produce a value.
 */
import { type DeviceError, formatDeviceError } from "../hub/errors.js";

export type TransportError =
  | {
      /** Every attempt and the post-reconnect attempt failed transiently */
      readonly type: "EXHAUSTED";
      readonly attempts: number;
      readonly lastError: DeviceError;
    }
  | {
      /** A non-transient failure; never retried */
      readonly type: "OPERATION_FAILED";
      readonly cause: DeviceError;
    };

export function exhausted(attempts: number, lastError: DeviceError): TransportError {
  return { type: "EXHAUSTED", attempts, lastError };
}

export function operationFailed(cause: DeviceError): TransportError {
  return { type: "OPERATION_FAILED", cause };
}

/**
 * Format a TransportError for logging.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "EXHAUSTED":
      return `Failed to communicate with hub after ${error.attempts} attempts: ${formatDeviceError(error.lastError)}`;
    case "OPERATION_FAILED":
      return formatDeviceError(error.cause);
  }
}
