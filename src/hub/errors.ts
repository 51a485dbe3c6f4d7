/**
 * Hub Module - Error Types
 *
 * Errors raised while talking to thermostats through the UH1 hub.
 * Errors are values, not exceptions.
 */

/**
 * All possible errors from a device exchange.
 *
 * TIMEOUT, IO_ERROR and NOT_CONNECTED are transport failures and may succeed
 * on retry. The others describe the exchange itself and never do.
 */
export type DeviceError =
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "IO_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "CRC_MISMATCH";
      readonly message: string;
      readonly expected: number;
      readonly actual: number;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_VALUE";
      readonly message: string;
      readonly value: number | string;
    }
  | {
      readonly type: "UNSUPPORTED";
      readonly message: string;
    }
  | {
      readonly type: "UNEXPECTED";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Hub configuration could not be resolved.
 */
export type HubConfigError = {
  readonly type: "INVALID_HUB_CONFIG";
  readonly message: string;
};

// =============================================================================
// Error Factory Functions
// =============================================================================

export function timeout(message: string, timeoutMs: number): DeviceError {
  return { type: "TIMEOUT", message, timeoutMs };
}

export function ioError(message: string, cause?: Error): DeviceError {
  if (cause) {
    return { type: "IO_ERROR", message, cause };
  }
  return { type: "IO_ERROR", message };
}

export function notConnected(message: string): DeviceError {
  return { type: "NOT_CONNECTED", message };
}

export function crcMismatch(expected: number, actual: number): DeviceError {
  return {
    type: "CRC_MISMATCH",
    message: "Response checksum does not match",
    expected,
    actual,
  };
}

export function invalidResponse(message: string): DeviceError {
  return { type: "INVALID_RESPONSE", message };
}

export function invalidValue(
  message: string,
  value: number | string,
): DeviceError {
  return { type: "INVALID_VALUE", message, value };
}

export function unsupported(message: string): DeviceError {
  return { type: "UNSUPPORTED", message };
}

export function unexpected(message: string, cause?: Error): DeviceError {
  if (cause) {
    return { type: "UNEXPECTED", message, cause };
  }
  return { type: "UNEXPECTED", message };
}

export function invalidHubConfig(message: string): HubConfigError {
  return { type: "INVALID_HUB_CONFIG", message };
}

// =============================================================================
// Classification
// =============================================================================

/**
 * True for failures of the link itself (timeouts, port I/O, closed port).
 */
export function isTransientDeviceError(error: DeviceError): boolean {
  return (
    error.type === "TIMEOUT" ||
    error.type === "IO_ERROR" ||
    error.type === "NOT_CONNECTED"
  );
}

/**
 * Format a DeviceError for logging.
 */
export function formatDeviceError(error: DeviceError): string {
  switch (error.type) {
    case "TIMEOUT":
      return `Hub timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "IO_ERROR":
      return `Hub I/O error: ${error.message}`;
    case "NOT_CONNECTED":
      return `Hub not connected: ${error.message}`;
    case "CRC_MISMATCH":
      return `CRC mismatch (expected 0x${hex16(error.expected)}, got 0x${hex16(error.actual)}): ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid thermostat response: ${error.message}`;
    case "INVALID_VALUE":
      return `Invalid value ${error.value}: ${error.message}`;
    case "UNSUPPORTED":
      return `Unsupported operation: ${error.message}`;
    case "UNEXPECTED":
      return `Unexpected error: ${error.message}`;
  }
}

function hex16(value: number): string {
  return value.toString(16).padStart(4, "0");
}
