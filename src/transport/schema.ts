/**
 * Transport Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { DeviceError } from "../hub/errors.js";
import type { HubConnection } from "../hub/schema.js";
import type { TransportError } from "./errors.js";

/**
 * A unit of hub work. Receives the arbiter's current connection for the
 * duration of one attempt and must not keep it.
 */
export type HubOperation<T> = (
  hub: HubConnection,
) => Promise<Result<T, DeviceError>>;

export type RetryPolicy = Readonly<{
  /** Retries after the first failed attempt */
  maxRetries: number;
  /** Pause between attempts, spent outside the lock */
  retryDelayMs: number;
}>;

export type TransportArbiterOptions = Readonly<{
  /** Pause between closing and reopening the hub */
  reconnectDelayMs: number;
}>;

export type TransportArbiter = Readonly<{
  /** Open the initial connection. Failures are logged; execute() recovers. */
  open: () => Promise<void>;
  /** Run `operation` under the transport lock with retry and reconnect */
  execute: <T>(
    operation: HubOperation<T>,
    policy: RetryPolicy,
  ) => Promise<Result<T, TransportError>>;
  /** Replace the connection with a fresh one; true when it opened */
  reconnect: () => Promise<boolean>;
  isOpen: () => boolean;
  close: () => Promise<void>;
}>;
