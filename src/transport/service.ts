/**
 * Transport Module - Service Layer
 *
 * The transport arbiter owns the single hub connection. Every hub exchange
 * runs under one exclusive lock, one attempt per acquisition. Transient
 * failures are retried a bounded number of times; when they run out the
 * connection is rebuilt from the startup configuration and the operation gets
 * one more attempt.
 *
 * Reconnect takes the lock itself, strictly after the failing attempt has
 * released it. The lock is not reentrant, so it must never run inside an
 * attempt.
 */
import { Mutex } from "async-mutex";
import { type Result, err, ok } from "neverthrow";

import {
  type DeviceError,
  formatDeviceError,
  isTransientDeviceError,
  unexpected,
} from "../hub/errors.js";
import type { HubConnectionFactory } from "../hub/schema.js";
import { createLogger } from "../logger.js";
import { type TransportError, exhausted, operationFailed } from "./errors.js";
import type {
  HubOperation,
  RetryPolicy,
  TransportArbiter,
  TransportArbiterOptions,
} from "./schema.js";

const log = createLogger("transport");

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Create the arbiter. `createConnection` closes over the immutable startup
 * configuration and is called again on every reconnect.
 */
export function createTransportArbiter(
  createConnection: HubConnectionFactory,
  options: TransportArbiterOptions,
): TransportArbiter {
  const lock = new Mutex();
  let connection = createConnection();

  const runAttempt = <T>(
    operation: HubOperation<T>,
  ): Promise<Result<T, DeviceError>> =>
    lock.runExclusive(async () => {
      try {
        return await operation(connection);
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        return err(unexpected(`Hub operation threw: ${cause.message}`, cause));
      }
    });

  const reconnect = (): Promise<boolean> =>
    lock.runExclusive(async () => {
      log.warn({ target: connection.target }, "Reconnecting to hub...");

      try {
        await connection.close();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.debug({ error: message }, "Ignoring error while closing hub connection");
      }

      await sleep(options.reconnectDelayMs);

      connection = createConnection();
      const opened = await connection.open();
      if (opened.isErr()) {
        log.error(
          { target: connection.target, error: formatDeviceError(opened.error) },
          "Reconnect to hub failed",
        );
        return false;
      }

      log.info({ target: connection.target }, "Reconnected to hub");
      return true;
    });

  return {
    open: () =>
      lock.runExclusive(async () => {
        const opened = await connection.open();
        if (opened.isErr()) {
          log.warn(
            { target: connection.target, error: formatDeviceError(opened.error) },
            "Initial hub connection failed; will retry on first command",
          );
        }
      }),

    async execute<T>(
      operation: HubOperation<T>,
      policy: RetryPolicy,
    ): Promise<Result<T, TransportError>> {
      const totalAttempts = Math.max(0, policy.maxRetries) + 1;

      let attempt = 1;
      let result = await runAttempt(operation);

      while (
        result.isErr() &&
        isTransientDeviceError(result.error) &&
        attempt < totalAttempts
      ) {
        log.warn(
          { attempt, of: totalAttempts, error: formatDeviceError(result.error) },
          "Hub command failed, retrying",
        );
        await sleep(policy.retryDelayMs);
        attempt++;
        result = await runAttempt(operation);
      }

      if (result.isOk()) {
        return ok(result.value);
      }
      if (!isTransientDeviceError(result.error)) {
        return err(operationFailed(result.error));
      }

      log.warn(
        { attempt, of: totalAttempts, error: formatDeviceError(result.error) },
        "Hub command failed on last attempt",
      );

      const reopened = await reconnect();
      if (!reopened) {
        return err(exhausted(totalAttempts, result.error));
      }

      const final = await runAttempt(operation);
      if (final.isOk()) {
        return ok(final.value);
      }
      if (!isTransientDeviceError(final.error)) {
        return err(operationFailed(final.error));
      }
      return err(exhausted(totalAttempts + 1, final.error));
    },

    reconnect,

    isOpen: () => connection.isOpen(),

    close: () => lock.runExclusive(() => connection.close()),
  };
}
