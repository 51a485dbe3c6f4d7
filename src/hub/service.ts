/**
 * Hub Module - Service Layer
 *
 * Byte-level access to the UH1 hub over a serial device (serialport) or a TCP
 * serial server (node:net). One request is in flight at a time; callers are
 * serialized by the transport arbiter.
 */
import { Socket } from "node:net";
import { type Result, err, ok } from "neverthrow";
import { SerialPort } from "serialport";

import { createLogger } from "../logger.js";
import { type DeviceError, invalidResponse, ioError, notConnected, timeout } from "./errors.js";
import {
  type HubConfig,
  type HubConnection,
  type HubConnectionOptions,
  MAX_FRAME_LENGTH,
  MIN_FRAME_LENGTH,
} from "./schema.js";
import { describeHubConfig, expectedFrameLength } from "./transform.js";

const log = createLogger("hub");

/**
 * Minimal duplex byte stream shared by the serial and socket back ends.
 */
type ByteStream = Readonly<{
  isOpen: () => boolean;
  open: () => Promise<void>;
  write: (data: Uint8Array) => Promise<void>;
  close: () => Promise<void>;
}>;

type StreamEvents = Readonly<{
  onData: (chunk: Buffer) => void;
  onClose: () => void;
}>;

type PendingResponse = {
  resolve: (result: Result<Uint8Array, DeviceError>) => void;
  timer: ReturnType<typeof setTimeout>;
};

// =============================================================================
// Connection
// =============================================================================

/**
 * Create an unopened connection to the hub.
 */
export function createHubConnection(
  config: HubConfig,
  options: HubConnectionOptions,
): HubConnection {
  const target = describeHubConfig(config);
  let rxBuffer: Buffer = Buffer.alloc(0);
  let pending: PendingResponse | null = null;

  const settle = (result: Result<Uint8Array, DeviceError>): void => {
    if (!pending) return;
    const { resolve, timer } = pending;
    pending = null;
    clearTimeout(timer);
    resolve(result);
  };

  const events: StreamEvents = {
    onData: (chunk) => {
      if (!pending) {
        log.debug({ bytes: chunk.length }, "Discarding unsolicited hub data");
        return;
      }

      rxBuffer = Buffer.concat([rxBuffer, chunk]);
      const length = expectedFrameLength(rxBuffer);
      if (length === null) return;

      if (length < MIN_FRAME_LENGTH || length > MAX_FRAME_LENGTH) {
        settle(err(invalidResponse(`Implausible frame length ${length}`)));
        return;
      }

      if (rxBuffer.length >= length) {
        const frame = Uint8Array.from(rxBuffer.subarray(0, length));
        rxBuffer = Buffer.alloc(0);
        settle(ok(frame));
      }
    },
    onClose: () => {
      settle(err(ioError("Hub connection closed during exchange")));
    },
  };

  const stream =
    config.kind === "serial"
      ? createSerialStream(config, events)
      : createSocketStream(config, options.connectTimeoutMs, events);

  const waitForFrame = (): Promise<Result<Uint8Array, DeviceError>> =>
    new Promise((resolve) => {
      const timer = setTimeout(() => {
        settle(
          err(
            timeout(
              `No complete response from ${target}`,
              options.responseTimeoutMs,
            ),
          ),
        );
      }, options.responseTimeoutMs);
      pending = { resolve, timer };
    });

  return {
    target,
    isOpen: () => stream.isOpen(),

    async open() {
      if (stream.isOpen()) {
        return ok(true);
      }
      log.info({ target }, "Opening hub connection...");
      try {
        await stream.open();
        log.info({ target }, "Hub connection opened");
        return ok(true);
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        log.error({ target, error: cause.message }, "Failed to open hub connection");
        return err(ioError(`Cannot open ${target}: ${cause.message}`, cause));
      }
    },

    async close() {
      settle(err(notConnected("Hub connection closed")));
      if (!stream.isOpen()) return;
      log.info({ target }, "Closing hub connection");
      await stream.close();
    },

    async exchange(request) {
      if (!stream.isOpen()) {
        return err(notConnected(`${target} is not open`));
      }
      if (pending) {
        return err(ioError("Another exchange is already in flight"));
      }

      rxBuffer = Buffer.alloc(0);
      const response = waitForFrame();

      try {
        await stream.write(request);
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        settle(err(ioError(`Write to ${target} failed: ${cause.message}`, cause)));
      }

      return response;
    },
  };
}

// =============================================================================
// Serial Back End
// =============================================================================

function createSerialStream(
  config: Extract<HubConfig, { kind: "serial" }>,
  events: StreamEvents,
): ByteStream {
  const port = new SerialPort({
    path: config.path,
    baudRate: config.baudRate,
    dataBits: 8,
    parity: "none",
    stopBits: 1,
    autoOpen: false,
  });

  port.on("data", events.onData);
  port.on("close", events.onClose);
  port.on("error", (error: Error) => {
    log.warn({ path: config.path, error: error.message }, "Serial port error");
  });

  return {
    isOpen: () => port.isOpen,

    open: () =>
      new Promise<void>((resolve, reject) => {
        port.open((error) => (error ? reject(error) : resolve()));
      }),

    write: (data) =>
      new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(data), (writeError) => {
          if (writeError) {
            reject(writeError);
            return;
          }
          port.drain((drainError) => (drainError ? reject(drainError) : resolve()));
        });
      }),

    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
          resolve();
          return;
        }
        port.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

// =============================================================================
// Socket Back End
// =============================================================================

function createSocketStream(
  config: Extract<HubConfig, { kind: "socket" }>,
  connectTimeoutMs: number,
  events: StreamEvents,
): ByteStream {
  let socket: Socket | null = null;
  let connected = false;

  const attach = (current: Socket): void => {
    current.setNoDelay(true);
    current.on("data", events.onData);
    current.on("close", () => {
      // A socket we already let go of must not fail the next exchange
      if (socket !== current) return;
      connected = false;
      events.onClose();
    });
    current.on("error", (error: Error) => {
      log.warn(
        { host: config.host, port: config.port, error: error.message },
        "Hub socket error",
      );
    });
  };

  return {
    isOpen: () => connected,

    open: () =>
      new Promise<void>((resolve, reject) => {
        const current = new Socket();
        socket = current;
        attach(current);

        const timer = setTimeout(() => {
          cleanup();
          socket = null;
          current.destroy();
          reject(new Error(`Connect timed out after ${connectTimeoutMs}ms`));
        }, connectTimeoutMs);
        const cleanup = (): void => {
          clearTimeout(timer);
          current.off("error", onError);
          current.off("connect", onConnect);
        };
        const onError = (error: Error): void => {
          cleanup();
          socket = null;
          current.destroy();
          reject(error);
        };
        const onConnect = (): void => {
          cleanup();
          connected = true;
          resolve();
        };

        current.once("error", onError);
        current.once("connect", onConnect);
        current.connect(config.port, config.host);
      }),

    write: (data) =>
      new Promise<void>((resolve, reject) => {
        if (!socket) {
          reject(new Error("Socket is not open"));
          return;
        }
        socket.write(data, (error) => (error ? reject(error) : resolve()));
      }),

    // Resolves once our FIN is flushed; the peer is not waited on
    close: () =>
      new Promise<void>((resolve) => {
        const current = socket;
        socket = null;
        connected = false;
        if (!current || current.destroyed) {
          resolve();
          return;
        }
        current.end(() => {
          current.destroy();
          resolve();
        });
      }),
  };
}
