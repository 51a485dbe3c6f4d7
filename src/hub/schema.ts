/**
 * Hub Module - Schemas and Types
 *
 * The UH1 hub is a half-duplex RS-485 bridge. It is reached either through a
 * local serial device or through a TCP serial server.
 */
import type { Result } from "neverthrow";

import type { DeviceError } from "./errors.js";

/**
 * Connection parameters captured at startup.
 */
export type HubConfig =
  | Readonly<{
      kind: "serial";
      path: string;
      baudRate: number;
    }>
  | Readonly<{
      kind: "socket";
      host: string;
      port: number;
    }>;

/**
 * Environment fields the hub configuration is resolved from.
 */
export type HubEnv = Readonly<{
  HUB_DEVICE?: string | undefined;
  HUB_URL?: string | undefined;
  HUB_HOST?: string | undefined;
  HUB_PORT?: number | undefined;
  HUB_BAUD_RATE: number;
}>;

export type HubConnectionOptions = Readonly<{
  /** Time to wait for a complete response frame */
  responseTimeoutMs: number;
  /** Time allowed for the TCP connect to a serial server */
  connectTimeoutMs: number;
}>;

/**
 * Opaque handle to the hub. Only the transport arbiter opens, closes or
 * replaces it; operations receive it for the duration of one attempt.
 */
export type HubConnection = Readonly<{
  /** Human-readable target, e.g. "/dev/ttyUSB0" or "10.0.0.5:1024" */
  target: string;
  isOpen: () => boolean;
  open: () => Promise<Result<true, DeviceError>>;
  close: () => Promise<void>;
  /** Write one request frame and resolve with one complete response frame */
  exchange: (request: Uint8Array) => Promise<Result<Uint8Array, DeviceError>>;
}>;

/**
 * Creates a fresh, unopened connection from the startup configuration.
 */
export type HubConnectionFactory = () => HubConnection;

/**
 * Smallest valid response (a write acknowledgement).
 */
export const MIN_FRAME_LENGTH = 7;

/**
 * Largest response the hub produces (a full DCB read with headers).
 */
export const MAX_FRAME_LENGTH = 512;
