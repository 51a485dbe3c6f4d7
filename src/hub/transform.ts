/**
 * Hub Module - Pure Transformations
 *
 * Configuration resolution and frame boundary detection.
 */
import { type Result, err, ok } from "neverthrow";

import { type HubConfigError, invalidHubConfig } from "./errors.js";
import type { HubConfig, HubEnv } from "./schema.js";

const SOCKET_SCHEMES = new Set(["socket:", "tcp:"]);

/**
 * Resolve the hub connection from configuration.
 *
 * A serial device wins over a URL, a URL over host and port.
 */
export function resolveHubConfig(
  env: HubEnv,
): Result<HubConfig, HubConfigError> {
  if (env.HUB_DEVICE) {
    return ok({ kind: "serial", path: env.HUB_DEVICE, baudRate: env.HUB_BAUD_RATE });
  }

  if (env.HUB_URL) {
    return parseSocketUrl(env.HUB_URL);
  }

  if (env.HUB_HOST && env.HUB_PORT !== undefined) {
    return ok({ kind: "socket", host: env.HUB_HOST, port: env.HUB_PORT });
  }

  return err(
    invalidHubConfig("Provide HUB_DEVICE, HUB_URL or HUB_HOST and HUB_PORT"),
  );
}

/**
 * Parse a serial server URL such as `socket://10.0.0.5:1024`.
 */
export function parseSocketUrl(url: string): Result<HubConfig, HubConfigError> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return err(invalidHubConfig(`Malformed hub URL: ${url}`));
  }

  if (!SOCKET_SCHEMES.has(parsed.protocol)) {
    return err(
      invalidHubConfig(`Unsupported hub URL scheme: ${parsed.protocol}`),
    );
  }

  const port = Number(parsed.port);
  if (parsed.hostname === "" || !Number.isInteger(port) || port <= 0) {
    return err(invalidHubConfig(`Hub URL needs a host and port: ${url}`));
  }

  return ok({ kind: "socket", host: parsed.hostname, port });
}

/**
 * Human-readable connection target for logs.
 */
export function describeHubConfig(config: HubConfig): string {
  return config.kind === "serial"
    ? `${config.path}@${config.baudRate}`
    : `${config.host}:${config.port}`;
}

/**
 * Declared length of the frame at the start of `buffer`, or null while the
 * length bytes have not arrived yet. Bytes 1-2 carry it, low byte first.
 */
export function expectedFrameLength(buffer: Uint8Array): number | null {
  if (buffer.length < 3) {
    return null;
  }
  return (buffer[1] ?? 0) | ((buffer[2] ?? 0) << 8);
}
