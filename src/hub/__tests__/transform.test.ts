/**
 * Hub Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  formatDeviceError,
  ioError,
  invalidResponse,
  isTransientDeviceError,
  notConnected,
  timeout,
  unexpected,
} from "../errors.js";
import {
  describeHubConfig,
  expectedFrameLength,
  parseSocketUrl,
  resolveHubConfig,
} from "../transform.js";

// =============================================================================
// resolveHubConfig Tests
// =============================================================================

describe("resolveHubConfig", () => {
  it("prefers the serial device", () => {
    const result = resolveHubConfig({
      HUB_DEVICE: "/dev/ttyUSB0",
      HUB_URL: "socket://10.0.0.5:1024",
      HUB_BAUD_RATE: 4800,
    });

    expect(result._unsafeUnwrap()).toEqual({
      kind: "serial",
      path: "/dev/ttyUSB0",
      baudRate: 4800,
    });
  });

  it("uses the URL when no device is set", () => {
    const result = resolveHubConfig({
      HUB_URL: "socket://10.0.0.5:1024",
      HUB_HOST: "ignored.local",
      HUB_PORT: 9,
      HUB_BAUD_RATE: 4800,
    });

    expect(result._unsafeUnwrap()).toEqual({ kind: "socket", host: "10.0.0.5", port: 1024 });
  });

  it("falls back to host and port", () => {
    const result = resolveHubConfig({
      HUB_HOST: "uh1.local",
      HUB_PORT: 2000,
      HUB_BAUD_RATE: 4800,
    });

    expect(result._unsafeUnwrap()).toEqual({ kind: "socket", host: "uh1.local", port: 2000 });
  });

  it("fails without any connection setting", () => {
    const result = resolveHubConfig({ HUB_HOST: "uh1.local", HUB_BAUD_RATE: 4800 });

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_HUB_CONFIG");
  });
});

describe("parseSocketUrl", () => {
  it("accepts the tcp scheme", () => {
    expect(parseSocketUrl("tcp://uh1.local:2000")._unsafeUnwrap()).toEqual({
      kind: "socket",
      host: "uh1.local",
      port: 2000,
    });
  });

  it("rejects other schemes", () => {
    expect(parseSocketUrl("http://uh1.local:2000").isErr()).toBe(true);
  });

  it("rejects a URL without a port", () => {
    expect(parseSocketUrl("socket://uh1.local").isErr()).toBe(true);
  });

  it("rejects a malformed URL", () => {
    expect(parseSocketUrl("not a url").isErr()).toBe(true);
  });
});

describe("describeHubConfig", () => {
  it("describes both connection kinds", () => {
    expect(describeHubConfig({ kind: "serial", path: "/dev/ttyUSB0", baudRate: 4800 })).toBe(
      "/dev/ttyUSB0@4800",
    );
    expect(describeHubConfig({ kind: "socket", host: "10.0.0.5", port: 1024 })).toBe(
      "10.0.0.5:1024",
    );
  });
});

// =============================================================================
// expectedFrameLength Tests
// =============================================================================

describe("expectedFrameLength", () => {
  it("returns null until the length bytes arrive", () => {
    expect(expectedFrameLength(Uint8Array.from([0x81, 7]))).toBeNull();
  });

  it("reads the little-endian length", () => {
    expect(expectedFrameLength(Uint8Array.from([0x81, 0x36, 0x01]))).toBe(310);
  });
});

// =============================================================================
// Error Classification Tests
// =============================================================================

describe("isTransientDeviceError", () => {
  it("treats link failures as transient", () => {
    expect(isTransientDeviceError(timeout("no reply", 1000))).toBe(true);
    expect(isTransientDeviceError(ioError("write failed"))).toBe(true);
    expect(isTransientDeviceError(notConnected("port closed"))).toBe(true);
  });

  it("treats protocol and logic failures as permanent", () => {
    expect(isTransientDeviceError(invalidResponse("bad frame"))).toBe(false);
    expect(isTransientDeviceError(unexpected("boom"))).toBe(false);
  });
});

describe("formatDeviceError", () => {
  it("includes the timeout", () => {
    expect(formatDeviceError(timeout("No response", 1000))).toBe(
      "Hub timeout after 1000ms: No response",
    );
  });
});
