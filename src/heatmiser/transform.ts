/**
 * Heatmiser Module - Pure Transformations
 *
 * V3 frame building, checksum and DCB decoding.
 * No side effects, no I/O - just bytes in, values out.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type DeviceError,
  crcMismatch,
  invalidResponse,
} from "../hub/errors.js";
import {
  DCB,
  FRAME,
  HOT_WATER_WRITE_VALUE,
  type HotWaterState,
  MIN_DCB_LENGTH,
  SENSOR_ABSENT,
  THERMOSTAT_MODELS,
  type ThermostatModel,
  type ThermostatReading,
} from "./schema.js";

// =============================================================================
// Checksum
// =============================================================================

/**
 * CRC-16/CCITT-FALSE (poly 0x1021, init 0xFFFF) as used by the V3 protocol.
 */
export function crc16(data: Uint8Array): number {
  let crc = 0xffff;
  for (const byte of data) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

function withCrc(body: number[]): Uint8Array {
  const crc = crc16(Uint8Array.from(body));
  return Uint8Array.from([...body, crc & 0xff, crc >> 8]);
}

// =============================================================================
// Request Frames
// =============================================================================

/**
 * Build a request reading the whole DCB of the thermostat at `address`.
 */
export function buildReadFrame(address: number): Uint8Array {
  const length = FRAME.HEADER_LENGTH + FRAME.CRC_LENGTH;
  return withCrc([
    address,
    length & 0xff,
    length >> 8,
    FRAME.MASTER_ADDRESS,
    FRAME.FUNCTION_READ,
    FRAME.READ_ALL_START & 0xff,
    FRAME.READ_ALL_START >> 8,
    FRAME.READ_ALL_COUNT & 0xff,
    FRAME.READ_ALL_COUNT >> 8,
  ]);
}

/**
 * Build a request writing `data` starting at DCB address `register`.
 */
export function buildWriteFrame(
  address: number,
  register: number,
  data: readonly number[],
): Uint8Array {
  const length = FRAME.HEADER_LENGTH + data.length + FRAME.CRC_LENGTH;
  return withCrc([
    address,
    length & 0xff,
    length >> 8,
    FRAME.MASTER_ADDRESS,
    FRAME.FUNCTION_WRITE,
    register & 0xff,
    register >> 8,
    data.length & 0xff,
    data.length >> 8,
    ...data,
  ]);
}

// =============================================================================
// Response Frames
// =============================================================================

/**
 * Check length, checksum, addressing and function of a response frame.
 */
export function verifyFrame(
  frame: Uint8Array,
  address: number,
  expectedFunction: number,
): Result<Uint8Array, DeviceError> {
  if (frame.length < FRAME.ACK_LENGTH) {
    return err(invalidResponse(`Frame too short (${frame.length} bytes)`));
  }

  const declared = (frame[1] ?? 0) | ((frame[2] ?? 0) << 8);
  if (declared !== frame.length) {
    return err(
      invalidResponse(
        `Declared length ${declared} does not match ${frame.length} bytes`,
      ),
    );
  }

  const body = frame.subarray(0, frame.length - FRAME.CRC_LENGTH);
  const expected = crc16(body);
  const actual =
    (frame[frame.length - 2] ?? 0) | ((frame[frame.length - 1] ?? 0) << 8);
  if (expected !== actual) {
    return err(crcMismatch(expected, actual));
  }

  if (frame[0] !== FRAME.MASTER_ADDRESS) {
    return err(invalidResponse(`Frame addressed to ${frame[0]}, not master`));
  }
  if (frame[3] !== address) {
    return err(
      invalidResponse(`Response from ${frame[3]}, expected thermostat ${address}`),
    );
  }
  if (frame[4] !== expectedFunction) {
    return err(invalidResponse(`Unexpected function code ${frame[4]}`));
  }

  return ok(frame);
}

/**
 * Extract the DCB from a read response.
 */
export function parseReadResponse(
  frame: Uint8Array,
  address: number,
): Result<Uint8Array, DeviceError> {
  return verifyFrame(frame, address, FRAME.FUNCTION_READ).andThen((valid) => {
    if (valid.length < FRAME.HEADER_LENGTH + FRAME.CRC_LENGTH) {
      return err(invalidResponse("Read response has no header"));
    }
    const count = (valid[7] ?? 0) | ((valid[8] ?? 0) << 8);
    const dcb = valid.subarray(
      FRAME.HEADER_LENGTH,
      valid.length - FRAME.CRC_LENGTH,
    );
    if (dcb.length !== count) {
      return err(
        invalidResponse(`DCB holds ${dcb.length} bytes, header says ${count}`),
      );
    }
    return ok(dcb);
  });
}

/**
 * Confirm a write acknowledgement.
 */
export function parseWriteAck(
  frame: Uint8Array,
  address: number,
): Result<void, DeviceError> {
  return verifyFrame(frame, address, FRAME.FUNCTION_WRITE).andThen((valid) =>
    valid.length === FRAME.ACK_LENGTH
      ? ok(undefined)
      : err(invalidResponse(`Write ack has ${valid.length} bytes`)),
  );
}

// =============================================================================
// DCB Decoding
// =============================================================================

/**
 * Decode a 16-bit temperature (tenths of °C, high byte first).
 */
export function decodeTemperature(dcb: Uint8Array, offset: number): number | null {
  const raw = ((dcb[offset] ?? 0) << 8) | (dcb[offset + 1] ?? 0);
  if (raw === SENSOR_ABSENT) {
    return null;
  }
  return raw / 10;
}

/**
 * Decode the fields the bridge uses.
 */
export function parseDcb(dcb: Uint8Array): Result<ThermostatReading, DeviceError> {
  if (dcb.length < MIN_DCB_LENGTH) {
    return err(
      invalidResponse(`DCB too short (${dcb.length} < ${MIN_DCB_LENGTH} bytes)`),
    );
  }

  const byte = (offset: number): number => dcb[offset] ?? 0;

  const hotWater: HotWaterState | null =
    dcb.length > DCB.HOT_WATER_STATE
      ? byte(DCB.HOT_WATER_STATE) === 1
        ? "ON"
        : "OFF"
      : null;

  return ok({
    modelCode: byte(DCB.MODEL),
    frostTemp: byte(DCB.FROST_TEMP),
    targetTemp: byte(DCB.TARGET_TEMP),
    isOn: byte(DCB.ON_OFF) === 1,
    keyLock: byte(DCB.KEY_LOCK) === 1,
    runMode: byte(DCB.RUN_MODE) === 1 ? "frost" : "normal",
    remoteAirTemp: decodeTemperature(dcb, DCB.REMOTE_AIR_TEMP),
    floorTemp: decodeTemperature(dcb, DCB.FLOOR_TEMP),
    builtInAirTemp: decodeTemperature(dcb, DCB.BUILT_IN_AIR_TEMP),
    errorCode: byte(DCB.ERROR_CODE),
    heatingOutputActive: byte(DCB.HEATING_STATE) === 1,
    hotWater,
  });
}

// =============================================================================
// Models and Values
// =============================================================================

/**
 * Parse a model name from configuration ("prt", "prthw", "PRT-HW", ...).
 */
export function parseModel(value: string): ThermostatModel | null {
  const normalized = value.trim().toUpperCase().replace(/[-_\s]/g, "");
  return (
    THERMOSTAT_MODELS.find((model) => model.replace("-", "") === normalized) ??
    null
  );
}

export function supportsHotWater(model: ThermostatModel): boolean {
  return model === "PRT-HW";
}

/**
 * Register value for a hot water command.
 */
export function hotWaterWriteValue(state: HotWaterState): number {
  return HOT_WATER_WRITE_VALUE[state];
}
