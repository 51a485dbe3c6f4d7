/**
 * Heatmiser Module - Schemas and Types
 *
 * Heatmiser V3 thermostats on an RS-485 bus behind a UH1 hub.
 *
 * Each thermostat exposes a Device Control Block (DCB): a flat byte array
 * holding its settings and readings. The bridge reads the whole DCB and writes
 * single registers.
 */
import type { Result } from "neverthrow";

import type { DeviceError } from "../hub/errors.js";
import type { HubConnection } from "../hub/schema.js";

// =============================================================================
// Frame Layout
// =============================================================================

export const FRAME = {
  /** Address the bridge uses as bus master */
  MASTER_ADDRESS: 0x81,
  FUNCTION_READ: 0x93,
  FUNCTION_WRITE: 0xa5,
  /** dest, lenLo, lenHi, source, function, addrLo, addrHi, countLo, countHi */
  HEADER_LENGTH: 9,
  CRC_LENGTH: 2,
  /** Start address and count that select the whole DCB */
  READ_ALL_START: 0x0000,
  READ_ALL_COUNT: 0xffff,
  /** Write acknowledgement: dest, lenLo, lenHi, source, function, crcLo, crcHi */
  ACK_LENGTH: 7,
} as const;

/**
 * DCB offsets (and write addresses) used by the bridge.
 */
export const DCB = {
  MODEL: 4,
  FROST_TEMP: 17,
  TARGET_TEMP: 18,
  ON_OFF: 21,
  KEY_LOCK: 22,
  RUN_MODE: 23,
  REMOTE_AIR_TEMP: 28,
  FLOOR_TEMP: 30,
  BUILT_IN_AIR_TEMP: 32,
  ERROR_CODE: 34,
  HEATING_STATE: 35,
  HOT_WATER_STATE: 42,
} as const;

/**
 * Shortest DCB that carries every field up to the heating state.
 */
export const MIN_DCB_LENGTH = DCB.HEATING_STATE + 1;

/**
 * Sentinel for an absent temperature sensor.
 */
export const SENSOR_ABSENT = 0xffff;

export const TARGET_TEMP_MIN = 5;
export const TARGET_TEMP_MAX = 35;

// =============================================================================
// Device Model
// =============================================================================

export const THERMOSTAT_MODELS = [
  "DT",
  "DT-E",
  "PRT",
  "PRT-E",
  "PRT-HW",
  "TM1",
] as const;

export type ThermostatModel = (typeof THERMOSTAT_MODELS)[number];

/**
 * Run mode: normal heating or frost protection (the thermostat's "off").
 */
export type RunMode = "normal" | "frost";

export type HotWaterState = "ON" | "OFF";

/**
 * Values written to the hot water register: 1 = override on, 2 = override off.
 */
export const HOT_WATER_WRITE_VALUE: Readonly<Record<HotWaterState, number>> = {
  ON: 1,
  OFF: 2,
};

/**
 * Decoded DCB fields.
 */
export type ThermostatReading = Readonly<{
  /** Model code reported by the device (index into THERMOSTAT_MODELS) */
  modelCode: number;
  frostTemp: number;
  targetTemp: number;
  isOn: boolean;
  keyLock: boolean;
  runMode: RunMode;
  /** Remote air sensor in °C, null when not fitted */
  remoteAirTemp: number | null;
  /** Floor sensor in °C, null when not fitted */
  floorTemp: number | null;
  /** Built-in air sensor in °C, null when not fitted */
  builtInAirTemp: number | null;
  errorCode: number;
  heatingOutputActive: boolean;
  /** Only present on hot water models */
  hotWater: HotWaterState | null;
}>;

// =============================================================================
// Device Link
// =============================================================================

/**
 * Per-zone handle to one thermostat.
 *
 * I/O operations take the hub connection handed out by the transport arbiter.
 * Getters read the cached DCB and return null until the first successful
 * readState().
 */
export type Thermostat = Readonly<{
  address: number;
  model: ThermostatModel;
  readState: (hub: HubConnection) => Promise<Result<void, DeviceError>>;
  getReading: () => ThermostatReading | null;
  getAirTemp: () => number | null;
  getFloorTemp: () => number | null;
  getTargetTemp: () => number | null;
  setTargetTemp: (
    hub: HubConnection,
    value: number,
  ) => Promise<Result<void, DeviceError>>;
  getRunMode: () => RunMode | null;
  setFrostProtectMode: (
    hub: HubConnection,
    enabled: boolean,
  ) => Promise<Result<void, DeviceError>>;
  getHeatingOutputActive: () => boolean | null;
  getHotWaterState: () => HotWaterState | null;
  setHotWaterState: (
    hub: HubConnection,
    state: HotWaterState,
  ) => Promise<Result<void, DeviceError>>;
}>;
