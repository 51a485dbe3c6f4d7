/**
 * Heatmiser Module - Service Layer
 *
 * Thermostat handles (Device Links). Each call performs one request/response
 * exchange on the hub connection it is given; it never opens, closes or
 * retries - the transport arbiter owns those decisions.
 */
import { type Result, err, ok } from "neverthrow";

import { type DeviceError, invalidValue, unsupported } from "../hub/errors.js";
import type { HubConnection } from "../hub/schema.js";
import { createLogger } from "../logger.js";
import {
  DCB,
  type HotWaterState,
  TARGET_TEMP_MAX,
  TARGET_TEMP_MIN,
  type Thermostat,
  type ThermostatModel,
  type ThermostatReading,
} from "./schema.js";
import {
  buildReadFrame,
  buildWriteFrame,
  hotWaterWriteValue,
  parseDcb,
  parseReadResponse,
  parseWriteAck,
  supportsHotWater,
} from "./transform.js";

const log = createLogger("heatmiser");

export type ThermostatOptions = Readonly<{
  /** Bus address configured on the thermostat (1-32) */
  address: number;
  model: ThermostatModel;
}>;

/**
 * Create a handle for the thermostat at `options.address`.
 */
export function createThermostat(options: ThermostatOptions): Thermostat {
  const { address, model } = options;
  let reading: ThermostatReading | null = null;

  const patchReading = (patch: Partial<ThermostatReading>): void => {
    if (reading) {
      reading = { ...reading, ...patch };
    }
  };

  const writeRegister = async (
    hub: HubConnection,
    register: number,
    value: number,
  ): Promise<Result<void, DeviceError>> => {
    const response = await hub.exchange(buildWriteFrame(address, register, [value]));
    return response.andThen((frame) => parseWriteAck(frame, address));
  };

  return {
    address,
    model,

    async readState(hub) {
      const response = await hub.exchange(buildReadFrame(address));
      const parsed = response
        .andThen((frame) => parseReadResponse(frame, address))
        .andThen(parseDcb);

      if (parsed.isErr()) {
        return err(parsed.error);
      }

      reading = parsed.value;
      log.trace(
        {
          address,
          target: reading.targetTemp,
          runMode: reading.runMode,
          heating: reading.heatingOutputActive,
        },
        "Thermostat state read",
      );
      return ok(undefined);
    },

    getReading: () => reading,

    getAirTemp: () =>
      reading ? (reading.remoteAirTemp ?? reading.builtInAirTemp) : null,

    getFloorTemp: () => reading?.floorTemp ?? null,

    getTargetTemp: () => reading?.targetTemp ?? null,

    async setTargetTemp(hub, value) {
      if (
        !Number.isInteger(value) ||
        value < TARGET_TEMP_MIN ||
        value > TARGET_TEMP_MAX
      ) {
        return err(
          invalidValue(
            `Target must be a whole number between ${TARGET_TEMP_MIN} and ${TARGET_TEMP_MAX}`,
            value,
          ),
        );
      }

      const result = await writeRegister(hub, DCB.TARGET_TEMP, value);
      if (result.isOk()) {
        patchReading({ targetTemp: value });
        log.debug({ address, target: value }, "Target temperature written");
      }
      return result;
    },

    getRunMode: () => reading?.runMode ?? null,

    async setFrostProtectMode(hub, enabled) {
      const result = await writeRegister(hub, DCB.RUN_MODE, enabled ? 1 : 0);
      if (result.isOk()) {
        patchReading({ runMode: enabled ? "frost" : "normal" });
        log.debug({ address, frost: enabled }, "Run mode written");
      }
      return result;
    },

    getHeatingOutputActive: () => reading?.heatingOutputActive ?? null,

    getHotWaterState: () => reading?.hotWater ?? null,

    async setHotWaterState(hub, state: HotWaterState) {
      if (!supportsHotWater(model)) {
        return err(unsupported(`Thermostat ${address} (${model}) has no hot water output`));
      }

      const result = await writeRegister(
        hub,
        DCB.HOT_WATER_STATE,
        hotWaterWriteValue(state),
      );
      if (result.isOk()) {
        patchReading({ hotWater: state });
        log.debug({ address, hotWater: state }, "Hot water state written");
      }
      return result;
    },
  };
}
