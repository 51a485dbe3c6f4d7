/**
 * Zones Module - Schemas and Types
 *
 * The zones file describes every thermostat on the bus and, optionally, which
 * one drives the hot water. Schemas are the source of truth - types derived
 * with z.infer<>.
 */
import { z } from "zod";

import type { Thermostat, ThermostatModel } from "../heatmiser/schema.js";
import { parseModel } from "../heatmiser/transform.js";

/**
 * Key of the hot water entry in poll results; reserved as a zone name.
 */
export const HOT_WATER_KEY = "hotwater";

export const ZoneEntrySchema = z.object({
  name: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "Zone names may only use letters, digits, - and _")
    .refine((name) => name.toLowerCase() !== HOT_WATER_KEY, {
      message: `"${HOT_WATER_KEY}" is reserved`,
    })
    .describe("Zone name, used as MQTT topic level"),
  id: z
    .number()
    .int()
    .min(1)
    .max(32)
    .describe("Thermostat bus address"),
  type: z
    .string()
    .transform((value, ctx): ThermostatModel => {
      const model = parseModel(value);
      if (!model) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown thermostat type "${value}"`,
        });
        return z.NEVER;
      }
      return model;
    })
    .describe("Thermostat model, e.g. prt or prthw"),
  sensor_type: z
    .enum(["air", "floor"])
    .default("air")
    .describe("Sensor whose reading is published as the zone temperature"),
});

export const HotWaterEntrySchema = z.object({
  zone_id: z.number().int().min(1).max(32).describe("Address of the PRT-HW"),
  name: z.string().default("Hot Water").describe("Display name"),
});

export const ZoneFileSchema = z.object({
  zones: z.array(ZoneEntrySchema).min(1, "At least one zone is required"),
  hotwater: HotWaterEntrySchema.optional(),
});

export type ZoneEntry = z.infer<typeof ZoneEntrySchema>;
export type ZoneFile = z.infer<typeof ZoneFileSchema>;

export type SensorKind = ZoneEntry["sensor_type"];

/**
 * A configured zone with its thermostat handle.
 */
export type Zone = Readonly<{
  name: string;
  id: number;
  model: ThermostatModel;
  sensor: SensorKind;
  link: Thermostat;
}>;

export type HotWaterZone = Readonly<{
  name: string;
  zone: Zone;
}>;

/**
 * Immutable after startup.
 */
export type ZoneRegistry = Readonly<{
  zones: ReadonlyMap<string, Zone>;
  hotWater: HotWaterZone | null;
}>;
