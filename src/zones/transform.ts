/**
 * Zones Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import type { Thermostat } from "../heatmiser/schema.js";
import type { ThermostatOptions } from "../heatmiser/service.js";
import { supportsHotWater } from "../heatmiser/transform.js";
import {
  type ZoneConfigError,
  duplicateZone,
  invalidHotWater,
  invalidSchema,
} from "./errors.js";
import {
  type Zone,
  type ZoneFile,
  ZoneFileSchema,
  type ZoneRegistry,
} from "./schema.js";

/**
 * Validate parsed JSON as a zones file.
 */
export function parseZoneFile(data: unknown): Result<ZoneFile, ZoneConfigError> {
  const parsed = ZoneFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      invalidSchema(
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      ),
    );
  }

  const names = new Set<string>();
  const ids = new Set<number>();
  for (const zone of parsed.data.zones) {
    if (names.has(zone.name)) {
      return err(duplicateZone(`name ${zone.name}`));
    }
    if (ids.has(zone.id)) {
      return err(duplicateZone(`id ${zone.id}`));
    }
    names.add(zone.name);
    ids.add(zone.id);
  }

  return ok(parsed.data);
}

/**
 * Build the immutable registry, creating one thermostat handle per zone.
 */
export function buildZoneRegistry(
  file: ZoneFile,
  createLink: (options: ThermostatOptions) => Thermostat,
): Result<ZoneRegistry, ZoneConfigError> {
  const zones = new Map<string, Zone>();
  for (const entry of file.zones) {
    zones.set(
      entry.name,
      Object.freeze({
        name: entry.name,
        id: entry.id,
        model: entry.type,
        sensor: entry.sensor_type,
        link: createLink({ address: entry.id, model: entry.type }),
      }),
    );
  }

  if (!file.hotwater) {
    return ok(Object.freeze({ zones, hotWater: null }));
  }

  const { zone_id: zoneId, name } = file.hotwater;
  const zone = [...zones.values()].find((candidate) => candidate.id === zoneId);
  if (!zone) {
    return err(invalidHotWater(zoneId, "No zone has this id"));
  }
  if (!supportsHotWater(zone.model)) {
    return err(invalidHotWater(zoneId, `${zone.name} is a ${zone.model}, not a PRT-HW`));
  }

  return ok(Object.freeze({ zones, hotWater: Object.freeze({ name, zone }) }));
}
