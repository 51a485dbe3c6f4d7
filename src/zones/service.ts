/**
 * Zones Module - Service Layer
 *
 * Loads the zones file at startup.
 */
import { readFileSync } from "node:fs";
import { type Result, err } from "neverthrow";

import { createThermostat } from "../heatmiser/service.js";
import { createLogger } from "../logger.js";
import { type ZoneConfigError, fileUnreadable, invalidJson } from "./errors.js";
import type { ZoneRegistry } from "./schema.js";
import { buildZoneRegistry, parseZoneFile } from "./transform.js";

const log = createLogger("zones");

/**
 * Read, validate and build the zone registry from `path`.
 */
export function loadZoneRegistry(path: string): Result<ZoneRegistry, ZoneConfigError> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(fileUnreadable(path, message));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidJson(path, message));
  }

  return parseZoneFile(data)
    .andThen((file) => buildZoneRegistry(file, createThermostat))
    .map((registry) => {
      log.info(
        {
          path,
          zones: [...registry.zones.keys()],
          hotWater: registry.hotWater?.zone.name ?? null,
        },
        "Zones loaded",
      );
      return registry;
    });
}
