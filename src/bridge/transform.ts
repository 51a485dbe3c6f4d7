/**
 * Bridge Module - Pure Transformations
 *
 * Parse inbound command topics and payloads.
 */
import { type Result, err, ok } from "neverthrow";

import type { HotWaterState } from "../heatmiser/schema.js";
import type { ZoneMode } from "../publisher/schema.js";
import { HOT_WATER_KEY, type ZoneRegistry } from "../zones/schema.js";
import {
  type CommandParseError,
  invalidHotWaterState,
  invalidTarget,
  unknownTopic,
} from "./errors.js";
import type { CommandTopic } from "./schema.js";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Split `<base>/<name>/set/<attribute>`. Zone existence is not checked here.
 */
export function parseCommandTopic(
  baseTopic: string,
  topic: string,
): Result<CommandTopic, CommandParseError> {
  const prefix = `${baseTopic}/`;
  if (!topic.startsWith(prefix)) {
    return err(unknownTopic(topic));
  }

  const [name, verb, attribute, ...rest] = topic.slice(prefix.length).split("/");
  if (!name || verb !== "set" || rest.length > 0) {
    return err(unknownTopic(topic));
  }

  if (name === HOT_WATER_KEY) {
    return attribute === "hw_state" ? ok({ kind: "hotwater" }) : err(unknownTopic(topic));
  }

  switch (attribute) {
    case "target":
      return ok({ kind: "target", zone: name });
    case "mode":
      return ok({ kind: "mode", zone: name });
    default:
      return err(unknownTopic(topic));
  }
}

/**
 * Decimal payload rounded to the nearest whole degree.
 */
export function parseTargetPayload(payload: string): Result<number, CommandParseError> {
  const trimmed = payload.trim();
  if (!DECIMAL.test(trimmed)) {
    return err(invalidTarget(payload));
  }

  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return err(invalidTarget(payload));
  }
  return ok(Math.round(value));
}

/**
 * "off" in any case selects frost protection; anything else heats.
 */
export function parseModePayload(payload: string): ZoneMode {
  return payload.trim().toLowerCase() === "off" ? "off" : "heat";
}

export function parseHotWaterPayload(
  payload: string,
): Result<HotWaterState, CommandParseError> {
  const normalized = payload.trim().toUpperCase();
  if (normalized === "ON" || normalized === "OFF") {
    return ok(normalized);
  }
  return err(invalidHotWaterState(payload));
}

/**
 * Topics the bridge subscribes to.
 */
export function commandTopics(baseTopic: string, registry: ZoneRegistry): string[] {
  const topics: string[] = [];
  for (const name of registry.zones.keys()) {
    topics.push(`${baseTopic}/${name}/set/target`, `${baseTopic}/${name}/set/mode`);
  }
  if (registry.hotWater) {
    topics.push(`${baseTopic}/${HOT_WATER_KEY}/set/hw_state`);
  }
  return topics;
}
