/**
 * Publisher Module - Pure Transformations
 *
 * Derive zone state from a thermostat's cached DCB and turn it into retained
 * MQTT messages. No hub I/O happens here.
 */
import type { RunMode, Thermostat } from "../heatmiser/schema.js";
import { HOT_WATER_KEY, type SensorKind, type Zone } from "../zones/schema.js";
import {
  type HotWaterEntry,
  type OutboundMessage,
  type PollResults,
  ZONE_ATTRIBUTES,
  type ZoneAction,
  type ZoneMode,
  type ZoneState,
} from "./schema.js";

// =============================================================================
// Derivation
// =============================================================================

export function deriveMode(runMode: RunMode): ZoneMode {
  return runMode === "frost" ? "off" : "heat";
}

export function deriveAction(heatingOutputActive: boolean): ZoneAction {
  return heatingOutputActive ? "heating" : "idle";
}

/**
 * Air reading unless the zone is configured for its floor sensor.
 */
export function selectTemperature(link: Thermostat, sensor: SensorKind): number | null {
  return sensor === "floor" ? link.getFloorTemp() : link.getAirTemp();
}

/**
 * Whatever the cache holds for the zone. Attributes never read are absent.
 */
export function snapshotZone(zone: Zone): Partial<ZoneState> {
  const { link } = zone;
  const snapshot: Partial<ZoneState> = {};

  const temperature = selectTemperature(link, zone.sensor);
  if (temperature !== null) snapshot.temperature = temperature;

  const target = link.getTargetTemp();
  if (target !== null) snapshot.target = target;

  const runMode = link.getRunMode();
  if (runMode !== null) snapshot.mode = deriveMode(runMode);

  const heating = link.getHeatingOutputActive();
  if (heating !== null) snapshot.action = deriveAction(heating);

  return snapshot;
}

/**
 * Full zone state from the cache, null until the zone has been read.
 */
export function readZoneState(zone: Zone): ZoneState | null {
  const reading = zone.link.getReading();
  if (!reading) {
    return null;
  }

  return {
    temperature: selectTemperature(zone.link, zone.sensor),
    target: reading.targetTemp,
    mode: deriveMode(reading.runMode),
    action: deriveAction(reading.heatingOutputActive),
  };
}

// =============================================================================
// Messages
// =============================================================================

export function stateTopic(baseTopic: string, name: string, attribute: string): string {
  return `${baseTopic}/${name}/state/${attribute}`;
}

/**
 * One retained message per present attribute. Null temperatures are skipped.
 */
export function zoneStateMessages(
  baseTopic: string,
  zoneName: string,
  state: Partial<ZoneState>,
): OutboundMessage[] {
  const messages: OutboundMessage[] = [];
  for (const attribute of ZONE_ATTRIBUTES) {
    const value = state[attribute];
    if (value === undefined || value === null) continue;
    messages.push({
      topic: stateTopic(baseTopic, zoneName, attribute),
      payload: String(value),
      retain: true,
    });
  }
  return messages;
}

export function hotWaterStateMessage(
  baseTopic: string,
  state: HotWaterEntry["hw_state"],
): OutboundMessage {
  return {
    topic: stateTopic(baseTopic, HOT_WATER_KEY, "hw_state"),
    payload: state,
    retain: true,
  };
}

/**
 * Messages for a poll batch. The hot water entry is published only when hot
 * water is enabled.
 */
export function pollResultMessages(
  baseTopic: string,
  results: PollResults,
  hotWaterEnabled: boolean,
): OutboundMessage[] {
  const messages: OutboundMessage[] = [];
  for (const [name, entry] of Object.entries(results)) {
    if ("hw_state" in entry) {
      if (name === HOT_WATER_KEY && hotWaterEnabled) {
        messages.push(hotWaterStateMessage(baseTopic, entry.hw_state));
      }
      continue;
    }
    messages.push(...zoneStateMessages(baseTopic, name, entry));
  }
  return messages;
}
