/**
 * Discovery Module - Pure Transformations
 */
import type { OutboundMessage } from "../publisher/schema.js";
import { HOT_WATER_KEY, type HotWaterZone, type Zone, type ZoneRegistry } from "../zones/schema.js";
import {
  CLIMATE_MAX_TEMP,
  CLIMATE_MIN_TEMP,
  CLIMATE_MODES,
  type ClimateDiscoveryPayload,
  type DiscoveryOptions,
  type SwitchDiscoveryPayload,
} from "./schema.js";

/**
 * "lounge" -> "Lounge"
 */
export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function buildClimateDiscovery(
  zone: Zone,
  options: DiscoveryOptions,
): ClimateDiscoveryPayload {
  const topic = (path: string): string => `${options.baseTopic}/${zone.name}/${path}`;

  return {
    name: `${capitalize(zone.name)} Thermostat`,
    unique_id: `heatmiser_${zone.id}_climate`,
    current_temperature_topic: topic("state/temperature"),
    temperature_state_topic: topic("state/target"),
    temperature_command_topic: topic("set/target"),
    min_temp: CLIMATE_MIN_TEMP,
    max_temp: CLIMATE_MAX_TEMP,
    modes: CLIMATE_MODES,
    mode_state_topic: topic("state/mode"),
    mode_command_topic: topic("set/mode"),
    action_topic: topic("state/action"),
  };
}

export function buildHotWaterDiscovery(
  hotWater: HotWaterZone,
  options: DiscoveryOptions,
): SwitchDiscoveryPayload {
  return {
    name: hotWater.name,
    unique_id: `heatmiser_${hotWater.zone.id}_hotwater`,
    command_topic: `${options.baseTopic}/${HOT_WATER_KEY}/set/hw_state`,
    state_topic: `${options.baseTopic}/${HOT_WATER_KEY}/state/hw_state`,
    payload_on: "ON",
    payload_off: "OFF",
    state_on: "ON",
    state_off: "OFF",
  };
}

/**
 * Retained config messages for every zone, then the hot water switch.
 */
export function discoveryMessages(
  registry: ZoneRegistry,
  options: DiscoveryOptions,
): OutboundMessage[] {
  const messages: OutboundMessage[] = [];

  for (const zone of registry.zones.values()) {
    messages.push({
      topic: `${options.discoveryPrefix}/climate/heatmiser_${zone.name}/config`,
      payload: JSON.stringify(buildClimateDiscovery(zone, options)),
      retain: true,
    });
  }

  if (registry.hotWater) {
    messages.push({
      topic: `${options.discoveryPrefix}/switch/heatmiser_${HOT_WATER_KEY}/config`,
      payload: JSON.stringify(buildHotWaterDiscovery(registry.hotWater, options)),
      retain: true,
    });
  }

  return messages;
}
