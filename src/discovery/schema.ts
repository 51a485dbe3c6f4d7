/**
 * Discovery Module - Types
 *
 * Home Assistant MQTT discovery payloads. Field names follow Home Assistant's
 * configuration keys.
 */

export type DiscoveryOptions = Readonly<{
  baseTopic: string;
  discoveryPrefix: string;
}>;

export type ClimateDiscoveryPayload = Readonly<{
  name: string;
  unique_id: string;
  current_temperature_topic: string;
  temperature_state_topic: string;
  temperature_command_topic: string;
  min_temp: number;
  max_temp: number;
  modes: readonly string[];
  mode_state_topic: string;
  mode_command_topic: string;
  action_topic: string;
}>;

export type SwitchDiscoveryPayload = Readonly<{
  name: string;
  unique_id: string;
  command_topic: string;
  state_topic: string;
  payload_on: string;
  payload_off: string;
  state_on: string;
  state_off: string;
}>;

/**
 * Temperature range offered in the Home Assistant climate card.
 */
export const CLIMATE_MIN_TEMP = 5;
export const CLIMATE_MAX_TEMP = 30;

export const CLIMATE_MODES = ["heat", "off"] as const;
