/**
 * MQTT Module - Types
 */

export type MqttSettings = Readonly<{
  brokerUrl: string;
  username: string | undefined;
  password: string | undefined;
  /** Client id prefix; a random suffix keeps restarts from colliding */
  clientIdPrefix: string;
}>;

/**
 * Callbacks wired by the entry point. `topics` is read on every connect, so a
 * reconnect subscribes to the same set again.
 */
export type MqttEventHandlers = {
  topics?: () => readonly string[];
  onMessage?: (topic: string, payload: string) => void;
  onConnect?: () => void;
};

export const RECONNECT_PERIOD_MS = 5000;
export const CONNECT_TIMEOUT_MS = 10_000;
