/**
 * MQTT Module - Pure Transformations
 */
import type { IClientOptions } from "mqtt";

import {
  CONNECT_TIMEOUT_MS,
  type MqttSettings,
  RECONNECT_PERIOD_MS,
} from "./schema.js";

/**
 * mqtt.js connect options. Credentials are only set when configured.
 */
export function buildClientOptions(
  settings: MqttSettings,
  suffix: string,
): IClientOptions {
  const options: IClientOptions = {
    clientId: `${settings.clientIdPrefix}-${suffix}`,
    reconnectPeriod: RECONNECT_PERIOD_MS,
    connectTimeout: CONNECT_TIMEOUT_MS,
  };

  if (settings.username !== undefined) {
    options.username = settings.username;
  }
  if (settings.password !== undefined) {
    options.password = settings.password;
  }
  return options;
}

/**
 * Redact credentials embedded in a broker URL before logging it.
 */
export function redactBrokerUrl(brokerUrl: string): string {
  try {
    const url = new URL(brokerUrl);
    if (url.password) {
      url.password = "***";
    }
    return url.toString();
  } catch {
    return brokerUrl;
  }
}

export function decodePayload(payload: Buffer): string {
  return payload.toString("utf8");
}
