/**
 * MQTT Module - Service Layer
 *
 * MQTT client management. Connects to the broker, subscribes to the command
 * topics on every connect, hands inbound messages to the bridge and publishes
 * retained state.
 */
import { randomBytes } from "node:crypto";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";

import { createLogger } from "../logger.js";
import type { MessagePublisher, OutboundMessage } from "../publisher/schema.js";
import type { MqttEventHandlers, MqttSettings } from "./schema.js";
import { buildClientOptions, decodePayload, redactBrokerUrl } from "./transform.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;
let eventHandlers: MqttEventHandlers = {};

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(
  settings: MqttSettings,
  handlers: MqttEventHandlers = {},
): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  eventHandlers = handlers;

  log.info(
    { broker: redactBrokerUrl(settings.brokerUrl) },
    "Connecting to MQTT broker...",
  );

  try {
    mqttClient = mqtt.connect(
      settings.brokerUrl,
      buildClientOptions(settings, randomBytes(4).toString("hex")),
    );

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error(
      { error: error instanceof Error ? error.message : String(error) },
      "Failed to initialize MQTT client",
    );
    return false;
  }
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");

    subscribeToTopics(client);

    eventHandlers.onConnect?.();
  });

  client.on("message", (topic, message) => {
    eventHandlers.onMessage?.(topic, decodePayload(message));
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

/**
 * Subscribe to the command topics.
 */
function subscribeToTopics(client: MqttClient): void {
  const topics = eventHandlers.topics?.() ?? [];

  for (const topic of topics) {
    client.subscribe(topic, (err) => {
      if (err) {
        log.error(
          { topic, error: err.message },
          "Failed to subscribe to topic",
        );
      } else {
        log.debug({ topic }, "Subscribed to topic");
      }
    });
  }
}

// =============================================================================
// Publishing
// =============================================================================

/**
 * Publish one message. Failures are logged, never raised.
 */
export function publishMessage(message: OutboundMessage): void {
  if (!mqttClient) {
    log.warn({ topic: message.topic }, "Publish skipped; MQTT client not initialized");
    return;
  }

  mqttClient.publish(
    message.topic,
    message.payload,
    { retain: message.retain, qos: 0 },
    (err) => {
      if (err) {
        log.warn({ topic: message.topic, error: err.message }, "MQTT publish failed");
      } else {
        log.trace({ topic: message.topic, payload: message.payload }, "Published");
      }
    },
  );
}

/**
 * The client as seen by the publisher and discovery modules.
 */
export const mqttPublisher: MessagePublisher = { publish: publishMessage };

// =============================================================================
// Client Control
// =============================================================================

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end(true);
    mqttClient = null;
    eventHandlers = {};
  }
}
