/**
 * MQTT Module - Public API
 */

// Types
export type { MqttEventHandlers, MqttSettings } from "./schema.js";

// Service functions
export {
  disconnectMqttClient,
  initializeMqttClient,
  mqttPublisher,
  publishMessage,
} from "./service.js";

// Pure transformations (for testing)
export { buildClientOptions, decodePayload, redactBrokerUrl } from "./transform.js";
