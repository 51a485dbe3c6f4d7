/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Heatmiser MQTT Bridge configuration covering:
 * - Runtime settings
 * - MQTT broker and topic layout
 * - UH1 hub connection (serial device or TCP serial server)
 * - Scheduler timing and transport retry policy
 *
 * Zone definitions are structured data and live in the JSON file named by
 * ZONES_FILE (see zones/service.ts).
 */
import { z } from "zod";

import type { HubConfig } from "./hub/schema.js";
import { resolveHubConfig } from "./hub/transform.js";
import type { RetryPolicy } from "./transport/schema.js";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime Configuration
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("HeatmiserBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .describe("MQTT broker connection URL"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_BASE_TOPIC: z
    .string()
    .regex(/^[^#+]+[^/#+]$/, "MQTT_BASE_TOPIC must not contain wildcards")
    .default("home/heatmiser")
    .describe("Topic prefix for state and command topics"),
  DISCOVERY_PREFIX: z
    .string()
    .default("homeassistant")
    .describe("Home Assistant discovery prefix"),

  // ==========================================================================
  // UH1 Hub Connection
  // ==========================================================================
  HUB_DEVICE: optionalString.describe("Serial device path, e.g. /dev/ttyUSB0"),
  HUB_URL: optionalString.describe("Serial server URL, e.g. socket://10.0.0.5:1024"),
  HUB_HOST: optionalString.describe("Serial server host"),
  HUB_PORT: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .describe("Serial server TCP port"),
  HUB_BAUD_RATE: z.coerce
    .number()
    .int()
    .positive()
    .default(4800)
    .describe("Serial baud rate"),
  HUB_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(1000)
    .describe("Time to wait for a complete thermostat response (ms)"),
  HUB_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("Time allowed to connect to a serial server (ms)"),

  // ==========================================================================
  // Zones
  // ==========================================================================
  ZONES_FILE: z
    .string()
    .default("./zones.json")
    .describe("Path of the JSON file describing zones and hot water"),

  // ==========================================================================
  // Scheduling & Retry Policy
  // ==========================================================================
  POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(120_000)
    .describe("Interval between full thermostat refreshes (ms)"),
  TRANSPORT_MAX_RETRIES: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(2)
    .describe("Retries after the first failed attempt before reconnecting"),
  TRANSPORT_RETRY_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(300)
    .describe("Pause between transport attempts (ms)"),
  RECONNECT_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(1000)
    .describe("Pause between closing and reopening the hub (ms)"),
  COMMAND_THROTTLE_MS: z.coerce
    .number()
    .nonnegative()
    .default(500)
    .describe("Worker pause after a command task (ms)"),
  POLL_THROTTLE_MS: z.coerce
    .number()
    .nonnegative()
    .default(250)
    .describe("Worker pause after a poll task (ms)"),
  ZONE_READ_DELAY_MS: z.coerce
    .number()
    .nonnegative()
    .default(50)
    .describe("Pause between zones during a full refresh (ms)"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

const hub = resolveHubConfig(config);

if (hub.isErr()) {
  console.error("❌ Invalid configuration:");
  console.error(hub.error.message);
  process.exit(1);
}

const hubConfig: HubConfig = hub.value;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Hub connection settings, resolved once and reused verbatim on reconnect.
 */
export function getHubConfig(): HubConfig {
  return hubConfig;
}

/**
 * Transport retry policy for the arbiter.
 */
export function getRetryPolicy(): RetryPolicy {
  return {
    maxRetries: config.TRANSPORT_MAX_RETRIES,
    retryDelayMs: config.TRANSPORT_RETRY_DELAY_MS,
  };
}

/**
 * MQTT topic layout.
 */
export const mqttTopics = {
  base: config.MQTT_BASE_TOPIC,
  discoveryPrefix: config.DISCOVERY_PREFIX,
} as const;
