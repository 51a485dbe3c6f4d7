/**
 * Heatmiser MQTT Bridge - Application Entry Point
 *
 * Wires the pieces together:
 * - Zone registry from the zones file
 * - Transport arbiter over the UH1 hub connection
 * - Scheduler worker and poll coalescer
 * - MQTT client, discovery and state publisher
 * - Poll timer
 */
import { config, getHubConfig, getRetryPolicy, mqttTopics } from "./config.js";
import { createBridge } from "./bridge/index.js";
import { publishDiscovery } from "./discovery/index.js";
import { createHubConnection, describeHubConfig } from "./hub/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "./logger.js";
import {
  disconnectMqttClient,
  initializeMqttClient,
  mqttPublisher,
} from "./mqtt/index.js";
import { createStatePublisher } from "./publisher/index.js";
import { createPollCoalescer, createScheduler } from "./scheduler/index.js";
import { createTransportArbiter } from "./transport/index.js";
import { formatZoneConfigError, loadZoneRegistry } from "./zones/index.js";

const log = createLogger("app");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  HEATMISER MQTT BRIDGE");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    env: config.NODE_ENV,
    hub: describeHubConfig(getHubConfig()),
    zonesFile: config.ZONES_FILE,
    baseTopic: mqttTopics.base,
    discoveryPrefix: mqttTopics.discoveryPrefix,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    retry: getRetryPolicy(),
  },
  "Configuration loaded",
);

// =============================================================================
// ZONES
// =============================================================================

const zones = loadZoneRegistry(config.ZONES_FILE);

if (zones.isErr()) {
  console.error("❌ Invalid zones file:");
  console.error(formatZoneConfigError(zones.error));
  process.exit(1);
}

const registry = zones.value;

// =============================================================================
// WIRING
// =============================================================================

const arbiter = createTransportArbiter(
  () =>
    createHubConnection(getHubConfig(), {
      responseTimeoutMs: config.HUB_TIMEOUT_MS,
      connectTimeoutMs: config.HUB_CONNECT_TIMEOUT_MS,
    }),
  { reconnectDelayMs: config.RECONNECT_DELAY_MS },
);

const pollGate = createPollCoalescer();

const publisher = createStatePublisher({
  client: mqttPublisher,
  registry,
  baseTopic: mqttTopics.base,
});

const scheduler = createScheduler(
  { arbiter, pollGate, publisher },
  {
    retryPolicy: getRetryPolicy(),
    commandThrottleMs: config.COMMAND_THROTTLE_MS,
    pollThrottleMs: config.POLL_THROTTLE_MS,
  },
);

const bridge = createBridge(
  { scheduler, pollGate, publisher, registry },
  {
    baseTopic: mqttTopics.base,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    zoneReadDelayMs: config.ZONE_READ_DELAY_MS,
  },
);

// =============================================================================
// START
// =============================================================================

async function start(): Promise<void> {
  const startTime = Date.now();
  logOperationStart(log, "Startup", { zones: registry.zones.size });

  await arbiter.open();
  scheduler.start();

  initializeMqttClient(
    {
      brokerUrl: config.MQTT_BROKER_URL,
      username: config.MQTT_USERNAME,
      password: config.MQTT_PASSWORD,
      clientIdPrefix: config.APP_NAME,
    },
    {
      topics: bridge.subscriptionTopics,
      onMessage: bridge.handleMessage,
      onConnect: () =>
        publishDiscovery(mqttPublisher, registry, {
          baseTopic: mqttTopics.base,
          discoveryPrefix: mqttTopics.discoveryPrefix,
        }),
    },
  );

  bridge.startPolling();

  logOperationComplete(log, "Startup", startTime, { hubOpen: arbiter.isOpen() });
}

start().catch((error: unknown) => {
  logOperationFailed(log, "Startup", error);
  process.exit(1);
});

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop producing, then let the worker finish its current task
  bridge.stopPolling();
  await scheduler.stop();

  disconnectMqttClient();
  await arbiter.close();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string): void => {
  shutdown(signal).catch((error: unknown) => {
    logOperationFailed(log, "Shutdown", error);
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
