/**
 * Bridge Module - Service Layer
 *
 * The producers: MQTT command handlers and the poll timer. They build tasks
 * and enqueue them; none of them waits on the hub.
 */
import { type Result, err, ok } from "neverthrow";

import type { HubConnection } from "../hub/schema.js";
import type { DeviceError } from "../hub/errors.js";
import { createLogger } from "../logger.js";
import type {
  PollResults,
  StatePublisher,
  ZoneOverrides,
} from "../publisher/schema.js";
import { readZoneState } from "../publisher/transform.js";
import {
  type PollCoalescer,
  type Scheduler,
  type Task,
  TaskPriority,
} from "../scheduler/schema.js";
import { HOT_WATER_KEY, type Zone, type ZoneRegistry } from "../zones/schema.js";
import { formatCommandParseError } from "./errors.js";
import type { Bridge, BridgeOptions } from "./schema.js";
import {
  commandTopics,
  parseCommandTopic,
  parseHotWaterPayload,
  parseModePayload,
  parseTargetPayload,
} from "./transform.js";

const log = createLogger("bridge");

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export type BridgeDeps = Readonly<{
  scheduler: Pick<Scheduler, "enqueue" | "getQueueInfo">;
  pollGate: Pick<PollCoalescer, "tryStartPoll">;
  publisher: Pick<StatePublisher, "publishZoneUpdate" | "publishHotWaterState">;
  registry: ZoneRegistry;
}>;

export function createBridge(deps: BridgeDeps, options: BridgeOptions): Bridge {
  const { scheduler, pollGate, publisher, registry } = deps;
  const { baseTopic } = options;
  let pollTimer: ReturnType<typeof setInterval> | null = null;

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Enqueue a write to one zone. The operation re-reads the zone after the
   * write, so the completion publish lays the commanded value over fresh
   * state rather than whatever the last poll left in the cache.
   */
  const enqueueZoneCommand = (
    zone: Zone,
    description: string,
    write: (hub: HubConnection) => Promise<Result<void, DeviceError>>,
    overrides: ZoneOverrides,
  ): Task => {
    const committed = Object.freeze({ ...overrides });
    log.info({ zone: zone.name, ...committed }, "Command received");
    return scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: async (hub) => {
        const written = await write(hub);
        if (written.isErr()) {
          return written;
        }
        return zone.link.readState(hub);
      },
      description,
      onComplete: () => publisher.publishZoneUpdate(zone.name, committed),
    });
  };

  const handleTarget = (zone: Zone, payload: string): Task | null => {
    const parsed = parseTargetPayload(payload);
    if (parsed.isErr()) {
      log.warn(
        { zone: zone.name, error: formatCommandParseError(parsed.error) },
        "Invalid target temperature",
      );
      return null;
    }

    const target = parsed.value;
    return enqueueZoneCommand(
      zone,
      `Set ${zone.name} target to ${target}`,
      (hub) => zone.link.setTargetTemp(hub, target),
      { target },
    );
  };

  const handleMode = (zone: Zone, payload: string): Task => {
    const mode = parseModePayload(payload);
    return enqueueZoneCommand(
      zone,
      `Set ${zone.name} mode to ${mode}`,
      (hub) => zone.link.setFrostProtectMode(hub, mode === "off"),
      { mode },
    );
  };

  const handleHotWater = (payload: string): Task | null => {
    const hotWater = registry.hotWater;
    if (!hotWater) {
      log.debug("Hot water command ignored; hot water is not configured");
      return null;
    }

    const parsed = parseHotWaterPayload(payload);
    if (parsed.isErr()) {
      log.warn({ error: formatCommandParseError(parsed.error) }, "Invalid hot water command");
      return null;
    }

    const state = parsed.value;
    log.info({ hwState: state }, "Hot water command received");
    return scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: (hub) => hotWater.zone.link.setHotWaterState(hub, state),
      description: `Hot water ${state}`,
      onComplete: () => publisher.publishHotWaterState(state),
    });
  };

  // ===========================================================================
  // Polling
  // ===========================================================================

  const pollAll = async (hub: HubConnection): Promise<Result<PollResults, DeviceError>> => {
    const results: PollResults = {};

    for (const zone of registry.zones.values()) {
      const read = await zone.link.readState(hub);
      if (read.isErr()) {
        return err(read.error);
      }

      const state = readZoneState(zone);
      if (state) {
        results[zone.name] = state;
      }
      await sleep(options.zoneReadDelayMs);
    }

    const hwState = registry.hotWater?.zone.link.getHotWaterState() ?? null;
    if (hwState) {
      results[HOT_WATER_KEY] = { hw_state: hwState };
    }

    return ok(results);
  };

  const requestPoll = (): boolean => {
    if (!pollGate.tryStartPoll()) {
      log.debug("Poll already pending; skipped");
      return false;
    }

    scheduler.enqueue({
      priority: TaskPriority.Poll,
      operation: pollAll,
      description: "Poll all thermostats",
      isPoll: true,
    });
    return true;
  };

  const pollTick = (): void => {
    log.debug(scheduler.getQueueInfo(), "Queue health");
    requestPoll();
  };

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    handleMessage(topic, payload) {
      const parsed = parseCommandTopic(baseTopic, topic);
      if (parsed.isErr()) {
        log.debug({ error: formatCommandParseError(parsed.error) }, "Message ignored");
        return null;
      }

      const command = parsed.value;
      if (command.kind === "hotwater") {
        return handleHotWater(payload);
      }

      const zone = registry.zones.get(command.zone);
      if (!zone) {
        log.debug({ zone: command.zone, topic }, "Command for unknown zone ignored");
        return null;
      }

      return command.kind === "target"
        ? handleTarget(zone, payload)
        : handleMode(zone, payload);
    },

    requestPoll,

    startPolling() {
      if (pollTimer) return;
      log.info({ intervalMs: options.pollIntervalMs }, "Polling started");
      pollTick();
      pollTimer = setInterval(pollTick, options.pollIntervalMs);
    },

    stopPolling() {
      if (!pollTimer) return;
      clearInterval(pollTimer);
      pollTimer = null;
      log.info("Polling stopped");
    },

    subscriptionTopics: () => commandTopics(baseTopic, registry),
  };
}
