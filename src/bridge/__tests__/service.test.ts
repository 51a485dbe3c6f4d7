/**
 * Bridge Module - Service Tests
 *
 * Producers wired to the real scheduler, arbiter and publisher, with the fake
 * bus standing in for the hub and a recording client for MQTT.
 */
import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { buildDcb, createFakeBus } from "../../__tests__/fake-bus.js";
import { createThermostat } from "../../heatmiser/service.js";
import type { OutboundMessage } from "../../publisher/schema.js";
import { createStatePublisher } from "../../publisher/service.js";
import { createPollCoalescer } from "../../scheduler/poll-coalescer.js";
import { type Scheduler, TaskPriority } from "../../scheduler/schema.js";
import { createScheduler } from "../../scheduler/service.js";
import { createTransportArbiter } from "../../transport/service.js";
import { buildZoneRegistry, parseZoneFile } from "../../zones/transform.js";
import { createBridge } from "../service.js";

const BASE = "home/heatmiser";

// =============================================================================
// Harness
// =============================================================================

const running: Scheduler[] = [];

const setup = () => {
  const bus = createFakeBus(
    new Map([
      [1, buildDcb({ target: 20, airTemp: 19.5, heating: true })],
      [2, buildDcb({ target: 18, airTemp: 17.2 })],
      [3, buildDcb({ target: 19, airTemp: 20.1, floorTemp: 22.5, hotWater: true })],
    ]),
  );

  const registry = parseZoneFile({
    zones: [
      { name: "lounge", id: 1, type: "prt" },
      { name: "kitchen", id: 2, type: "prt" },
      { name: "bathroom", id: 3, type: "prthw", sensor_type: "floor" },
    ],
    hotwater: { zone_id: 3 },
  })
    .andThen((file) => buildZoneRegistry(file, createThermostat))
    ._unsafeUnwrap();

  const published: OutboundMessage[] = [];
  const client = {
    publish: (message: OutboundMessage) => {
      published.push(message);
    },
  };

  const arbiter = createTransportArbiter(() => bus.connection, { reconnectDelayMs: 0 });
  const pollGate = createPollCoalescer();
  const publisher = createStatePublisher({ client, registry, baseTopic: BASE });
  const scheduler = createScheduler(
    { arbiter, pollGate, publisher },
    {
      retryPolicy: { maxRetries: 1, retryDelayMs: 0 },
      commandThrottleMs: 0,
      pollThrottleMs: 0,
    },
  );
  const bridge = createBridge(
    { scheduler, pollGate, publisher, registry },
    { baseTopic: BASE, pollIntervalMs: 60_000, zoneReadDelayMs: 0 },
  );

  const start = () => {
    running.push(scheduler);
    scheduler.start();
  };

  return { bus, published, pollGate, scheduler, bridge, start };
};

const topicsAndPayloads = (messages: OutboundMessage[]) =>
  messages.map((message) => [message.topic, message.payload]);

afterEach(async () => {
  await Promise.all(running.map((scheduler) => scheduler.stop()));
  running.length = 0;
  vi.useRealTimers();
});

// =============================================================================
// Commands
// =============================================================================

describe("handleMessage", () => {
  it("sets the lounge target and publishes it with freshly read state", async () => {
    const { bus, published, scheduler, bridge, start } = setup();
    bridge.requestPoll();
    start();
    await scheduler.onIdle();
    published.length = 0;

    const task = bridge.handleMessage("home/heatmiser/lounge/set/target", "21");
    await scheduler.onIdle();

    expect(task?.priority).toBe(TaskPriority.Command);
    expect(bus.dcbs.get(1)?.[18]).toBe(21);
    expect(topicsAndPayloads(published)).toEqual([
      ["home/heatmiser/lounge/state/temperature", "19.5"],
      ["home/heatmiser/lounge/state/target", "21"],
      ["home/heatmiser/lounge/state/mode", "heat"],
      ["home/heatmiser/lounge/state/action", "heating"],
    ]);
  });

  it("re-reads the zone when the command overtakes the first poll", async () => {
    const { bus, published, scheduler, bridge, start } = setup();
    bridge.requestPoll();

    bridge.handleMessage("home/heatmiser/lounge/set/target", "21");
    start();
    await scheduler.onIdle();

    expect(bus.requests.slice(0, 2).map((request) => request[4])).toEqual([0xa5, 0x93]);
    expect(topicsAndPayloads(published.slice(0, 4))).toEqual([
      ["home/heatmiser/lounge/state/temperature", "19.5"],
      ["home/heatmiser/lounge/state/target", "21"],
      ["home/heatmiser/lounge/state/mode", "heat"],
      ["home/heatmiser/lounge/state/action", "heating"],
    ]);
  });

  it("rounds a fractional target", async () => {
    const { bus, scheduler, bridge, start } = setup();
    start();

    bridge.handleMessage("home/heatmiser/lounge/set/target", "21.6");
    await scheduler.onIdle();

    expect(bus.dcbs.get(1)?.[18]).toBe(22);
  });

  it("switches the kitchen to frost protection on OFF and publishes mode off", async () => {
    const { bus, published, scheduler, bridge, start } = setup();
    start();

    const task = bridge.handleMessage("home/heatmiser/kitchen/set/mode", "OFF");
    await scheduler.onIdle();

    expect(task?.description).toBe("Set kitchen mode to off");
    expect(bus.dcbs.get(2)?.[23]).toBe(1);
    expect(topicsAndPayloads(published)).toEqual([
      ["home/heatmiser/kitchen/state/temperature", "17.2"],
      ["home/heatmiser/kitchen/state/target", "18"],
      ["home/heatmiser/kitchen/state/mode", "off"],
      ["home/heatmiser/kitchen/state/action", "idle"],
    ]);
  });

  it("switches hot water and publishes the commanded state", async () => {
    const { bus, published, scheduler, bridge, start } = setup();
    start();

    bridge.handleMessage("home/heatmiser/hotwater/set/hw_state", "off");
    await scheduler.onIdle();

    expect(bus.dcbs.get(3)?.[42]).toBe(2);
    expect(topicsAndPayloads(published)).toEqual([
      ["home/heatmiser/hotwater/state/hw_state", "OFF"],
    ]);
  });

  it.each([
    ["home/heatmiser/lounge/set/target", "warm"],
    ["home/heatmiser/attic/set/target", "21"],
    ["home/heatmiser/hotwater/set/hw_state", "boost"],
    ["home/heatmiser/lounge/set/fan", "on"],
  ])("drops %s with payload %j", (topic, payload) => {
    const { scheduler, bridge } = setup();

    expect(bridge.handleMessage(topic, payload)).toBeNull();
    expect(scheduler.getQueueInfo().queued).toBe(0);
  });

  it("does not publish when the command fails", async () => {
    const { bus, published, scheduler, bridge, start } = setup();
    bus.silent.add(1);
    start();

    bridge.handleMessage("home/heatmiser/lounge/set/target", "21");
    await scheduler.onIdle();

    expect(published).toEqual([]);
    expect(scheduler.getQueueInfo()).toMatchObject({ processed: 0, failed: 1 });
  });
});

// =============================================================================
// Polling
// =============================================================================

describe("requestPoll", () => {
  it("publishes every zone and the hot water state", async () => {
    const { published, pollGate, scheduler, bridge, start } = setup();

    expect(bridge.requestPoll()).toBe(true);
    start();
    await scheduler.onIdle();

    expect(topicsAndPayloads(published)).toEqual([
      ["home/heatmiser/lounge/state/temperature", "19.5"],
      ["home/heatmiser/lounge/state/target", "20"],
      ["home/heatmiser/lounge/state/mode", "heat"],
      ["home/heatmiser/lounge/state/action", "heating"],
      ["home/heatmiser/kitchen/state/temperature", "17.2"],
      ["home/heatmiser/kitchen/state/target", "18"],
      ["home/heatmiser/kitchen/state/mode", "heat"],
      ["home/heatmiser/kitchen/state/action", "idle"],
      ["home/heatmiser/bathroom/state/temperature", "22.5"],
      ["home/heatmiser/bathroom/state/target", "19"],
      ["home/heatmiser/bathroom/state/mode", "heat"],
      ["home/heatmiser/bathroom/state/action", "idle"],
      ["home/heatmiser/hotwater/state/hw_state", "ON"],
    ]);
    expect(pollGate.isPollPending()).toBe(false);
  });

  it("keeps at most one poll outstanding", async () => {
    const { scheduler, bridge, start } = setup();

    const granted = [bridge.requestPoll(), bridge.requestPoll(), bridge.requestPoll()];

    expect(granted).toEqual([true, false, false]);
    expect(scheduler.getQueueInfo().queued).toBe(1);

    start();
    await scheduler.onIdle();

    expect(bridge.requestPoll()).toBe(true);
  });

  it("keeps the worker going after a poll exhausts its retries", async () => {
    const { bus, published, pollGate, scheduler, bridge, start } = setup();
    bus.silent.add(2);
    bridge.requestPoll();
    start();
    await scheduler.onIdle();

    expect(published).toEqual([]);
    expect(pollGate.isPollPending()).toBe(false);
    expect(scheduler.getQueueInfo()).toMatchObject({ processed: 0, failed: 1 });

    bus.silent.delete(2);
    bridge.handleMessage("home/heatmiser/kitchen/set/target", "16");
    await scheduler.onIdle();

    expect(bus.dcbs.get(2)?.[18]).toBe(16);
    expect(scheduler.getQueueInfo()).toMatchObject({ processed: 1, failed: 1 });
  });
});

describe("startPolling", () => {
  it("polls at once and coalesces ticks while the poll is queued", () => {
    vi.useFakeTimers();
    const { scheduler, bridge } = setup();

    bridge.startPolling();
    expect(scheduler.getQueueInfo().queued).toBe(1);

    vi.advanceTimersByTime(60_000 * 5);
    expect(scheduler.getQueueInfo().queued).toBe(1);

    bridge.stopPolling();
  });
});

describe("subscriptionTopics", () => {
  it("lists the command topics for every zone and hot water", () => {
    const { bridge } = setup();

    expect(bridge.subscriptionTopics()).toEqual([
      "home/heatmiser/lounge/set/target",
      "home/heatmiser/lounge/set/mode",
      "home/heatmiser/kitchen/set/target",
      "home/heatmiser/kitchen/set/mode",
      "home/heatmiser/bathroom/set/target",
      "home/heatmiser/bathroom/set/mode",
      "home/heatmiser/hotwater/set/hw_state",
    ]);
  });
});
