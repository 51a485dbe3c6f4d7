/**
 * Scheduler Module - Worker Tests
 *
 * The worker runs against a pass-through arbiter so each test controls
 * exactly what an operation returns.
 */
import { type Result, err, ok } from "neverthrow";
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

import { type DeviceError, notConnected, timeout } from "../../hub/errors.js";
import type { HubConnection } from "../../hub/schema.js";
import { type TransportError, operationFailed } from "../../transport/errors.js";
import type { HubOperation } from "../../transport/schema.js";
import { type Scheduler, TaskPriority } from "../schema.js";
import { type SchedulerDeps, createScheduler } from "../service.js";

// =============================================================================
// Fakes
// =============================================================================

const hub: HubConnection = {
  target: "test-hub",
  isOpen: () => true,
  open: async () => ok(true as const),
  close: async () => {},
  exchange: async () => err(notConnected("unused")),
};

const passThroughArbiter: SchedulerDeps["arbiter"] = {
  async execute<T>(operation: HubOperation<T>): Promise<Result<T, TransportError>> {
    const result = await operation(hub);
    return result.mapErr(operationFailed);
  },
};

const deferred = () => {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, resolve: () => release() };
};

const options = {
  retryPolicy: { maxRetries: 0, retryDelayMs: 0 },
  commandThrottleMs: 0,
  pollThrottleMs: 0,
};

const makeScheduler = () => {
  const pollGate = { markPollFinished: vi.fn() };
  const publisher = { publishPollResults: vi.fn() };
  const scheduler = createScheduler(
    { arbiter: passThroughArbiter, pollGate, publisher },
    options,
  );
  return { scheduler, pollGate, publisher };
};

// =============================================================================
// Tests
// =============================================================================

describe("createScheduler", () => {
  let active: Scheduler | null = null;
  const order: string[] = [];

  const record =
    (label: string): HubOperation<string> =>
    async () => {
      order.push(label);
      return ok(label);
    };

  afterEach(async () => {
    await active?.stop();
    active = null;
    order.length = 0;
  });

  it("returns frozen tasks with increasing sequence numbers", () => {
    const { scheduler } = makeScheduler();

    const first = scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: record("a"),
      description: "a",
    });
    const second = scheduler.enqueue({
      priority: TaskPriority.Poll,
      operation: record("b"),
      description: "b",
    });

    expect(Object.isFrozen(first)).toBe(true);
    expect(second.sequence).toBe(first.sequence + 1);
    expect(first.isPoll).toBe(false);
    expect(first.onComplete).toBeNull();
    expect(scheduler.getQueueInfo().queued).toBe(2);
  });

  it("runs commands before polls and FIFO within a class", async () => {
    const { scheduler } = makeScheduler();
    active = scheduler;
    scheduler.enqueue({ priority: TaskPriority.Poll, operation: record("poll-1"), description: "p1" });
    scheduler.enqueue({ priority: TaskPriority.Command, operation: record("cmd-1"), description: "c1" });
    scheduler.enqueue({ priority: TaskPriority.Poll, operation: record("poll-2"), description: "p2" });
    scheduler.enqueue({ priority: TaskPriority.Command, operation: record("cmd-2"), description: "c2" });

    scheduler.start();
    await scheduler.onIdle();

    expect(order).toEqual(["cmd-1", "cmd-2", "poll-1", "poll-2"]);
  });

  it("lets a command overtake polls queued while a poll runs", async () => {
    const { scheduler } = makeScheduler();
    active = scheduler;
    scheduler.start();

    const started = deferred();
    const gate = deferred();
    scheduler.enqueue({
      priority: TaskPriority.Poll,
      operation: async () => {
        order.push("poll-1");
        started.resolve();
        await gate.promise;
        return ok("poll-1");
      },
      description: "slow poll",
    });

    await started.promise;
    scheduler.enqueue({ priority: TaskPriority.Poll, operation: record("poll-2"), description: "p2" });
    scheduler.enqueue({ priority: TaskPriority.Command, operation: record("cmd"), description: "c" });
    gate.resolve();
    await scheduler.onIdle();

    expect(order).toEqual(["poll-1", "cmd", "poll-2"]);
  });

  it("logs a failed task and carries on with the next", async () => {
    const { scheduler } = makeScheduler();
    active = scheduler;
    const failedCallback = vi.fn();
    const okCallback = vi.fn();

    scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: async (): Promise<Result<string, DeviceError>> => err(timeout("no reply", 1000)),
      description: "failing",
      onComplete: failedCallback,
    });
    scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: record("after"),
      description: "after",
      onComplete: okCallback,
    });

    scheduler.start();
    await scheduler.onIdle();

    expect(failedCallback).not.toHaveBeenCalled();
    expect(okCallback).toHaveBeenCalledWith("after");
    expect(scheduler.getQueueInfo()).toEqual({
      queued: 0,
      active: false,
      processed: 1,
      failed: 1,
    });
  });

  it("survives a throwing operation and a throwing callback", async () => {
    const { scheduler } = makeScheduler();
    active = scheduler;

    scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: async (): Promise<Result<string, DeviceError>> => {
        throw new Error("driver bug");
      },
      description: "throws",
    });
    scheduler.enqueue({
      priority: TaskPriority.Command,
      operation: record("callback-throws"),
      description: "callback throws",
      onComplete: () => {
        throw new Error("publish failed");
      },
    });
    scheduler.enqueue({ priority: TaskPriority.Command, operation: record("last"), description: "last" });

    scheduler.start();
    await scheduler.onIdle();

    expect(order).toEqual(["callback-throws", "last"]);
    expect(scheduler.getQueueInfo()).toMatchObject({ processed: 2, failed: 1 });
  });

  // ===========================================================================
  // Poll Tasks
  // ===========================================================================

  describe("poll tasks", () => {
    it("routes valid results to the batch publisher and releases the flag", async () => {
      const { scheduler, pollGate, publisher } = makeScheduler();
      active = scheduler;
      const results = {
        lounge: { temperature: 19.5, target: 21, mode: "heat", action: "idle" },
        hotwater: { hw_state: "ON" },
      };

      scheduler.enqueue({
        priority: TaskPriority.Poll,
        operation: async () => ok(results),
        description: "poll",
        isPoll: true,
      });
      scheduler.start();
      await scheduler.onIdle();

      expect(publisher.publishPollResults).toHaveBeenCalledWith(results);
      expect(pollGate.markPollFinished).toHaveBeenCalledTimes(1);
    });

    it("does not publish malformed results but still releases the flag", async () => {
      const { scheduler, pollGate, publisher } = makeScheduler();
      active = scheduler;

      scheduler.enqueue({
        priority: TaskPriority.Poll,
        operation: async () => ok({ lounge: { target: "warm" } }),
        description: "poll",
        isPoll: true,
      });
      scheduler.start();
      await scheduler.onIdle();

      expect(publisher.publishPollResults).not.toHaveBeenCalled();
      expect(pollGate.markPollFinished).toHaveBeenCalledTimes(1);
    });

    it("releases the flag when the poll fails", async () => {
      const { scheduler, pollGate, publisher } = makeScheduler();
      active = scheduler;

      scheduler.enqueue({
        priority: TaskPriority.Poll,
        operation: async (): Promise<Result<string, DeviceError>> => err(timeout("no reply", 1000)),
        description: "poll",
        isPoll: true,
      });
      scheduler.start();
      await scheduler.onIdle();

      expect(publisher.publishPollResults).not.toHaveBeenCalled();
      expect(pollGate.markPollFinished).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  describe("stop", () => {
    it("finishes the current task and drops the rest", async () => {
      const { scheduler, pollGate } = makeScheduler();
      const started = deferred();
      const gate = deferred();
      const dropped = vi.fn(async () => ok("dropped"));

      scheduler.start();
      scheduler.enqueue({
        priority: TaskPriority.Command,
        operation: async () => {
          started.resolve();
          await gate.promise;
          order.push("current");
          return ok("current");
        },
        description: "current",
      });
      await started.promise;
      scheduler.enqueue({ priority: TaskPriority.Poll, operation: dropped, description: "poll", isPoll: true });
      scheduler.enqueue({ priority: TaskPriority.Command, operation: dropped, description: "cmd" });

      const stopping = scheduler.stop();
      gate.resolve();
      await stopping;

      expect(order).toEqual(["current"]);
      expect(dropped).not.toHaveBeenCalled();
      expect(pollGate.markPollFinished).toHaveBeenCalledTimes(1);
      expect(scheduler.getQueueInfo()).toEqual({
        queued: 0,
        active: false,
        processed: 1,
        failed: 0,
      });
    });
  });
});
