/**
 * Scheduler Module - Service Layer
 *
 * Priority work queue with a single worker. The worker is the only caller of
 * the transport arbiter, so hub access is serialized in (priority, sequence)
 * order: commands overtake queued polls, FIFO within a class.
 *
 * A failed task is logged and dropped. Nothing a task does can end the loop.
 */
import { createLogger } from "../logger.js";
import { PollResultsSchema, type StatePublisher } from "../publisher/schema.js";
import { formatTransportError } from "../transport/errors.js";
import type { TransportArbiter } from "../transport/schema.js";
import { createTaskQueue } from "./queue.js";
import type {
  PollCoalescer,
  Scheduler,
  SchedulerOptions,
  Task,
} from "./schema.js";

const log = createLogger("scheduler");

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type SchedulerDeps = Readonly<{
  arbiter: Pick<TransportArbiter, "execute">;
  pollGate: Pick<PollCoalescer, "markPollFinished">;
  publisher: Pick<StatePublisher, "publishPollResults">;
}>;

export function createScheduler(deps: SchedulerDeps, options: SchedulerOptions): Scheduler {
  const { arbiter, pollGate, publisher } = deps;
  const queue = createTaskQueue<Task>();

  let nextSequence = 0;
  let running = false;
  let active = false;
  let processed = 0;
  let failed = 0;
  let loop: Promise<void> | null = null;
  let wake: (() => void) | null = null;
  let idleWaiters: Array<() => void> = [];

  // ===========================================================================
  // Signalling
  // ===========================================================================

  const signalWork = (): void => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  const waitForWork = (): Promise<void> =>
    new Promise((resolve) => {
      wake = resolve;
    });

  const isIdle = (): boolean => queue.size() === 0 && !active;

  const settleIdle = (): void => {
    if (!isIdle()) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  };

  // ===========================================================================
  // Task Execution
  // ===========================================================================

  const invokeCallback = async (task: Task, value: unknown): Promise<void> => {
    if (!task.onComplete) return;
    try {
      await task.onComplete(value);
    } catch (error) {
      log.warn(
        { task: task.description, error: errorMessage(error) },
        "Task callback failed",
      );
    }
  };

  const routePollResults = (task: Task, value: unknown): void => {
    const parsed = PollResultsSchema.safeParse(value);
    if (!parsed.success) {
      log.warn(
        { task: task.description, issues: parsed.error.issues.length },
        "Poll task returned malformed results; not published",
      );
      return;
    }
    try {
      publisher.publishPollResults(parsed.data);
    } catch (error) {
      log.error(
        { task: task.description, error: errorMessage(error) },
        "Publishing poll results failed",
      );
    }
  };

  const runTask = async (task: Task): Promise<void> => {
    log.debug(
      { task: task.description, priority: task.priority, sequence: task.sequence },
      "Executing task",
    );

    try {
      const result = await arbiter.execute(task.operation, options.retryPolicy);
      if (result.isErr()) {
        failed++;
        log.error(
          { task: task.description, error: formatTransportError(result.error) },
          "Task failed",
        );
        return;
      }

      processed++;
      await invokeCallback(task, result.value);
      if (task.isPoll) {
        routePollResults(task, result.value);
      }
    } catch (error) {
      failed++;
      log.error({ task: task.description, error: errorMessage(error) }, "Task threw");
    } finally {
      if (task.isPoll) {
        pollGate.markPollFinished();
      }
    }
  };

  const runLoop = async (): Promise<void> => {
    log.info("Worker started");
    while (running) {
      const task = queue.pop();
      if (!task) {
        settleIdle();
        await waitForWork();
        continue;
      }

      active = true;
      try {
        await runTask(task);
      } finally {
        active = false;
      }
      settleIdle();

      if (!running) break;
      await sleep(task.isPoll ? options.pollThrottleMs : options.commandThrottleMs);
    }
    log.info("Worker stopped");
  };

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    enqueue(request) {
      const task: Task = Object.freeze({
        priority: request.priority,
        sequence: nextSequence++,
        operation: request.operation,
        description: request.description,
        isPoll: request.isPoll ?? false,
        onComplete: request.onComplete ?? null,
      });

      queue.push(task);
      log.debug(
        { task: task.description, priority: task.priority, queued: queue.size() },
        "Task queued",
      );
      signalWork();
      return task;
    },

    start() {
      if (running) return;
      running = true;
      loop = runLoop().catch((error: unknown) => {
        running = false;
        log.fatal({ error: errorMessage(error) }, "Worker loop crashed");
      });
    },

    async stop() {
      if (!running) return;
      running = false;

      for (const task of queue.clear()) {
        log.warn({ task: task.description }, "Dropping queued task on shutdown");
        if (task.isPoll) {
          pollGate.markPollFinished();
        }
      }

      signalWork();
      await loop;
      loop = null;
      settleIdle();
    },

    onIdle() {
      if (isIdle()) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    getQueueInfo: () => ({
      queued: queue.size(),
      active,
      processed,
      failed,
    }),
  };
}
