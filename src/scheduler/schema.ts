/**
 * Scheduler Module - Schemas and Types
 *
 * Tasks are frozen values: created by a producer, executed once by the single
 * worker, then dropped.
 */
import type { HubOperation, RetryPolicy } from "../transport/schema.js";

/**
 * Two classes: user commands always run before pending background refreshes.
 */
export const TaskPriority = {
  Command: 0,
  Poll: 1,
} as const;

export type TaskPriority = (typeof TaskPriority)[keyof typeof TaskPriority];

/**
 * Called once with the operation's value after it succeeded.
 */
export type TaskCallback = (result: unknown) => void | Promise<void>;

export type Task = Readonly<{
  priority: TaskPriority;
  /** Assigned at enqueue time; breaks ties within a priority class */
  sequence: number;
  operation: HubOperation<unknown>;
  description: string;
  /** Route a zone-map result to batch publication */
  isPoll: boolean;
  onComplete: TaskCallback | null;
}>;

export type TaskRequest = Readonly<{
  priority: TaskPriority;
  operation: HubOperation<unknown>;
  description: string;
  isPoll?: boolean;
  onComplete?: TaskCallback;
}>;

export type SchedulerOptions = Readonly<{
  retryPolicy: RetryPolicy;
  /** Worker pause after a command task */
  commandThrottleMs: number;
  /** Worker pause after a poll task */
  pollThrottleMs: number;
}>;

export type QueueInfo = Readonly<{
  queued: number;
  active: boolean;
  processed: number;
  failed: number;
}>;

export type Scheduler = Readonly<{
  /** Queue a task; never waits on the transport */
  enqueue: (request: TaskRequest) => Task;
  start: () => void;
  /** Stop after the task in flight; pending tasks are dropped */
  stop: () => Promise<void>;
  /** Resolves once the queue is empty and no task is executing */
  onIdle: () => Promise<void>;
  getQueueInfo: () => QueueInfo;
}>;

/**
 * Guarantees at most one poll task enqueued or executing.
 */
export type PollCoalescer = Readonly<{
  /** Claim the poll slot; false when a poll is already outstanding */
  tryStartPoll: () => boolean;
  /** Release the slot once the poll task has run, whatever the outcome */
  markPollFinished: () => void;
  isPollPending: () => boolean;
}>;
