/**
 * Scheduler Module - Public API
 */

export type {
  PollCoalescer,
  QueueInfo,
  Scheduler,
  SchedulerOptions,
  Task,
  TaskCallback,
  TaskRequest,
} from "./schema.js";

export { TaskPriority } from "./schema.js";

export { createPollCoalescer } from "./poll-coalescer.js";
export { compareTasks, createTaskQueue } from "./queue.js";
export { createScheduler } from "./service.js";
export type { SchedulerDeps } from "./service.js";
