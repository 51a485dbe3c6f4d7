/**
 * Scheduler Module - Poll Coalescer
 *
 * The refresh timer fires regardless of how long a full refresh takes. The
 * flag keeps at most one poll task outstanding so a slow refresh never piles
 * up redundant low-priority work.
 *
 * The flag has no relation to the transport lock: checking it never waits on
 * hub I/O. Check-and-set is one synchronous step, so producers cannot
 * interleave between them.
 */
import type { PollCoalescer } from "./schema.js";

export function createPollCoalescer(): PollCoalescer {
  let pending = false;

  return {
    tryStartPoll: () => {
      if (pending) {
        return false;
      }
      pending = true;
      return true;
    },

    markPollFinished: () => {
      pending = false;
    },

    isPollPending: () => pending,
  };
}
