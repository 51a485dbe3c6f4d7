/**
 * Scheduler Module - Poll Coalescer Tests
 */
import { describe, expect, it } from "vitest";

import { createPollCoalescer } from "../poll-coalescer.js";

describe("createPollCoalescer", () => {
  it("grants the first claim and refuses the next", () => {
    const gate = createPollCoalescer();

    expect(gate.tryStartPoll()).toBe(true);
    expect(gate.tryStartPoll()).toBe(false);
    expect(gate.isPollPending()).toBe(true);
  });

  it("grants a new claim once the poll finished", () => {
    const gate = createPollCoalescer();
    gate.tryStartPoll();

    gate.markPollFinished();

    expect(gate.isPollPending()).toBe(false);
    expect(gate.tryStartPoll()).toBe(true);
  });

  it("admits exactly one poll across a burst of timer ticks", () => {
    const gate = createPollCoalescer();

    const granted = Array.from({ length: 50 }, () => gate.tryStartPoll()).filter(Boolean);

    expect(granted).toHaveLength(1);
  });

  it("clears unconditionally", () => {
    const gate = createPollCoalescer();

    gate.markPollFinished();

    expect(gate.isPollPending()).toBe(false);
  });
});
