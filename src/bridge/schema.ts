/**
 * Bridge Module - Types
 */
import type { Task } from "../scheduler/schema.js";

/**
 * A recognised `<base>/<name>/set/<attribute>` topic.
 */
export type CommandTopic =
  | Readonly<{ kind: "target"; zone: string }>
  | Readonly<{ kind: "mode"; zone: string }>
  | Readonly<{ kind: "hotwater" }>;

export type BridgeOptions = Readonly<{
  baseTopic: string;
  /** Period of the poll timer */
  pollIntervalMs: number;
  /** Pause after each zone read within one poll */
  zoneReadDelayMs: number;
}>;

export type Bridge = Readonly<{
  /** Turn an inbound MQTT message into a command task; null when dropped */
  handleMessage: (topic: string, payload: string) => Task | null;
  /** Queue a full refresh unless one is already outstanding */
  requestPoll: () => boolean;
  startPolling: () => void;
  stopPolling: () => void;
  subscriptionTopics: () => string[];
}>;
