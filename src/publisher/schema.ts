/**
 * Publisher Module - Schemas and Types
 *
 * Zone state as published to MQTT. A poll task resolves to PollResults; the
 * worker validates the value against PollResultsSchema before routing it to
 * the batch path.
 */
import { z } from "zod";

// =============================================================================
// Zone State
// =============================================================================

export const ZoneModeSchema = z.enum(["heat", "off"]);
export const ZoneActionSchema = z.enum(["heating", "idle"]);
export const HotWaterStateSchema = z.enum(["ON", "OFF"]);

export const ZoneStateSchema = z.object({
  temperature: z
    .number()
    .nullable()
    .describe("Selected sensor in °C, null when the sensor is not fitted"),
  target: z.number().describe("Target temperature in °C"),
  mode: ZoneModeSchema.describe("off while frost protection is active"),
  action: ZoneActionSchema.describe("heating while the output relay is on"),
});

export const HotWaterEntrySchema = z.object({
  hw_state: HotWaterStateSchema,
});

/**
 * Zone name to zone state, plus the optional "hotwater" entry.
 */
export const PollResultsSchema = z.record(
  z.string(),
  z.union([ZoneStateSchema, HotWaterEntrySchema]),
);

export type ZoneMode = z.infer<typeof ZoneModeSchema>;
export type ZoneAction = z.infer<typeof ZoneActionSchema>;
export type ZoneState = z.infer<typeof ZoneStateSchema>;
export type HotWaterEntry = z.infer<typeof HotWaterEntrySchema>;
export type PollResults = z.infer<typeof PollResultsSchema>;

/**
 * Commanded values laid over the cached snapshot on the immediate path.
 */
export type ZoneOverrides = Readonly<Partial<ZoneState>>;

/**
 * Published attributes, in publication order.
 */
export const ZONE_ATTRIBUTES = ["temperature", "target", "mode", "action"] as const;

export type ZoneAttribute = (typeof ZONE_ATTRIBUTES)[number];

// =============================================================================
// Outbound Messages
// =============================================================================

export type OutboundMessage = Readonly<{
  topic: string;
  payload: string;
  retain: boolean;
}>;

/**
 * The slice of the MQTT client the publisher needs.
 */
export type MessagePublisher = Readonly<{
  publish: (message: OutboundMessage) => void;
}>;

export type StatePublisher = Readonly<{
  /** Immediate path: cached snapshot overlaid with the commanded values */
  publishZoneUpdate: (zoneName: string, overrides: ZoneOverrides) => void;
  /** Immediate path for the hot water switch */
  publishHotWaterState: (state: HotWaterEntry["hw_state"]) => void;
  /** Batch path for a completed poll */
  publishPollResults: (results: PollResults) => void;
}>;
