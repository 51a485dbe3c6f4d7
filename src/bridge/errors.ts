/**
 * Bridge Module - Error Types
 *
 * Malformed inbound messages. They are logged at the producer boundary and
 * never reach the queue.
 */

export type CommandParseError =
  | { readonly type: "UNKNOWN_TOPIC"; readonly message: string; readonly topic: string }
  | { readonly type: "INVALID_TARGET"; readonly message: string; readonly payload: string }
  | {
      readonly type: "INVALID_HOT_WATER_STATE";
      readonly message: string;
      readonly payload: string;
    };

export function unknownTopic(topic: string): CommandParseError {
  return { type: "UNKNOWN_TOPIC", message: "Not a command topic", topic };
}

export function invalidTarget(payload: string): CommandParseError {
  return { type: "INVALID_TARGET", message: "Target is not a number", payload };
}

export function invalidHotWaterState(payload: string): CommandParseError {
  return {
    type: "INVALID_HOT_WATER_STATE",
    message: "Hot water state must be ON or OFF",
    payload,
  };
}

export function formatCommandParseError(error: CommandParseError): string {
  switch (error.type) {
    case "UNKNOWN_TOPIC":
      return `${error.message}: ${error.topic}`;
    case "INVALID_TARGET":
    case "INVALID_HOT_WATER_STATE":
      return `${error.message}: "${error.payload}"`;
  }
}
