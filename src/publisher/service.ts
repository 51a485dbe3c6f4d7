/**
 * Publisher Module - Service Layer
 *
 * Writes zone and hot water state to MQTT. The immediate path runs from a
 * command's completion callback, after the command has re-read its zone; the
 * batch path from a finished poll. Neither touches the hub itself.
 */
import { createLogger } from "../logger.js";
import type { ZoneRegistry } from "../zones/schema.js";
import type {
  MessagePublisher,
  OutboundMessage,
  StatePublisher,
} from "./schema.js";
import {
  hotWaterStateMessage,
  pollResultMessages,
  snapshotZone,
  zoneStateMessages,
} from "./transform.js";

const log = createLogger("publisher");

export type StatePublisherDeps = Readonly<{
  client: MessagePublisher;
  registry: ZoneRegistry;
  baseTopic: string;
}>;

export function createStatePublisher(deps: StatePublisherDeps): StatePublisher {
  const { client, registry, baseTopic } = deps;

  const publishAll = (messages: readonly OutboundMessage[]): void => {
    for (const message of messages) {
      client.publish(message);
    }
  };

  return {
    publishZoneUpdate(zoneName, overrides) {
      const zone = registry.zones.get(zoneName);
      if (!zone) {
        log.warn({ zone: zoneName }, "Update for unknown zone ignored");
        return;
      }

      const state = { ...snapshotZone(zone), ...overrides };
      publishAll(zoneStateMessages(baseTopic, zoneName, state));
      log.debug({ zone: zoneName, ...state }, "Immediate state published");
    },

    publishHotWaterState(state) {
      if (!registry.hotWater) {
        return;
      }
      client.publish(hotWaterStateMessage(baseTopic, state));
      log.debug({ hwState: state }, "Hot water state published");
    },

    publishPollResults(results) {
      const messages = pollResultMessages(baseTopic, results, registry.hotWater !== null);
      publishAll(messages);
      log.debug(
        { zones: Object.keys(results).length, messages: messages.length },
        "Poll results published",
      );
    },
  };
}
