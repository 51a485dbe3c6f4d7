/**
 * Discovery Module - Service Layer
 */
import { createLogger } from "../logger.js";
import type { MessagePublisher } from "../publisher/schema.js";
import type { ZoneRegistry } from "../zones/schema.js";
import type { DiscoveryOptions } from "./schema.js";
import { discoveryMessages } from "./transform.js";

const log = createLogger("discovery");

/**
 * Publish discovery config. Runs on every broker connect.
 */
export function publishDiscovery(
  client: MessagePublisher,
  registry: ZoneRegistry,
  options: DiscoveryOptions,
): void {
  const messages = discoveryMessages(registry, options);
  for (const message of messages) {
    client.publish(message);
  }
  log.info(
    { zones: registry.zones.size, hotWater: registry.hotWater !== null },
    "Published discovery config",
  );
}
