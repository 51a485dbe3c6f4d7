/**
 * Logging for the Heatmiser MQTT Bridge.
 *
 * One root pino logger; every module gets a child bound to its name and a
 * colour tag, so development output reads `[transport] Reconnecting...`.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Colour per module (ANSI escape codes).
 */
const MODULE_COLORS = {
  app: "\x1b[97m", // bright white
  bridge: "\x1b[34m", // blue
  scheduler: "\x1b[33m", // yellow
  transport: "\x1b[35m", // magenta
  hub: "\x1b[36m", // cyan
  heatmiser: "\x1b[32m", // green
  mqtt: "\x1b[91m", // bright red
  publisher: "\x1b[94m", // bright blue
  discovery: "\x1b[95m", // bright magenta
  zones: "\x1b[37m", // white
} as const;

const RESET = "\x1b[0m";

export type ModuleName = keyof typeof MODULE_COLORS;

const root =
  config.NODE_ENV === "development"
    ? pino({
        level: config.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            messageFormat: "{tag} {msg}",
            ignore: "pid,hostname,module,tag",
            translateTime: "HH:MM:ss",
          },
        },
      })
    : pino({ level: config.LOG_LEVEL });

/**
 * Logger for one module.
 *
 * @example
 * const log = createLogger("hub");
 * log.info({ target }, "Hub connection opened");
 */
export function createLogger(module: ModuleName): pino.Logger {
  const bindings: Record<string, string> = { module };
  if (config.NODE_ENV === "development") {
    bindings.tag = `${MODULE_COLORS[module]}[${module}]${RESET}`;
  }
  return root.child(bindings);
}

// =============================================================================
// Lifecycle Steps
// =============================================================================

/**
 * Startup and shutdown are logged as steps: begun, done with a duration, or
 * failed with the error message.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `${operation}...`);
}

export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info({ operation, durationMs, ...context }, `${operation} done in ${durationMs}ms`);
}

export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ operation, error: message, ...context }, `${operation} failed: ${message}`);
}
