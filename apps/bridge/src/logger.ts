import { pino } from "pino";
import type { BridgeConfig } from "./config/index.js";

/**
 * Structured logger shape used across the bridge. Calls follow the pino convention:
 * bindings first, message second.
 */
export interface LoggerLike {
  error(bindings: Record<string, unknown>, message: string): void;
  error(message: string): void;
  warn(bindings: Record<string, unknown>, message: string): void;
  warn(message: string): void;
  info(bindings: Record<string, unknown>, message: string): void;
  info(message: string): void;
  debug(bindings: Record<string, unknown>, message: string): void;
  debug(message: string): void;
}

export function createLogger(level: BridgeConfig["logLevel"]): LoggerLike {
  return pino({
    name: "mqtt-relay",
    level
  });
}

export function getErrorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
