/**
 * @payledger/cli — Structured logging.
 *
 * JSON logs via pino, always on stderr so stdout carries only the CSV.
 * Development runs get pino-pretty: as a transport when logging to fd 2,
 * as an in-process stream when a destination is injected.
 */

import type { Writable } from "node:stream";
import pino from "pino";
import type { Logger } from "pino";
import { build as prettyStream } from "pino-pretty";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: Writable,
): Logger {
  const options = { level: config.LOG_LEVEL };

  if (config.NODE_ENV === "development") {
    if (destination === undefined) {
      return pino({
        ...options,
        transport: { target: "pino-pretty", options: { destination: 2 } },
      });
    }
    return pino(options, prettyStream({ destination, colorize: false }));
  }

  return pino(options, destination ?? pino.destination(2));
}
