import pino, { type Logger } from "pino";

/** Harness logs go to stderr; stdout is reserved for command output. */
export function createLogger(verbose = false): Logger {
  return pino({ name: "le-auto-harness", level: verbose ? "debug" : "info" }, pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
