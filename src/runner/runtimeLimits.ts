import { HarnessError } from "../util/errors";

export const DEFAULT_RUN_TIMEOUT_MS = 300_000;

export function readRunTimeoutMs(fallback = DEFAULT_RUN_TIMEOUT_MS, env: NodeJS.ProcessEnv = process.env): number {
  return readPositiveIntegerEnv("LE_HARNESS_RUN_TIMEOUT_MS", fallback, env);
}

export function readPortOverride(
  name: "LE_HARNESS_PORT_FIRST" | "LE_HARNESS_PORT_LAST",
  env: NodeJS.ProcessEnv = process.env
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return readPositiveIntegerEnv(name, 0, env);
}

export function readPositiveIntegerEnv(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new HarnessError(`${name} must be an integer >= 1`);
  }

  return value;
}
