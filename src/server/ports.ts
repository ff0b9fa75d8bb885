import { PortRange } from "../types";
import { HarnessError, NoAvailablePortError, errorCode } from "../util/errors";

export const DEFAULT_PORT_RANGE: PortRange = { first: 4443, last: 4542 };

const SKIPPABLE_BIND_CODES = new Set(["EADDRINUSE", "EACCES"]);

export interface AcquiredPort<T> {
  port: number;
  value: T;
}

export function validatePortRange(range: PortRange): PortRange {
  const { first, last } = range;
  if (!isPort(first) || !isPort(last)) {
    throw new HarnessError(`port range bounds must be integers in 1-65535, got ${first}-${last}`);
  }
  if (first > last) {
    throw new HarnessError(`port range is empty: ${first}-${last}`);
  }
  return { first, last };
}

/**
 * Calls `attempt` for each port of `range` in ascending order and returns the
 * first one that binds. Only "in use" and "permission denied" failures move on
 * to the next port.
 */
export async function acquirePort<T>(
  range: PortRange,
  attempt: (port: number) => Promise<T>
): Promise<AcquiredPort<T>> {
  const { first, last } = validatePortRange(range);

  for (let port = first; port <= last; port += 1) {
    try {
      const value = await attempt(port);
      return { port, value };
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && SKIPPABLE_BIND_CODES.has(code)) {
        continue;
      }
      throw error;
    }
  }

  throw new NoAvailablePortError(first, last);
}

function isPort(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 65535;
}
