import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

export const DEFAULT_EPHEMERAL_PREFIX = "le-test-";

export async function createEphemeralDir(prefix = DEFAULT_EPHEMERAL_PREFIX): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeEphemeralDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Runs `fn` with a fresh temp directory that is removed however `fn` settles. */
export async function withEphemeralDir<T>(
  fn: (dir: string) => Promise<T>,
  prefix = DEFAULT_EPHEMERAL_PREFIX
): Promise<T> {
  const dir = await createEphemeralDir(prefix);
  try {
    return await fn(dir);
  } finally {
    await removeEphemeralDir(dir);
  }
}
