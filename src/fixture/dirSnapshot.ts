import { createHash } from "node:crypto";
import { lstat, readdir, readFile, readlink } from "node:fs/promises";
import path from "node:path";

export interface DirSnapshot {
  root: string;
  /** Relative POSIX path -> sha256 hex of the file bytes (or of the link target for symlinks). */
  entries: Map<string, string>;
}

export interface SnapshotDiff {
  added: string[];
  removed: string[];
  changed: string[];
}

export async function snapshotDir(root: string): Promise<DirSnapshot> {
  const resolved = path.resolve(root);
  const entries = new Map<string, string>();

  const walk = async (dir: string): Promise<void> => {
    const children = await readdir(dir, { withFileTypes: true });
    for (const child of children) {
      const absPath = path.join(dir, child.name);
      const rel = path.relative(resolved, absPath).split(path.sep).join("/");
      const info = await lstat(absPath);

      if (info.isSymbolicLink()) {
        entries.set(rel, sha256Hex(`symlink\0${await readlink(absPath)}`));
        continue;
      }

      if (info.isDirectory()) {
        entries.set(`${rel}/`, "dir");
        await walk(absPath);
        continue;
      }

      if (info.isFile()) {
        entries.set(rel, sha256Hex(await readFile(absPath)));
      }
    }
  };

  await walk(resolved);
  return { root: resolved, entries };
}

export function diffSnapshots(before: DirSnapshot, after: DirSnapshot): SnapshotDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [rel, digest] of after.entries) {
    const previous = before.entries.get(rel);
    if (previous === undefined) {
      added.push(rel);
    } else if (previous !== digest) {
      changed.push(rel);
    }
  }

  for (const rel of before.entries.keys()) {
    if (!after.entries.has(rel)) {
      removed.push(rel);
    }
  }

  return { added: added.sort(), removed: removed.sort(), changed: changed.sort() };
}

export function isEmptyDiff(diff: SnapshotDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}

function sha256Hex(value: string | Buffer): string {
  return createHash("sha256").update(value).digest("hex");
}
