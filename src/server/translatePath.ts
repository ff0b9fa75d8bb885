import path from "node:path";

const DRIVE_PREFIX_RE = /^[A-Za-z]:/;

/**
 * Maps a `/`-separated request path onto a file under `root`.
 *
 * Query strings and fragments are dropped. Drive prefixes, backslash-separated
 * directories and `.`/`..` words are discarded, so the result never leaves
 * `root`.
 */
export function translatePath(root: string, requestPath: string): string {
  let raw = requestPath.split("?", 1)[0];
  raw = raw.split("#", 1)[0];

  const normalized = path.posix.normalize(safeDecode(raw));
  const words = normalized.split("/").filter((word) => word.length > 0);

  let out = path.resolve(root);
  for (const rawWord of words) {
    const withoutDrive = rawWord.replace(DRIVE_PREFIX_RE, "");
    const segments = withoutDrive.split("\\");
    const word = segments[segments.length - 1];
    if (word === "" || word === "." || word === "..") {
      continue;
    }
    out = path.join(out, word);
  }

  return out;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
