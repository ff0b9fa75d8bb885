import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { ReleaseArtifact, ServedContent } from "../types";
import { translatePath } from "../server/translatePath";
import { HarnessError } from "../util/errors";

export const RELEASE_INDEX_PATH = "letsencrypt/json";
export const ARTIFACT_NAME = "letsencrypt-auto";
export const SIGNATURE_NAME = "letsencrypt-auto.sig";

export function artifactPath(version: string): string {
  return `${version}/${ARTIFACT_NAME}`;
}

/** True for a request of `<anything>/letsencrypt-auto` or its `.sig`, query ignored. */
export function isArtifactRequestPath(requestPath: string): boolean {
  const pathOnly = requestPath.split(/[?#]/, 1)[0];
  const name = pathOnly.slice(pathOnly.lastIndexOf("/") + 1);
  return name === ARTIFACT_NAME || name === SIGNATURE_NAME;
}

export function signaturePath(version: string): string {
  return `${version}/${SIGNATURE_NAME}`;
}

export function releaseIndexDocument(versions: string[]): string {
  const releases: Record<string, null> = {};
  for (const version of versions) {
    releases[version] = null;
  }
  return JSON.stringify({ releases });
}

export function directoryListingPage(entries: string[]): string {
  const items = entries.map((entry) => `<li><a href="${escapeHtml(entry)}">${escapeHtml(entry)}</a></li>`);
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head><title>Directory listing for /</title></head>",
    "<body>",
    "<h2>Directory listing for /</h2>",
    "<ul>",
    ...items,
    "</ul>",
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

/**
 * The content one scenario serves: the listing, the release index and, when a
 * release is offered, its artifact and detached signature.
 */
export function buildServedContent(indexVersions: string[], release: ReleaseArtifact | null): ServedContent {
  const content: ServedContent = {
    "": directoryListingPage(["letsencrypt/"]),
    [RELEASE_INDEX_PATH]: releaseIndexDocument(indexVersions)
  };

  if (release) {
    content[artifactPath(release.version)] = release.content;
    content[signaturePath(release.version)] = release.signature;
  }

  return content;
}

/** Replaces everything under `root` with `content`. */
export async function writeServedContent(root: string, content: ServedContent): Promise<string[]> {
  const resolvedRoot = path.resolve(root);
  await mkdir(resolvedRoot, { recursive: true });
  for (const entry of await readdir(resolvedRoot)) {
    await rm(path.join(resolvedRoot, entry), { recursive: true, force: true });
  }

  const written: string[] = [];
  for (const [requestPath, body] of Object.entries(content)) {
    let target = translatePath(resolvedRoot, `/${requestPath}`);
    if (target === resolvedRoot) {
      if (requestPath.replace(/\//g, "") !== "") {
        throw new HarnessError(`served path resolves to the fixture root: '${requestPath}'`);
      }
      target = path.join(resolvedRoot, "index.html");
    }

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, body);
    written.push(target);
  }

  return written;
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}
