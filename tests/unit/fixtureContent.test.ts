import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { diffSnapshots, snapshotDir } from "../../src/fixture/dirSnapshot";
import { withEphemeralDir } from "../../src/fixture/ephemeralDir";
import {
  buildServedContent,
  directoryListingPage,
  releaseIndexDocument,
  writeServedContent
} from "../../src/fixture/servedContent";
import { ReleaseArtifact } from "../../src/types";

describe("served content", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "le-served-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("release index lists versions with null metadata", () => {
    expect(releaseIndexDocument(["99.9.9", "99.9.10"])).toBe('{"releases":{"99.9.9":null,"99.9.10":null}}');
  });

  test("directory listing links every entry", () => {
    const page = directoryListingPage(["letsencrypt/"]);
    expect(page.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(page).toContain('<li><a href="letsencrypt/">letsencrypt/</a></li>');
  });

  test("builds the per-scenario map with artifact and signature at versioned paths", () => {
    const release: ReleaseArtifact = {
      version: "99.9.9",
      content: Buffer.from("script"),
      signature: Buffer.from([1, 2, 3]),
      tamper: "none"
    };

    const content = buildServedContent(["99.9.9"], release);
    expect(Object.keys(content)).toEqual([
      "",
      "letsencrypt/json",
      "99.9.9/letsencrypt-auto",
      "99.9.9/letsencrypt-auto.sig"
    ]);
    expect(content["99.9.9/letsencrypt-auto.sig"]).toEqual(Buffer.from([1, 2, 3]));

    expect(Object.keys(buildServedContent(["99.9.9"], null))).toEqual(["", "letsencrypt/json"]);
  });

  test("writes content under the root and clears what a previous scenario left", async () => {
    await writeFile(path.join(root, "stale.txt"), "old", "utf8");

    await writeServedContent(root, {
      "": "<html></html>",
      "letsencrypt/json": '{"releases":{}}',
      "99.9.9/letsencrypt-auto": Buffer.from("#!/bin/sh\n")
    });

    expect(await readFile(path.join(root, "index.html"), "utf8")).toBe("<html></html>");
    expect(await readFile(path.join(root, "letsencrypt", "json"), "utf8")).toBe('{"releases":{}}');
    expect(await readFile(path.join(root, "99.9.9", "letsencrypt-auto"), "utf8")).toBe("#!/bin/sh\n");
    expect(await stat(path.join(root, "stale.txt")).catch(() => null)).toBeNull();
  });

  test("keeps traversing keys inside the root", async () => {
    const written = await writeServedContent(root, { "../escape": "x" });
    expect(written).toEqual([path.join(root, "escape")]);
    expect(await readFile(path.join(root, "escape"), "utf8")).toBe("x");
  });
});

describe("ephemeral directories", () => {
  test("removes the directory after the callback resolves", async () => {
    let seen = "";
    const result = await withEphemeralDir(async (dir) => {
      seen = dir;
      await writeFile(path.join(dir, "marker"), "x", "utf8");
      return "done";
    });

    expect(result).toBe("done");
    expect(path.basename(seen).startsWith("le-test-")).toBe(true);
    expect(await stat(seen).catch(() => null)).toBeNull();
  });

  test("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withEphemeralDir(async (dir) => {
        seen = dir;
        throw new Error("scenario blew up");
      })
    ).rejects.toThrow("scenario blew up");

    expect(seen).not.toBe("");
    expect(await stat(seen).catch(() => null)).toBeNull();
  });
});

describe("directory snapshots", () => {
  test("reports added, removed and changed files", async () => {
    await withEphemeralDir(async (dir) => {
      await writeFile(path.join(dir, "a.txt"), "a", "utf8");
      await mkdir(path.join(dir, "sub"));
      await writeFile(path.join(dir, "sub", "b.txt"), "b", "utf8");
      const before = await snapshotDir(dir);

      await writeFile(path.join(dir, "a.txt"), "A", "utf8");
      await rm(path.join(dir, "sub", "b.txt"));
      await writeFile(path.join(dir, "c.txt"), "c", "utf8");
      const after = await snapshotDir(dir);

      expect(diffSnapshots(before, after)).toEqual({
        added: ["c.txt"],
        removed: ["sub/b.txt"],
        changed: ["a.txt"]
      });
      expect(diffSnapshots(after, after)).toEqual({ added: [], removed: [], changed: [] });
    });
  });
});
