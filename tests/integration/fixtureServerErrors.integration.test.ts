import { readFileSync } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createEphemeralDir, removeEphemeralDir } from "../../src/fixture/ephemeralDir";
import { buildServedContent, writeServedContent } from "../../src/fixture/servedContent";
import { withFixtureServer } from "../../src/server/fixtureServer";
import { fetchTrusted } from "../../src/util/http";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  const readFile = (...args: Parameters<typeof actual.readFile>) =>
    String(args[0]).endsWith("unreadable") ? Promise.reject(new Error("read failed")) : actual.readFile(...args);
  return { ...actual, default: { ...actual, readFile }, readFile };
});

const certDir = path.join(process.cwd(), "fixtures/certs/localhost");
const tls = {
  cert: readFileSync(path.join(certDir, "server.crt"), "utf8"),
  key: readFileSync(path.join(certDir, "server.key"), "utf8")
};

describe("fixture server request failures", () => {
  let root: string;

  beforeEach(async () => {
    root = await createEphemeralDir("le-fixture-root-");
    await writeServedContent(root, {
      ...buildServedContent(["99.9.9"], null),
      "99.9.9/unreadable": "never served"
    });
  });

  afterEach(async () => {
    await removeEphemeralDir(root);
  });

  test("a request that fails while being served is still recorded", async () => {
    await withFixtureServer({ root, tls }, async (server) => {
      const response = await fetchTrusted(`${server.url}99.9.9/unreadable`, { ca: tls.cert });

      expect(response.status).toBe(500);
      expect(server.requests).toEqual([{ method: "GET", path: "/99.9.9/unreadable", status: 500 }]);
      expect(server.wasRequested("99.9.9/unreadable")).toBe(true);
    });
  });
});
