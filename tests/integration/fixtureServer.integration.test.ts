import { readFile } from "node:fs/promises";
import { createServer, type Server } from "node:net";
import path from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, test } from "vitest";
import { createEphemeralDir, removeEphemeralDir } from "../../src/fixture/ephemeralDir";
import { buildServedContent, writeServedContent } from "../../src/fixture/servedContent";
import { startFixtureServer, withFixtureServer } from "../../src/server/fixtureServer";
import { TlsMaterial } from "../../src/types";
import { NoAvailablePortError } from "../../src/util/errors";
import { fetchTrusted, probeFixture } from "../../src/util/http";

const certDir = path.join(process.cwd(), "fixtures/certs/localhost");

describe("fixture server", () => {
  let tls: TlsMaterial;
  let root: string;

  beforeAll(async () => {
    tls = {
      cert: await readFile(path.join(certDir, "server.crt"), "utf8"),
      key: await readFile(path.join(certDir, "server.key"), "utf8")
    };
  });

  beforeEach(async () => {
    root = await createEphemeralDir("le-fixture-root-");
    await writeServedContent(root, {
      ...buildServedContent(["99.9.9"], null),
      "99.9.9/letsencrypt-auto": Buffer.from("#!/bin/sh\n")
    });
  });

  afterEach(async () => {
    await removeEphemeralDir(root);
  });

  test("serves the fixture root over TLS and records requests", async () => {
    await withFixtureServer({ root, tls }, async (server) => {
      expect(server.url).toBe(`https://127.0.0.1:${server.port}/`);
      expect(await probeFixture(server.url, tls.cert)).toBe(200);

      const index = await fetchTrusted(`${server.url}letsencrypt/json`, { ca: tls.cert });
      expect(index.status).toBe(200);
      expect(index.contentType).toBe("application/json");
      expect(JSON.parse(index.body.toString("utf8"))).toEqual({ releases: { "99.9.9": null } });

      const artifact = await fetchTrusted(`${server.url}99.9.9/letsencrypt-auto`, { ca: tls.cert });
      expect(artifact.contentType).toBe("application/octet-stream");
      expect(artifact.body.toString("utf8")).toBe("#!/bin/sh\n");

      const listing = await fetchTrusted(server.url, { ca: tls.cert });
      expect(listing.contentType).toBe("text/html; charset=utf-8");
      expect(listing.body.toString("utf8")).toContain("Directory listing for /");

      const missing = await fetchTrusted(`${server.url}99.9.9/letsencrypt-auto.sig`, { ca: tls.cert });
      expect(missing.status).toBe(404);

      expect(server.requests).toEqual([
        { method: "HEAD", path: "/", status: 200 },
        { method: "GET", path: "/letsencrypt/json", status: 200 },
        { method: "GET", path: "/99.9.9/letsencrypt-auto", status: 200 },
        { method: "GET", path: "/", status: 200 },
        { method: "GET", path: "/99.9.9/letsencrypt-auto.sig", status: 404 }
      ]);
      expect(server.wasRequested("99.9.9/letsencrypt-auto")).toBe(true);
      expect(server.wasRequested("/letsencrypt/json")).toBe(true);
      expect(server.wasRequested("99.9.10/letsencrypt-auto")).toBe(false);
    });
  });

  test("HEAD answers without a body", async () => {
    await withFixtureServer({ root, tls }, async (server) => {
      const head = await fetchTrusted(`${server.url}99.9.9/letsencrypt-auto`, { ca: tls.cert, method: "HEAD" });
      expect(head.status).toBe(200);
      expect(head.body.length).toBe(0);
    });
  });

  test("a port is free for the next server once close resolves", async () => {
    const first = await startFixtureServer({ root, tls });
    const port = first.port;
    await first.close();
    await first.close();

    const second = await startFixtureServer({ root, tls, portRange: { first: port, last: port } });
    try {
      expect(second.port).toBe(port);
    } finally {
      await second.close();
    }
  });

  test("withFixtureServer closes the server when the callback throws", async () => {
    let port = 0;
    await expect(
      withFixtureServer({ root, tls }, async (server) => {
        port = server.port;
        throw new Error("assertion failed mid-scenario");
      })
    ).rejects.toThrow("assertion failed mid-scenario");

    const reused = await startFixtureServer({ root, tls, portRange: { first: port, last: port } });
    expect(reused.port).toBe(port);
    await reused.close();
  });

  test("fails with a distinct error when every port in the range is taken", async () => {
    const blocker = await listenOnFreePort();
    try {
      const address = blocker.address();
      const port = address && typeof address !== "string" ? address.port : 0;

      await expect(startFixtureServer({ root, tls, portRange: { first: port, last: port } })).rejects.toBeInstanceOf(
        NoAvailablePortError
      );
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });
});

function listenOnFreePort(): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve(server));
  });
}
