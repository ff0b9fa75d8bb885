import { writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { loadHarnessConfig, parseHarnessConfig } from "../../src/config/harnessConfig";
import { withEphemeralDir } from "../../src/fixture/ephemeralDir";

const minimal = {
  le_auto: { command: "./letsencrypt-auto" },
  tls: { cert: "certs/server.crt", key: "certs/server.key" },
  artifact: { template: "letsencrypt-auto.template" }
};

describe("harness config", () => {
  test("fills defaults and resolves paths against the config directory", () => {
    expect(parseHarnessConfig(minimal, "/work", {})).toEqual({
      leAuto: { command: "/work/letsencrypt-auto", args: [] },
      portRange: { first: 4443, last: 4542 },
      host: "127.0.0.1",
      tls: { certPath: "/work/certs/server.crt", keyPath: "/work/certs/server.key" },
      caBundlePath: "/work/certs/server.crt",
      signing: { privateKeyPath: undefined, publicKeyEnv: undefined },
      artifact: { kind: "template", templatePath: "/work/letsencrypt-auto.template" },
      upgradeVersion: "99.9.9",
      timeoutMs: 300_000,
      env: { passthrough: ["PATH", "HOME", "LANG"], extra: {} }
    });
  });

  test("keeps bare command names for PATH lookup", () => {
    const config = parseHarnessConfig(
      { ...minimal, le_auto: { command: "bash", args: ["letsencrypt-auto"] }, artifact: { command: "python3", args: ["build.py"] } },
      "/work",
      {}
    );

    expect(config.leAuto).toEqual({ command: "bash", args: ["letsencrypt-auto"] });
    expect(config.artifact).toEqual({ kind: "command", command: "python3", args: ["build.py"] });
  });

  test("environment overrides the port range and timeout", () => {
    const config = parseHarnessConfig({ ...minimal, port_range: { first: 4443, last: 4444 }, timeout_ms: 1000 }, "/work", {
      LE_HARNESS_PORT_FIRST: "5000",
      LE_HARNESS_PORT_LAST: "5010",
      LE_HARNESS_RUN_TIMEOUT_MS: "2500"
    });

    expect(config.portRange).toEqual({ first: 5000, last: 5010 });
    expect(config.timeoutMs).toBe(2500);
    expect(parseHarnessConfig({ ...minimal, timeout_ms: 1000 }, "/work", {}).timeoutMs).toBe(1000);
  });

  test("rejects invalid values", () => {
    expect(() => parseHarnessConfig({ le_auto: { command: "x" } }, "/work", {})).toThrow(/invalid harness config/);
    expect(() => parseHarnessConfig({ ...minimal, port_range: { first: 5000, last: 4000 } }, "/work", {})).toThrow(
      "port range is empty: 5000-4000"
    );
    expect(() => parseHarnessConfig({ ...minimal, upgrade_version: "latest" }, "/work", {})).toThrow(
      "upgrade_version must be MAJOR.MINOR.PATCH: latest"
    );
    expect(() => parseHarnessConfig(minimal, "/work", { LE_HARNESS_RUN_TIMEOUT_MS: "soon" })).toThrow(
      "LE_HARNESS_RUN_TIMEOUT_MS must be an integer >= 1"
    );
    expect(() =>
      parseHarnessConfig({ ...minimal, signing: { public_key_env: "not valid" } }, "/work", {})
    ).toThrow(/invalid harness config/);
  });

  test("loads YAML from disk", async () => {
    await withEphemeralDir(async (dir) => {
      const configPath = path.join(dir, "harness.yaml");
      await writeFile(
        configPath,
        [
          "le_auto:",
          "  command: ./letsencrypt-auto",
          "  args: [--no-self-upgrade]",
          "tls:",
          "  cert: server.crt",
          "  key: server.key",
          "ca_bundle: ca.pem",
          "signing:",
          "  private_key: keys/test.pem",
          "  public_key_env: LE_AUTO_PUBLIC_KEY",
          "artifact:",
          "  template: letsencrypt-auto.template",
          "upgrade_version: 1.2.3",
          "env:",
          "  extra:",
          "    LE_AUTO_SUDO: sudo -n",
          ""
        ].join("\n"),
        "utf8"
      );

      const config = await loadHarnessConfig(configPath, {});
      expect(config.leAuto).toEqual({ command: path.join(dir, "letsencrypt-auto"), args: ["--no-self-upgrade"] });
      expect(config.caBundlePath).toBe(path.join(dir, "ca.pem"));
      expect(config.signing).toEqual({
        privateKeyPath: path.join(dir, "keys/test.pem"),
        publicKeyEnv: "LE_AUTO_PUBLIC_KEY"
      });
      expect(config.upgradeVersion).toBe("1.2.3");
      expect(config.env.extra).toEqual({ LE_AUTO_SUDO: "sudo -n" });
    });
  });

  test("reports missing and unparsable files", async () => {
    await expect(loadHarnessConfig("/nonexistent/harness.yaml", {})).rejects.toThrow(
      "harness config not found: /nonexistent/harness.yaml"
    );

    await withEphemeralDir(async (dir) => {
      const configPath = path.join(dir, "harness.yaml");
      await writeFile(configPath, "le_auto: [unclosed\n", "utf8");
      await expect(loadHarnessConfig(configPath, {})).rejects.toThrow(/failed to parse harness.yaml/);
    });
  });
});
