import { readFile } from "node:fs/promises";
import path from "node:path";
import Ajv2020, { type Schema } from "ajv/dist/2020";
import { load } from "js-yaml";
import { ArtifactSource, HarnessConfig } from "../types";
import { DEFAULT_FIXTURE_HOST } from "../server/fixtureServer";
import { DEFAULT_PORT_RANGE, validatePortRange } from "../server/ports";
import { DEFAULT_UPGRADE_VERSION } from "../scenario/catalog";
import { DEFAULT_PASSTHROUGH } from "../runner/leAutoEnv";
import { readPortOverride, readRunTimeoutMs } from "../runner/runtimeLimits";
import { HarnessError, errorMessage } from "../util/errors";
import { isSemver } from "../util/version";

const ajv = new Ajv2020({ allErrors: true, strict: false });

const stringArray = { type: "array", items: { type: "string", minLength: 1 } } as const;

const harnessConfigSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  type: "object",
  additionalProperties: false,
  required: ["le_auto", "tls", "artifact"],
  properties: {
    le_auto: {
      type: "object",
      additionalProperties: false,
      required: ["command"],
      properties: {
        command: { type: "string", minLength: 1 },
        args: stringArray
      }
    },
    port_range: {
      type: "object",
      additionalProperties: false,
      required: ["first", "last"],
      properties: {
        first: { type: "integer", minimum: 1, maximum: 65535 },
        last: { type: "integer", minimum: 1, maximum: 65535 }
      }
    },
    host: { type: "string", minLength: 1 },
    tls: {
      type: "object",
      additionalProperties: false,
      required: ["cert", "key"],
      properties: {
        cert: { type: "string", minLength: 1 },
        key: { type: "string", minLength: 1 }
      }
    },
    ca_bundle: { type: "string", minLength: 1 },
    signing: {
      type: "object",
      additionalProperties: false,
      properties: {
        private_key: { type: "string", minLength: 1 },
        public_key_env: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" }
      }
    },
    artifact: {
      oneOf: [
        {
          type: "object",
          additionalProperties: false,
          required: ["template"],
          properties: { template: { type: "string", minLength: 1 } }
        },
        {
          type: "object",
          additionalProperties: false,
          required: ["command"],
          properties: {
            command: { type: "string", minLength: 1 },
            args: stringArray
          }
        }
      ]
    },
    upgrade_version: { type: "string", minLength: 1 },
    timeout_ms: { type: "integer", minimum: 1 },
    env: {
      type: "object",
      additionalProperties: false,
      properties: {
        passthrough: stringArray,
        extra: {
          type: "object",
          additionalProperties: { type: "string" }
        }
      }
    }
  }
} as const;

const validateHarnessConfig = ajv.compile(harnessConfigSchema as Schema);

interface RawHarnessConfig {
  le_auto: { command: string; args?: string[] };
  port_range?: { first: number; last: number };
  host?: string;
  tls: { cert: string; key: string };
  ca_bundle?: string;
  signing?: { private_key?: string; public_key_env?: string };
  artifact: { template: string } | { command: string; args?: string[] };
  upgrade_version?: string;
  timeout_ms?: number;
  env?: { passthrough?: string[]; extra?: Record<string, string> };
}

function isRawHarnessConfig(value: unknown): value is RawHarnessConfig {
  return validateHarnessConfig(value);
}

export async function loadHarnessConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<HarnessConfig> {
  const resolved = path.resolve(configPath);

  let rawYaml: string;
  try {
    rawYaml = await readFile(resolved, "utf8");
  } catch {
    throw new HarnessError(`harness config not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = load(rawYaml);
  } catch (error) {
    throw new HarnessError(`failed to parse ${path.basename(resolved)}: ${errorMessage(error)}`);
  }

  return parseHarnessConfig(parsed, path.dirname(resolved), env);
}

/** Validates a parsed config document; relative paths resolve against `baseDir`. */
export function parseHarnessConfig(
  parsed: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env
): HarnessConfig {
  if (!isRawHarnessConfig(parsed)) {
    throw new HarnessError(`invalid harness config: ${formatErrors()}`);
  }

  const resolvePath = (value: string) => path.resolve(baseDir, value);

  const portRange = validatePortRange({
    first: readPortOverride("LE_HARNESS_PORT_FIRST", env) ?? parsed.port_range?.first ?? DEFAULT_PORT_RANGE.first,
    last: readPortOverride("LE_HARNESS_PORT_LAST", env) ?? parsed.port_range?.last ?? DEFAULT_PORT_RANGE.last
  });

  const upgradeVersion = parsed.upgrade_version ?? DEFAULT_UPGRADE_VERSION;
  if (!isSemver(upgradeVersion)) {
    throw new HarnessError(`upgrade_version must be MAJOR.MINOR.PATCH: ${upgradeVersion}`);
  }

  const certPath = resolvePath(parsed.tls.cert);
  const artifact: ArtifactSource =
    "template" in parsed.artifact
      ? { kind: "template", templatePath: resolvePath(parsed.artifact.template) }
      : { kind: "command", command: resolveCommand(parsed.artifact.command, baseDir), args: parsed.artifact.args ?? [] };

  return {
    leAuto: {
      command: resolveCommand(parsed.le_auto.command, baseDir),
      args: parsed.le_auto.args ?? []
    },
    portRange,
    host: parsed.host ?? DEFAULT_FIXTURE_HOST,
    tls: {
      certPath,
      keyPath: resolvePath(parsed.tls.key)
    },
    caBundlePath: parsed.ca_bundle ? resolvePath(parsed.ca_bundle) : certPath,
    signing: {
      privateKeyPath: parsed.signing?.private_key ? resolvePath(parsed.signing.private_key) : undefined,
      publicKeyEnv: parsed.signing?.public_key_env
    },
    artifact,
    upgradeVersion,
    timeoutMs: readRunTimeoutMs(parsed.timeout_ms, env),
    env: {
      passthrough: parsed.env?.passthrough ?? DEFAULT_PASSTHROUGH,
      extra: parsed.env?.extra ?? {}
    }
  };
}

// Bare names ("bash", "node") are looked up on PATH; anything with a separator is a file.
function resolveCommand(command: string, baseDir: string): string {
  return command.includes("/") || command.includes("\\") ? path.resolve(baseDir, command) : command;
}

function formatErrors(): string {
  return (validateHarnessConfig.errors ?? [])
    .map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
    .join("; ");
}
