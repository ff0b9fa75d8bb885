import type { KeyObject } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { ArtifactBuilder, artifactBuilderFor } from "../artifact/build";
import { prepareRelease } from "../artifact/release";
import { diffSnapshots, isEmptyDiff, snapshotDir } from "../fixture/dirSnapshot";
import { createEphemeralDir, removeEphemeralDir, withEphemeralDir } from "../fixture/ephemeralDir";
import { buildServedContent, writeServedContent } from "../fixture/servedContent";
import { withFixtureServer } from "../server/fixtureServer";
import { generateSigningKey, loadSigningKey, publicKeyPemFromPrivate } from "../signature/signing";
import {
  FixtureStateName,
  HarnessConfig,
  PlannedScenario,
  RunReport,
  ScenarioReport,
  TlsMaterial
} from "../types";
import { HarnessError, errorMessage } from "../util/errors";
import { probeFixture } from "../util/http";
import { serializeEnvironment } from "../runner/leAutoEnv";
import { readReportedVersion, runLeAuto } from "../runner/runLeAuto";
import { evaluateExpectation } from "./expectations";
import { INITIAL_STATE } from "./states";

export interface RunContext {
  config: HarnessConfig;
  logger: Logger;
  tls: TlsMaterial;
  ca: string;
  signingKey: KeyObject;
  publicKeyPath: string;
  builder: ArtifactBuilder;
}

export interface RunPlanOptions {
  logger: Logger;
  /** Replaces the builder derived from `config.artifact`. */
  builder?: ArtifactBuilder;
}

interface Chain {
  dataHome: string;
  state: FixtureStateName;
}

/**
 * Runs the planned scenarios in order. Scenarios that start from `pristine`
 * get a fresh data home; the others continue in the data home left by the
 * scenario before them. Every directory and server created here is gone when
 * this resolves or rejects.
 */
export async function runScenarioPlan(
  config: HarnessConfig,
  plan: PlannedScenario[],
  options: RunPlanOptions
): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  const reports: ScenarioReport[] = [];

  await withEphemeralDir(async (keysDir) => {
    const context = await prepareRunContext(config, keysDir, options);
    let chain: Chain | null = null;
    let brokenBy: string | null = null;

    try {
      for (const planned of plan) {
        const { scenario } = planned;

        if (scenario.requires === INITIAL_STATE) {
          if (chain) {
            await removeEphemeralDir(chain.dataHome);
          }
          chain = { dataHome: await createEphemeralDir("le-auto-home-"), state: INITIAL_STATE };
          brokenBy = null;
        } else if (!chain || chain.state !== scenario.requires) {
          const reason = brokenBy
            ? `prerequisite '${brokenBy}' did not pass`
            : `fixture state '${scenario.requires}' is not established`;
          context.logger.warn({ scenario: scenario.name, reason }, "scenario skipped");
          reports.push(skippedReport(planned, reason));
          continue;
        }

        const report = await runPlannedScenario(context, planned, chain.dataHome);
        reports.push(report);

        if (report.status === "passed") {
          chain.state = scenario.produces;
        } else {
          brokenBy = scenario.name;
          await removeEphemeralDir(chain.dataHome);
          chain = null;
        }
      }
    } finally {
      if (chain) {
        await removeEphemeralDir(chain.dataHome);
      }
    }
  }, "le-auto-keys-");

  return {
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    success: reports.every((report) => report.status === "passed"),
    scenarios: reports
  };
}

export async function prepareRunContext(
  config: HarnessConfig,
  keysDir: string,
  options: RunPlanOptions
): Promise<RunContext> {
  const [cert, key, ca] = await Promise.all([
    readPem(config.tls.certPath, "TLS certificate"),
    readPem(config.tls.keyPath, "TLS key"),
    readPem(config.caBundlePath, "CA bundle")
  ]);

  const signingKey = config.signing.privateKeyPath
    ? await loadSigningKey(config.signing.privateKeyPath)
    : generateSigningKey();
  const publicKeyPath = path.join(keysDir, "le-auto-signing.public.pem");
  await writeFile(publicKeyPath, publicKeyPemFromPrivate(signingKey), "utf8");

  return {
    config,
    logger: options.logger,
    tls: { cert, key },
    ca,
    signingKey,
    publicKeyPath,
    builder: options.builder ?? artifactBuilderFor(config.artifact)
  };
}

export async function runPlannedScenario(
  context: RunContext,
  planned: PlannedScenario,
  dataHome: string
): Promise<ScenarioReport> {
  const { scenario } = planned;
  const { config, logger } = context;
  const report: ScenarioReport = {
    name: scenario.name,
    setup: planned.setup,
    status: "failed",
    requires: scenario.requires,
    produces: scenario.produces,
    started_at: new Date().toISOString(),
    finished_at: "",
    requests: [],
    failures: [],
    data_home: dataHome
  };

  logger.info({ scenario: scenario.name, setup: planned.setup }, "scenario started");

  try {
    const release =
      scenario.release.version === null
        ? null
        : await prepareRelease(context.builder, scenario.release.version, context.signingKey, scenario.release.tamper);
    const content = buildServedContent(scenario.release.indexVersions, release);

    await withEphemeralDir(async (fixtureRoot) => {
      report.fixture_root = fixtureRoot;
      await writeServedContent(fixtureRoot, content);

      await withFixtureServer(
        { root: fixtureRoot, tls: context.tls, portRange: config.portRange, host: config.host, logger },
        async (server) => {
          report.port = server.port;
          await probeFixture(server.url, context.ca);

          const env = serializeEnvironment({
            baseUrl: server.url,
            dataHome,
            caBundlePath: config.caBundlePath,
            publicKey: config.signing.publicKeyEnv
              ? { env: config.signing.publicKeyEnv, path: context.publicKeyPath }
              : undefined,
            passthrough: config.env.passthrough,
            extra: config.env.extra
          });

          const before = await snapshotDir(dataHome);
          const run = await runLeAuto(config.leAuto, env, { timeoutMs: config.timeoutMs });
          const dataHomeDiff = diffSnapshots(before, await snapshotDir(dataHome));
          report.exit_code = run.exitCode;
          report.stdout = run.stdout;
          report.stderr = run.stderr;
          logger.debug(
            {
              scenario: scenario.name,
              exitCode: run.exitCode,
              durationMs: run.durationMs,
              dataHomeChanged: !isEmptyDiff(dataHomeDiff)
            },
            "le-auto exited"
          );

          if (scenario.expect.versionAfter !== undefined) {
            try {
              report.reported_version = await readReportedVersion(config.leAuto, env, { timeoutMs: config.timeoutMs });
            } catch (error) {
              report.failures.push(`--version failed: ${errorMessage(error)}`);
            }
          }

          report.requests = [...server.requests];
          report.failures.push(
            ...evaluateExpectation(scenario.expect, {
              exitCode: run.exitCode,
              stdout: run.stdout,
              stderr: run.stderr,
              wasRequested: server.wasRequested,
              requestedPaths: server.requests.map((request) => request.path),
              dataHomeDiff,
              reportedVersion: report.reported_version
            })
          );
        }
      );
    }, "le-auto-fixture-");
  } catch (error) {
    report.failures.push(errorMessage(error));
  }

  report.status = report.failures.length === 0 ? "passed" : "failed";
  report.finished_at = new Date().toISOString();

  if (report.status === "passed") {
    logger.info({ scenario: scenario.name }, "scenario passed");
  } else {
    logger.error({ scenario: scenario.name, failures: report.failures }, "scenario failed");
  }

  return report;
}

function skippedReport(planned: PlannedScenario, reason: string): ScenarioReport {
  const now = new Date().toISOString();
  return {
    name: planned.scenario.name,
    setup: planned.setup,
    status: "skipped",
    requires: planned.scenario.requires,
    produces: planned.scenario.produces,
    started_at: now,
    finished_at: now,
    requests: [],
    failures: [reason]
  };
}

async function readPem(filePath: string, label: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch {
    throw new HarnessError(`${label} not found: ${filePath}`);
  }
}
