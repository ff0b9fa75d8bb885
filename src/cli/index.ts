#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { loadHarnessConfig } from "../config/harnessConfig";
import { createLogger } from "../logging/logger";
import { makeReportFileName, renderRunSummary, writeRunReport } from "../logging/runReport";
import { builtInScenarios } from "../scenario/catalog";
import { runScenarioPlan } from "../scenario/orchestrator";
import { resolvePlan } from "../scenario/plan";
import { FIXTURE_STATES } from "../scenario/states";
import { startFixtureServer } from "../server/fixtureServer";
import { generateSigningKeypair, loadSigningKey, signDetached } from "../signature/signing";
import { verifyDetachedFiles } from "../signature/verify";
import { HarnessError, ScenarioFailureError } from "../util/errors";

const DEFAULT_CONFIG_PATH = "harness.yaml";

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = new Command();

  program
    .name("le-auto-harness")
    .description("Run letsencrypt-auto against a local HTTPS release fixture")
    .showHelpAfterError(true);

  program
    .command("run")
    .description("Run scenarios (all by default); prerequisite scenarios are added automatically")
    .argument("[scenarios...]", "Scenario names")
    .option("--config <path>", "Harness config YAML", DEFAULT_CONFIG_PATH)
    .option("--report <path>", "Write a JSON run report (a directory gets a timestamped file)")
    .option("--verbose", "Log fixture requests and subprocess details to stderr")
    .action(async (scenarios: string[], options: { config: string; report?: string; verbose?: boolean }) => {
      const config = await loadHarnessConfig(options.config);
      const plan = resolvePlan(builtInScenarios(config.upgradeVersion), scenarios);
      const logger = createLogger(Boolean(options.verbose));

      const report = await runScenarioPlan(config, plan, { logger });
      process.stdout.write(`${renderRunSummary(report)}\n`);

      if (options.report) {
        const target = options.report.endsWith("/")
          ? path.join(options.report, makeReportFileName())
          : options.report;
        // Extra variables handed to letsencrypt-auto are as likely to be echoed as ambient ones.
        const written = await writeRunReport(report, target, { ...process.env, ...config.env.extra });
        process.stdout.write(`report: ${written}\n`);
      }

      const failed = report.scenarios.filter((scenario) => scenario.status !== "passed").map((scenario) => scenario.name);
      if (failed.length > 0) {
        throw new ScenarioFailureError(failed);
      }
    });

  program
    .command("list")
    .description("List the built-in scenarios")
    .option("--config <path>", "Harness config YAML (for the upgrade version)")
    .action(async (options: { config?: string }) => {
      const upgradeVersion = options.config ? (await loadHarnessConfig(options.config)).upgradeVersion : undefined;
      process.stdout.write("name\trequires\tproduces\tdescription\n");
      for (const scenario of builtInScenarios(upgradeVersion)) {
        process.stdout.write(`${scenario.name}\t${scenario.requires}\t${scenario.produces}\t${scenario.description}\n`);
      }
    });

  program
    .command("states")
    .description("Describe the fixture states scenarios start from and leave behind")
    .action(() => {
      for (const state of Object.values(FIXTURE_STATES)) {
        process.stdout.write(`${state.name}\t${state.description}\n`);
      }
    });

  program
    .command("serve")
    .description("Serve a directory with the fixture server until interrupted")
    .argument("<root>", "Directory to serve")
    .option("--config <path>", "Harness config YAML", DEFAULT_CONFIG_PATH)
    .option("--verbose", "Log every request to stderr")
    .action(async (root: string, options: { config: string; verbose?: boolean }) => {
      const config = await loadHarnessConfig(options.config);
      const [cert, key] = await Promise.all([readFile(config.tls.certPath, "utf8"), readFile(config.tls.keyPath, "utf8")]);
      const server = await startFixtureServer({
        root: path.resolve(root),
        tls: { cert, key },
        portRange: config.portRange,
        host: config.host,
        logger: createLogger(Boolean(options.verbose))
      });
      process.stdout.write(`serving ${server.root} at ${server.url}\n`);

      await new Promise<void>((resolve) => {
        process.once("SIGINT", () => resolve());
        process.once("SIGTERM", () => resolve());
      });
      await server.close();
    });

  program
    .command("keygen")
    .description("Generate an RSA test signing keypair")
    .requiredOption("--out <dir>", "Output directory")
    .option("--name <base>", "Base file name", "le-auto-test")
    .action(async (options: { out: string; name: string }) => {
      const result = await generateSigningKeypair(options.out, options.name);
      process.stdout.write(`private_key\t${result.privateKeyPath}\n`);
      process.stdout.write(`public_key\t${result.publicKeyPath}\n`);
    });

  program
    .command("sign")
    .description("Write a detached signature for a file")
    .argument("<file>", "File to sign")
    .requiredOption("--key <path>", "RSA private key (PEM)")
    .option("--out <path>", "Signature path (default: <file>.sig)")
    .action(async (file: string, options: { key: string; out?: string }) => {
      const content = await readFile(file).catch(() => {
        throw new HarnessError(`file not found: ${file}`);
      });
      const signature = signDetached(content, await loadSigningKey(options.key));
      const out = options.out ?? `${file}.sig`;
      await writeFile(out, signature);
      process.stdout.write(`signature written: ${out}\n`);
    });

  program
    .command("verify")
    .description("Verify a detached signature")
    .argument("<file>", "Signed file")
    .requiredOption("--signature <path>", "Detached signature")
    .requiredOption("--public-key <path>", "RSA public key (PEM)")
    .action(async (file: string, options: { signature: string; publicKey: string }) => {
      const result = await verifyDetachedFiles(file, options.signature, options.publicKey);
      if (!result.ok) {
        throw new HarnessError(`${file}: ${result.message}`);
      }
      process.stdout.write(`verified sha256=${result.digest}\n`);
    });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${message}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli().then((code) => {
    process.exitCode = code;
  });
}
