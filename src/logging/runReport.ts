import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { RunReport, ScenarioReport } from "../types";
import { redactRunReport } from "../util/redact";

export function makeReportFileName(now = new Date()): string {
  return `le-auto-run_${toTimestamp(now)}.json`;
}

export async function writeRunReport(
  report: RunReport,
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const resolved = path.resolve(filePath);
  await mkdir(path.dirname(resolved), { recursive: true });
  const sanitized = redactRunReport(report, env);
  await writeFile(resolved, `${JSON.stringify(sanitized, null, 2)}\n`, "utf8");
  return resolved;
}

export function renderRunSummary(report: RunReport): string {
  const lines: string[] = [];
  lines.push("=== letsencrypt-auto scenarios ===");

  for (const scenario of report.scenarios) {
    lines.push(renderScenarioLine(scenario));
    for (const failure of scenario.failures) {
      lines.push(`    - ${failure}`);
    }
  }

  const counts = countByStatus(report.scenarios);
  lines.push(`passed: ${counts.passed}, failed: ${counts.failed}, skipped: ${counts.skipped}`);
  return lines.join("\n");
}

function renderScenarioLine(scenario: ScenarioReport): string {
  const label = scenario.setup ? `${scenario.name} (setup)` : scenario.name;
  const exit = scenario.exit_code === undefined ? "-" : String(scenario.exit_code);
  return `${scenario.status.toUpperCase().padEnd(7)} ${label}\t${scenario.requires} -> ${scenario.produces}\texit=${exit}`;
}

function countByStatus(scenarios: ScenarioReport[]): Record<ScenarioReport["status"], number> {
  const counts = { passed: 0, failed: 0, skipped: 0 };
  for (const scenario of scenarios) {
    counts[scenario.status] += 1;
  }
  return counts;
}

function toTimestamp(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  const hh = String(date.getUTCHours()).padStart(2, "0");
  const mm = String(date.getUTCMinutes()).padStart(2, "0");
  const ss = String(date.getUTCSeconds()).padStart(2, "0");
  return `${y}${m}${d}T${hh}${mm}${ss}Z`;
}
