import { ScenarioExpectation } from "../types";
import { SnapshotDiff } from "../fixture/dirSnapshot";
import { isArtifactRequestPath } from "../fixture/servedContent";

export interface ScenarioObservation {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  wasRequested: (requestPath: string) => boolean;
  /** Paths of every request the fixture served, in arrival order. */
  requestedPaths: string[];
  dataHomeDiff?: SnapshotDiff;
  reportedVersion?: string;
}

/** Returns one message per unmet expectation; an empty list means the scenario passed. */
export function evaluateExpectation(expectation: ScenarioExpectation, observation: ScenarioObservation): string[] {
  const failures: string[] = [];

  if (expectation.exit === "success" && observation.exitCode !== 0) {
    failures.push(`expected exit code 0, got ${observation.exitCode}`);
  }
  if (expectation.exit === "failure" && observation.exitCode === 0) {
    failures.push("expected a non-zero exit code, got 0");
  }

  for (const needle of expectation.stdoutIncludes ?? []) {
    if (!observation.stdout.includes(needle)) {
      failures.push(`stdout does not contain '${needle}'`);
    }
  }

  for (const needle of expectation.stderrIncludes ?? []) {
    if (!observation.stderr.includes(needle)) {
      failures.push(`stderr does not contain '${needle}'`);
    }
  }

  for (const requestPath of expectation.requested ?? []) {
    if (!observation.wasRequested(requestPath)) {
      failures.push(`expected a request for ${requestPath}`);
    }
  }

  for (const requestPath of expectation.notRequested ?? []) {
    if (observation.wasRequested(requestPath)) {
      failures.push(`unexpected request for ${requestPath}`);
    }
  }

  if (expectation.noArtifactRequests) {
    for (const requestPath of new Set(observation.requestedPaths.filter(isArtifactRequestPath))) {
      failures.push(`unexpected artifact request for ${requestPath}`);
    }
  }

  if (expectation.dataHomeUnchanged) {
    const diff = observation.dataHomeDiff;
    if (!diff) {
      failures.push("data home was not snapshotted");
    } else {
      for (const rel of diff.added) failures.push(`data home gained ${rel}`);
      for (const rel of diff.removed) failures.push(`data home lost ${rel}`);
      for (const rel of diff.changed) failures.push(`data home changed ${rel}`);
    }
  }

  if (expectation.versionAfter !== undefined) {
    const reported = observation.reportedVersion;
    if (reported === undefined) {
      failures.push(`expected version ${expectation.versionAfter}, but no version was reported`);
    } else if (!containsVersion(reported, expectation.versionAfter)) {
      failures.push(`expected version ${expectation.versionAfter}, got '${reported}'`);
    }
  }

  return failures;
}

function containsVersion(output: string, version: string): boolean {
  const escaped = version.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^0-9.])${escaped}($|[^0-9.])`).test(output);
}
