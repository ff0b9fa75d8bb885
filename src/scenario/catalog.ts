import { ScenarioDefinition } from "../types";
import { artifactPath, signaturePath } from "../fixture/servedContent";
import { HarnessError } from "../util/errors";
import { bumpPatch, isSemver, selectLatestVersion } from "../util/version";

export const DEFAULT_UPGRADE_VERSION = "99.9.9";

/**
 * The chained branches of letsencrypt-auto's self-upgrade, in an order that
 * needs no setup runs: `signature-mismatch` must leave a pristine data home
 * pristine, `upgrade-signed` takes it to `upgraded`, `up-to-date` and
 * `hash-mismatch` start from there and leave it as it was, and
 * `upgrade-installed` replaces the installed copy with the next patch release.
 */
export function builtInScenarios(upgradeVersion = DEFAULT_UPGRADE_VERSION): ScenarioDefinition[] {
  if (!isSemver(upgradeVersion)) {
    throw new HarnessError(`upgrade version must be MAJOR.MINOR.PATCH: ${upgradeVersion}`);
  }
  const nextVersion = bumpPatch(upgradeVersion);

  const scenarios: ScenarioDefinition[] = [
    {
      name: "signature-mismatch",
      description: "the offered upgrade carries a signature that does not match it",
      requires: "pristine",
      produces: "pristine",
      release: { version: upgradeVersion, indexVersions: [upgradeVersion], tamper: "signature" },
      expect: {
        exit: "failure",
        dataHomeUnchanged: true
      }
    },
    {
      name: "upgrade-signed",
      description: "a newer, validly signed letsencrypt-auto is offered and nothing is installed yet",
      requires: "pristine",
      produces: "upgraded",
      release: { version: upgradeVersion, indexVersions: [upgradeVersion], tamper: "none" },
      expect: {
        exit: "success",
        requested: [artifactPath(upgradeVersion), signaturePath(upgradeVersion)],
        versionAfter: upgradeVersion
      }
    },
    {
      name: "up-to-date",
      description: "the index reports the installed version as the latest",
      requires: "upgraded",
      produces: "upgraded",
      release: { version: null, indexVersions: [upgradeVersion], tamper: "none" },
      expect: {
        exit: "success",
        noArtifactRequests: true,
        versionAfter: upgradeVersion
      }
    },
    {
      name: "hash-mismatch",
      description: "a newer artifact is altered after signing, so its digest no longer matches",
      requires: "upgraded",
      produces: "upgraded",
      release: { version: nextVersion, indexVersions: [upgradeVersion, nextVersion], tamper: "content" },
      expect: {
        exit: "failure",
        requested: [artifactPath(nextVersion)],
        dataHomeUnchanged: true,
        versionAfter: upgradeVersion
      }
    },
    {
      name: "upgrade-installed",
      description: "a newer, validly signed release replaces an older installed copy",
      requires: "upgraded",
      produces: "next-installed",
      release: { version: nextVersion, indexVersions: [upgradeVersion, nextVersion], tamper: "none" },
      expect: {
        exit: "success",
        requested: [artifactPath(nextVersion), signaturePath(nextVersion)],
        versionAfter: nextVersion
      }
    }
  ];

  validateCatalog(scenarios);
  return scenarios;
}

export function validateCatalog(scenarios: ScenarioDefinition[]): void {
  const seen = new Set<string>();
  for (const scenario of scenarios) {
    if (!scenario.name.trim()) {
      throw new HarnessError("scenario name must not be empty");
    }
    if (seen.has(scenario.name)) {
      throw new HarnessError(`duplicate scenario name: ${scenario.name}`);
    }
    seen.add(scenario.name);

    const { version, indexVersions } = scenario.release;
    if (indexVersions.length === 0) {
      throw new HarnessError(`scenario '${scenario.name}' serves an empty release index`);
    }
    if (version !== null && selectLatestVersion(indexVersions) !== version) {
      throw new HarnessError(`scenario '${scenario.name}' offers ${version}, which is not the latest in its index`);
    }
  }
}

export function findScenario(scenarios: ScenarioDefinition[], name: string): ScenarioDefinition {
  const found = scenarios.find((scenario) => scenario.name === name);
  if (!found) {
    throw new HarnessError(`unknown scenario: ${name}`);
  }
  return found;
}
