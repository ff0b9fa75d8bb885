export type FixtureStateName = "pristine" | "upgraded" | "next-installed";
export type ReleaseTamper = "none" | "signature" | "content";
export type ExitExpectation = "success" | "failure";
export type ScenarioStatus = "passed" | "failed" | "skipped";

export interface PortRange {
  first: number;
  last: number;
}

export interface TlsMaterial {
  cert: string;
  key: string;
}

export interface LeAutoCommand {
  command: string;
  args: string[];
}

export type ArtifactSource =
  | { kind: "template"; templatePath: string }
  | { kind: "command"; command: string; args: string[] };

export interface HarnessConfig {
  leAuto: LeAutoCommand;
  portRange: PortRange;
  host: string;
  tls: {
    certPath: string;
    keyPath: string;
  };
  caBundlePath: string;
  signing: {
    privateKeyPath?: string;
    publicKeyEnv?: string;
  };
  artifact: ArtifactSource;
  upgradeVersion: string;
  timeoutMs: number;
  env: {
    passthrough: string[];
    extra: Record<string, string>;
  };
}

export type ServedContent = Record<string, string | Buffer>;

export interface ReleaseArtifact {
  version: string;
  content: Buffer;
  signature: Buffer;
  tamper: ReleaseTamper;
}

export interface ReleasePlan {
  /** Version of the artifact offered for download, or null to serve only the index. */
  version: string | null;
  /** Versions listed in the release index. */
  indexVersions: string[];
  tamper: ReleaseTamper;
}

export interface ScenarioExpectation {
  exit: ExitExpectation;
  versionAfter?: string;
  requested?: string[];
  notRequested?: string[];
  /** No artifact or signature of any version may be fetched. */
  noArtifactRequests?: boolean;
  dataHomeUnchanged?: boolean;
  stdoutIncludes?: string[];
  stderrIncludes?: string[];
}

export interface ScenarioDefinition {
  name: string;
  description: string;
  requires: FixtureStateName;
  produces: FixtureStateName;
  release: ReleasePlan;
  expect: ScenarioExpectation;
}

export interface PlannedScenario {
  scenario: ScenarioDefinition;
  /** Inserted to establish the state a selected scenario requires. */
  setup: boolean;
}

export interface RequestRecord {
  method: string;
  path: string;
  status: number;
}

export interface ScenarioReport {
  name: string;
  setup: boolean;
  status: ScenarioStatus;
  requires: FixtureStateName;
  produces: FixtureStateName;
  started_at: string;
  finished_at: string;
  exit_code?: number | null;
  stdout?: string;
  stderr?: string;
  reported_version?: string;
  requests: RequestRecord[];
  failures: string[];
  port?: number;
  fixture_root?: string;
  data_home?: string;
}

export interface RunReport {
  started_at: string;
  finished_at: string;
  success: boolean;
  scenarios: ScenarioReport[];
}
