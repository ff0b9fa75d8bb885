export * from "./types";
export * from "./util/errors";
export { translatePath } from "./server/translatePath";
export { acquirePort, validatePortRange, DEFAULT_PORT_RANGE } from "./server/ports";
export { startFixtureServer, withFixtureServer, type FixtureServer, type FixtureServerOptions } from "./server/fixtureServer";
export { createEphemeralDir, removeEphemeralDir, withEphemeralDir } from "./fixture/ephemeralDir";
export {
  artifactPath,
  buildServedContent,
  directoryListingPage,
  releaseIndexDocument,
  signaturePath,
  writeServedContent
} from "./fixture/servedContent";
export { diffSnapshots, isEmptyDiff, snapshotDir, type DirSnapshot, type SnapshotDiff } from "./fixture/dirSnapshot";
export { generateSigningKeypair, loadSigningKey, publicKeyPemFromPrivate, signDetached } from "./signature/signing";
export { verifyDetached, verifyDetachedFiles, type VerificationResult } from "./signature/verify";
export { commandArtifactBuilder, templateArtifactBuilder, type ArtifactBuilder } from "./artifact/build";
export { prepareRelease } from "./artifact/release";
export { expandDirTemplate, serializeEnvironment, type ScenarioEnvironment } from "./runner/leAutoEnv";
export { checkLeAuto, readReportedVersion, runLeAuto, type LeAutoRun } from "./runner/runLeAuto";
export { builtInScenarios, findScenario } from "./scenario/catalog";
export { resolvePlan } from "./scenario/plan";
export { evaluateExpectation } from "./scenario/expectations";
export { runScenarioPlan } from "./scenario/orchestrator";
export { FIXTURE_STATES } from "./scenario/states";
export { loadHarnessConfig, parseHarnessConfig } from "./config/harnessConfig";
export { renderRunSummary, writeRunReport } from "./logging/runReport";
