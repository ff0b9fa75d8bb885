import { readFile } from "node:fs/promises";
import path from "node:path";
import { ArtifactSource } from "../types";
import { HarnessError } from "../util/errors";
import { runProcess } from "../runner/process";

export const VERSION_PLACEHOLDER_RE = /\{\{\s*LE_AUTO_VERSION\s*\}\}/g;
const DEFAULT_BUILD_TIMEOUT_MS = 60_000;

export interface ArtifactBuilder {
  readonly description: string;
  build(version: string): Promise<Buffer>;
}

/** Renders the letsencrypt-auto template with the version filled in. */
export function templateArtifactBuilder(templatePath: string): ArtifactBuilder {
  const resolved = path.resolve(templatePath);

  return {
    description: `template ${resolved}`,
    async build(version: string): Promise<Buffer> {
      const template = await readFile(resolved, "utf8").catch(() => {
        throw new HarnessError(`artifact template not found: ${resolved}`);
      });
      if (!template.match(VERSION_PLACEHOLDER_RE)) {
        throw new HarnessError(`artifact template has no {{ LE_AUTO_VERSION }} placeholder: ${resolved}`);
      }
      return Buffer.from(template.replace(VERSION_PLACEHOLDER_RE, version), "utf8");
    }
  };
}

/** Delegates to an external builder; the version is its last argument and stdout is the artifact. */
export function commandArtifactBuilder(
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  timeoutMs = DEFAULT_BUILD_TIMEOUT_MS
): ArtifactBuilder {
  return {
    description: `command ${[command, ...args].join(" ")}`,
    async build(version: string): Promise<Buffer> {
      const result = await runProcess(command, [...args, version], { env, timeoutMs });
      if (result.exitCode !== 0) {
        throw new HarnessError(
          `artifact builder exited with code ${result.exitCode}: ${result.stderr.trim() || "(no stderr)"}`
        );
      }
      if (result.stdoutBytes.length === 0) {
        throw new HarnessError("artifact builder produced no output");
      }
      return result.stdoutBytes;
    }
  };
}

export function artifactBuilderFor(source: ArtifactSource): ArtifactBuilder {
  if (source.kind === "template") {
    return templateArtifactBuilder(source.templatePath);
  }
  return commandArtifactBuilder(source.command, source.args);
}
