import { LeAutoCommand } from "../types";
import { LeAutoExitError } from "../util/errors";
import { runProcess, type ProcessRun } from "./process";
import { readRunTimeoutMs } from "./runtimeLimits";

export type LeAutoRun = Omit<ProcessRun, "stdoutBytes">;

export interface LeAutoRunOptions {
  timeoutMs?: number;
  extraArgs?: string[];
  cwd?: string;
}

export async function runLeAuto(
  leAuto: LeAutoCommand,
  env: NodeJS.ProcessEnv,
  options: LeAutoRunOptions = {}
): Promise<LeAutoRun> {
  const timeoutMs = options.timeoutMs ?? readRunTimeoutMs();
  const args = [...leAuto.args, ...(options.extraArgs ?? [])];
  const result = await runProcess(leAuto.command, args, { env, timeoutMs, cwd: options.cwd });
  return {
    exitCode: result.exitCode,
    signal: result.signal,
    stdout: result.stdout,
    stderr: result.stderr,
    durationMs: result.durationMs
  };
}

/** Like `runLeAuto`, but a non-zero exit is an error carrying the captured output. */
export async function checkLeAuto(
  leAuto: LeAutoCommand,
  env: NodeJS.ProcessEnv,
  options: LeAutoRunOptions = {}
): Promise<LeAutoRun> {
  const run = await runLeAuto(leAuto, env, options);
  if (run.exitCode !== 0) {
    throw new LeAutoExitError(leAuto.command, run.exitCode, run.stdout, run.stderr);
  }
  return run;
}

export async function readReportedVersion(
  leAuto: LeAutoCommand,
  env: NodeJS.ProcessEnv,
  options: Omit<LeAutoRunOptions, "extraArgs"> = {}
): Promise<string> {
  const run = await checkLeAuto(leAuto, env, { ...options, extraArgs: ["--version"] });
  return `${run.stdout}${run.stderr}`.trim();
}
