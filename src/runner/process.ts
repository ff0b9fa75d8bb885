import { spawn, type ChildProcess } from "node:child_process";
import { HarnessError, LeAutoTimeoutError, errorCode, errorMessage } from "../util/errors";

export interface ProcessRun {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  stdoutBytes: Buffer;
  durationMs: number;
}

export interface ProcessRunOptions {
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  cwd?: string;
}

/**
 * Spawns `command` without a shell and collects its output. Waiting is
 * asynchronous: a fixture server on the same event loop keeps serving while
 * the child runs. The child leads its own process group, so a timeout kills
 * whatever it started as well (curl, python, sleep under a shell script).
 */
export async function runProcess(command: string, args: string[], options: ProcessRunOptions): Promise<ProcessRun> {
  const started = Date.now();
  const child = spawn(command, args, {
    shell: false,
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
    detached: true
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  child.stdout.on("data", (chunk: Buffer) => {
    stdoutChunks.push(chunk);
  });

  child.stderr.on("data", (chunk: Buffer) => {
    stderrChunks.push(chunk);
  });

  let timeoutHit = false;
  const timer = setTimeout(() => {
    timeoutHit = true;
    killProcessGroup(child);
    // A descendant that left the group may still hold the pipes open.
    child.stdout.destroy();
    child.stderr.destroy();
  }, options.timeoutMs);

  let outcome: { code: number | null; signal: NodeJS.Signals | null };
  try {
    outcome = await new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code, signal) => resolve({ code, signal }));
    }).catch((error) => {
      throw new HarnessError(`failed to execute ${command}: ${errorMessage(error)}`);
    });
  } finally {
    clearTimeout(timer);
  }

  if (timeoutHit) {
    throw new LeAutoTimeoutError(command, options.timeoutMs);
  }

  const stdoutBytes = Buffer.concat(stdoutChunks);
  return {
    exitCode: outcome.code,
    signal: outcome.signal,
    stdout: stdoutBytes.toString("utf8"),
    stderr: Buffer.concat(stderrChunks).toString("utf8"),
    stdoutBytes,
    durationMs: Date.now() - started
  };
}

function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch (error) {
    // ESRCH: the group is already gone.
    if (errorCode(error) !== "ESRCH") {
      child.kill("SIGKILL");
    }
  }
}
