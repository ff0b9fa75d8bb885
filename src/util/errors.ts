export class HarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HarnessError";
  }
}

export class NoAvailablePortError extends HarnessError {
  readonly first: number;
  readonly last: number;

  constructor(first: number, last: number) {
    super(`no available test port in range ${first}-${last}`);
    this.name = "NoAvailablePortError";
    this.first = first;
    this.last = last;
  }
}

export class LeAutoExitError extends HarnessError {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stdout: string, stderr: string) {
    super(`${command} exited with code ${exitCode}\n--- stdout ---\n${stdout}\n--- stderr ---\n${stderr}`);
    this.name = "LeAutoExitError";
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class LeAutoTimeoutError extends HarnessError {
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`${command} timed out after ${timeoutMs}ms`);
    this.name = "LeAutoTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ScenarioFailureError extends HarnessError {
  readonly failed: string[];

  constructor(failed: string[]) {
    super(`scenario(s) failed: ${failed.join(", ")}`);
    this.name = "ScenarioFailureError";
    this.failed = failed;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
