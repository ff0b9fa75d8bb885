import { RunReport, ScenarioReport } from "../types";

const REDACTED = "[REDACTED]";

// Names whose values letsencrypt-auto or its sudo/openssl helpers may echo back.
const SENSITIVE_ENV_NAME_RE = /(SECRET|PASSWORD|PASSPHRASE|TOKEN|PRIVATE_KEY|SUDO|CREDENTIAL)/i;
const MIN_SECRET_LENGTH = 4;
const PEM_PRIVATE_KEY_RE = /-----BEGIN ([A-Z ]*)PRIVATE KEY-----[\s\S]*?-----END \1PRIVATE KEY-----/g;
// openssl -passin/-passout arguments.
const OPENSSL_PASS_RE = /\b(pass:)\S+/g;

export function collectSensitiveEnvValues(env: NodeJS.ProcessEnv = process.env): string[] {
  const values = new Set<string>();
  for (const [name, value] of Object.entries(env)) {
    if (SENSITIVE_ENV_NAME_RE.test(name) && value !== undefined && value.trim().length >= MIN_SECRET_LENGTH) {
      values.add(value);
    }
  }
  // Longest first, so a secret that contains another is replaced whole.
  return [...values].sort((a, b) => b.length - a.length);
}

export function createRedactor(env: NodeJS.ProcessEnv = process.env): (text: string) => string {
  const secrets = collectSensitiveEnvValues(env);
  return (text) => {
    let out = text;
    for (const secret of secrets) {
      out = out.split(secret).join(REDACTED);
    }
    return out.replace(PEM_PRIVATE_KEY_RE, REDACTED).replace(OPENSSL_PASS_RE, `$1${REDACTED}`);
  };
}

/** Redacts the captured output and failure messages of every scenario. */
export function redactRunReport(report: RunReport, env: NodeJS.ProcessEnv = process.env): RunReport {
  const redact = createRedactor(env);
  const redactOptional = (value: string | undefined) => (value === undefined ? undefined : redact(value));

  return {
    ...report,
    scenarios: report.scenarios.map(
      (scenario): ScenarioReport => ({
        ...scenario,
        stdout: redactOptional(scenario.stdout),
        stderr: redactOptional(scenario.stderr),
        reported_version: redactOptional(scenario.reported_version),
        failures: scenario.failures.map(redact)
      })
    )
  };
}
