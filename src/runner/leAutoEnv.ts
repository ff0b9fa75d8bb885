import { RELEASE_INDEX_PATH } from "../fixture/servedContent";
import { HarnessError } from "../util/errors";

export const DEFAULT_PASSTHROUGH = ["PATH", "HOME", "LANG"];

const REDIRECT_VARIABLES = new Set(["LE_AUTO_JSON_URL", "LE_AUTO_DIR_TEMPLATE", "XDG_DATA_HOME"]);

/** Everything the script under test learns about the fixture, passed explicitly at launch. */
export interface ScenarioEnvironment {
  /** Fixture base URL, ending in `/`. */
  baseUrl: string;
  dataHome: string;
  caBundlePath?: string;
  publicKey?: {
    env: string;
    path: string;
  };
  passthrough?: string[];
  extra?: Record<string, string>;
}

export function serializeEnvironment(
  scenarioEnv: ScenarioEnvironment,
  ambient: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  if (!scenarioEnv.baseUrl.endsWith("/")) {
    throw new HarnessError(`fixture base URL must end with '/': ${scenarioEnv.baseUrl}`);
  }

  const env: NodeJS.ProcessEnv = {};

  for (const name of scenarioEnv.passthrough ?? DEFAULT_PASSTHROUGH) {
    const value = ambient[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }

  for (const [name, value] of Object.entries(scenarioEnv.extra ?? {})) {
    if (REDIRECT_VARIABLES.has(name)) {
      throw new HarnessError(`extra environment must not override ${name}`);
    }
    env[name] = value;
  }

  if (scenarioEnv.caBundlePath) {
    env.SSL_CERT_FILE = scenarioEnv.caBundlePath;
    env.CURL_CA_BUNDLE = scenarioEnv.caBundlePath;
    env.NODE_EXTRA_CA_CERTS = scenarioEnv.caBundlePath;
  }

  if (scenarioEnv.publicKey) {
    env[scenarioEnv.publicKey.env] = scenarioEnv.publicKey.path;
  }

  env.XDG_DATA_HOME = scenarioEnv.dataHome;
  env.LE_AUTO_JSON_URL = `${scenarioEnv.baseUrl}${RELEASE_INDEX_PATH}`;
  env.LE_AUTO_DIR_TEMPLATE = `${scenarioEnv.baseUrl}%s/`;

  return env;
}

/** Fills a `%s` directory template the way letsencrypt-auto's printf does. */
export function expandDirTemplate(template: string, version: string): string {
  return template.replace(/%%|%s/g, (token) => (token === "%%" ? "%" : version));
}
