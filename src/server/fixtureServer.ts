import { readFile, stat } from "node:fs/promises";
import { createServer, type Server } from "node:https";
import type { IncomingMessage, ServerResponse } from "node:http";
import path from "node:path";
import type { Logger } from "pino";
import { PortRange, RequestRecord, TlsMaterial } from "../types";
import { HarnessError, errorMessage } from "../util/errors";
import { DEFAULT_PORT_RANGE, acquirePort } from "./ports";
import { translatePath } from "./translatePath";

export const DEFAULT_FIXTURE_HOST = "127.0.0.1";

export interface FixtureServerOptions {
  root: string;
  tls: TlsMaterial;
  portRange?: PortRange;
  host?: string;
  logger?: Logger;
}

export interface FixtureServer {
  port: number;
  host: string;
  url: string;
  root: string;
  /** Every request served so far, in arrival order. */
  requests: RequestRecord[];
  wasRequested(requestPath: string): boolean;
  close(): Promise<void>;
}

export async function startFixtureServer(options: FixtureServerOptions): Promise<FixtureServer> {
  const host = options.host ?? DEFAULT_FIXTURE_HOST;
  const root = path.resolve(options.root);
  const requests: RequestRecord[] = [];
  const logger = options.logger;

  const { port, value: server } = await acquirePort(options.portRange ?? DEFAULT_PORT_RANGE, (candidate) =>
    listenOn(candidate, host, options.tls, (req, res) => {
      const record = (status: number): RequestRecord => {
        const entry = { method: req.method ?? "GET", path: requestPathOf(req), status };
        requests.push(entry);
        return entry;
      };

      handleRequest(root, req, res)
        .then((status) => {
          logger?.debug(record(status), "fixture request");
        })
        .catch((error) => {
          logger?.error({ ...record(500), err: error }, "fixture request failed");
          if (!res.headersSent) {
            res.writeHead(500, { "Content-Type": "text/plain" });
          }
          res.end();
        });
    })
  );

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    if (!closing) {
      closing = new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      });
    }
    return closing;
  };

  const urlHost = host.includes(":") ? `[${host}]` : host;
  logger?.debug({ port, root }, "fixture server listening");

  return {
    port,
    host,
    url: `https://${urlHost}:${port}/`,
    root,
    requests,
    wasRequested: (requestPath) => {
      const wanted = normalizeRequestPath(requestPath);
      return requests.some((entry) => normalizeRequestPath(entry.path) === wanted);
    },
    close
  };
}

/** Starts a fixture server, hands it to `fn` and closes it on every exit path. */
export async function withFixtureServer<T>(
  options: FixtureServerOptions,
  fn: (server: FixtureServer) => Promise<T>
): Promise<T> {
  const server = await startFixtureServer(options);
  try {
    return await fn(server);
  } finally {
    await server.close();
  }
}

function listenOn(
  port: number,
  host: string,
  tls: TlsMaterial,
  handler: (req: IncomingMessage, res: ServerResponse) => void
): Promise<Server> {
  let server: Server;
  try {
    server = createServer({ cert: tls.cert, key: tls.key }, handler);
  } catch (error) {
    return Promise.reject(new HarnessError(`failed to load fixture TLS material: ${errorMessage(error)}`));
  }

  return new Promise<Server>((resolve, reject) => {
    const onError = (error: Error) => {
      server.removeListener("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.removeListener("error", onError);
      resolve(server);
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

async function handleRequest(root: string, req: IncomingMessage, res: ServerResponse): Promise<number> {
  const method = req.method ?? "GET";
  if (method !== "GET" && method !== "HEAD") {
    return writeStatus(res, 405, { Allow: "GET, HEAD" });
  }

  let filePath = translatePath(root, req.url ?? "/");
  let info = await stat(filePath).catch(() => null);
  if (info?.isDirectory()) {
    filePath = path.join(filePath, "index.html");
    info = await stat(filePath).catch(() => null);
  }

  if (!info || !info.isFile()) {
    return writeStatus(res, 404);
  }

  const body = await readFile(filePath);
  res.writeHead(200, {
    "Content-Type": contentTypeFor(filePath),
    "Content-Length": body.length
  });
  res.end(method === "HEAD" ? undefined : body);
  return 200;
}

function writeStatus(res: ServerResponse, status: number, headers: Record<string, string> = {}): number {
  res.writeHead(status, { "Content-Type": "text/plain", ...headers });
  res.end();
  return status;
}

export function contentTypeFor(filePath: string): string {
  const base = path.basename(filePath);
  if (base === "json" || base.endsWith(".json")) {
    return "application/json";
  }
  if (base.endsWith(".html")) {
    return "text/html; charset=utf-8";
  }
  return "application/octet-stream";
}

function requestPathOf(req: IncomingMessage): string {
  return (req.url ?? "/").split("?", 1)[0];
}

function normalizeRequestPath(value: string): string {
  return `/${value.replace(/^\/+/, "")}`;
}
