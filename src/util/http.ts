import { Agent, fetch as undiciFetch } from "undici";
import { HarnessError, errorMessage } from "./errors";

export interface TrustedFetchOptions {
  /** PEM bundle the client trusts; the fixture certificate in practice. */
  ca: string;
  method?: "GET" | "HEAD";
  signal?: AbortSignal;
}

export interface TrustedResponse {
  status: number;
  contentType: string | null;
  body: Buffer;
}

export async function fetchTrusted(url: string, options: TrustedFetchOptions): Promise<TrustedResponse> {
  const dispatcher = new Agent({ connect: { ca: options.ca } });

  try {
    const response = await undiciFetch(url, {
      method: options.method ?? "GET",
      dispatcher,
      signal: options.signal
    });
    return {
      status: response.status,
      contentType: response.headers.get("content-type"),
      body: Buffer.from(await response.arrayBuffer())
    };
  } finally {
    await dispatcher.close();
  }
}

/** Issues `HEAD /` against a freshly started fixture and fails unless it answers. */
export async function probeFixture(baseUrl: string, ca: string): Promise<number> {
  let response: TrustedResponse;
  try {
    response = await fetchTrusted(baseUrl, { ca, method: "HEAD" });
  } catch (error) {
    throw new HarnessError(`fixture server at ${baseUrl} is not reachable: ${errorMessage(error)}`);
  }
  return response.status;
}
