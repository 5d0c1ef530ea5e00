import { checksumSha256 } from "./checksum";
import { errorCode, HTTPError, NetworkError } from "./errors";
import type { NetworkErrorKind } from "./errors";
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./settings";
import type { RuntimeSettings } from "./settings";

export type FetchOptions = Partial<RuntimeSettings> & {
  fetchImpl?: typeof fetch;
};

export type FetchSuccess = {
  ok: true;
  url: string;
  finalUrl: string;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
  bytes: number;
  checksum: string;
  elapsedMs: number;
};

export type FetchFailure = {
  ok: false;
  url: string;
  kind: NetworkErrorKind | "http";
  message: string;
  status?: number;
  elapsedMs: number;
};

export type FetchResult = FetchSuccess | FetchFailure;

const KIND_BY_CODE: Record<string, NetworkErrorKind> = {
  ECONNREFUSED: "connection_refused",
  ENOTFOUND: "dns_failure",
  EAI_AGAIN: "dns_failure",
  ECONNRESET: "connection_reset",
  EPIPE: "connection_reset",
  UND_ERR_SOCKET: "connection_reset",
  ETIMEDOUT: "timeout",
  UND_ERR_CONNECT_TIMEOUT: "timeout",
  UND_ERR_HEADERS_TIMEOUT: "timeout",
  UND_ERR_BODY_TIMEOUT: "timeout"
};

// undici wraps the socket error as `TypeError("fetch failed", { cause })`;
// happy-eyeballs failures nest one level deeper in an AggregateError.
function findCode(err: unknown, depth = 0): string | undefined {
  if (depth > 4) return undefined;
  const code = errorCode(err);
  if (code && KIND_BY_CODE[code]) return code;
  if (err instanceof AggregateError) {
    for (const inner of err.errors) {
      const found = findCode(inner, depth + 1);
      if (found) return found;
    }
  }
  if (err instanceof Error && err.cause !== undefined) {
    return findCode(err.cause, depth + 1) ?? code;
  }
  return code;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? err.cause.message : undefined;
    return cause && cause !== err.message ? `${err.message}: ${cause}` : err.message;
  }
  return String(err);
}

function toNetworkError(err: unknown, url: string, aborted: boolean, timeoutMs: number): NetworkError {
  if (aborted) {
    return new NetworkError("timeout", url, `timeout after ${timeoutMs}ms for ${url}`, err);
  }
  const code = findCode(err);
  const kind = (code && KIND_BY_CODE[code]) || "network";
  return new NetworkError(kind, url, `${kind} for ${url}: ${describeError(err)}`, err);
}

/**
 * Issues one GET against `url`. The timeout covers the body as well as the headers.
 *
 * @throws NetworkError when the exchange does not complete
 * @throws HTTPError when the final response is not 2xx
 */
export async function fetchTarget(url: string, options: FetchOptions = {}): Promise<FetchSuccess> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;
  const startedAt = Date.now();
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);

  try {
    let res: Response;
    let buffer: Buffer;
    try {
      res = await fetchImpl(url, {
        method: "GET",
        headers: { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT },
        redirect: "follow",
        signal: controller.signal
      });
      buffer = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      throw toNetworkError(err, url, controller.signal.aborted, timeoutMs);
    }

    const body = buffer.toString("utf8");
    if (!res.ok) throw new HTTPError(url, res.status, res.statusText, body);

    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      ok: true,
      url,
      finalUrl: res.url || url,
      status: res.status,
      statusText: res.statusText,
      headers,
      body,
      bytes: buffer.byteLength,
      checksum: checksumSha256(buffer),
      elapsedMs: Date.now() - startedAt
    };
  } finally {
    clearTimeout(timeout);
  }
}

/** Like `fetchTarget`, but reports network and HTTP failures as a value. */
export async function fetchTargetResult(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const startedAt = Date.now();
  try {
    return await fetchTarget(url, options);
  } catch (err) {
    const elapsedMs = Date.now() - startedAt;
    if (err instanceof HTTPError) {
      return { ok: false, url, kind: "http", message: err.message, status: err.status, elapsedMs };
    }
    if (err instanceof NetworkError) {
      return { ok: false, url, kind: err.kind, message: err.message, elapsedMs };
    }
    throw err;
  }
}
