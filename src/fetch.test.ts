import { describe, expect, it, beforeAll, afterAll } from "vitest";
import { createServer } from "http";
import type { IncomingMessage, Server, ServerResponse } from "http";
import { fetchTarget, fetchTargetResult } from "./fetch";
import { HTTPError, NetworkError } from "./errors";
import { checksumSha256 } from "./checksum";

type Handler = (req: IncomingMessage, res: ServerResponse) => void;

function listen(handler: Handler): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve) => {
    const server = createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") throw new Error("expected a TCP address");
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });
}

function close(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

async function expectRejection<T extends Error>(promise: Promise<unknown>, type: new (...args: never[]) => T): Promise<T> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name}`);
}

describe("fetchTarget against a local server", () => {
  let server: Server;
  let baseUrl: string;
  const seenUserAgents: string[] = [];

  beforeAll(async () => {
    ({ server, baseUrl } = await listen((req, res) => {
      seenUserAgents.push(req.headers["user-agent"] ?? "");
      if (req.url === "/ok") {
        res.writeHead(200, { "Content-Type": "text/plain", "X-Probe": "1" });
        res.end("hello");
      } else if (req.url === "/utf8") {
        res.writeHead(200, { "Content-Type": "text/plain; charset=utf-8" });
        res.end("héllo wörld");
      } else if (req.url === "/moved") {
        res.writeHead(302, { Location: "/ok" });
        res.end();
      } else if (req.url === "/hang") {
        // never answers
      } else {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("not here");
      }
    }));
  });

  afterAll(async () => {
    await close(server);
  });

  it("returns status, headers and the exact body for a 200", async () => {
    const result = await fetchTarget(`${baseUrl}/ok`, { userAgent: "test-agent/1" });
    expect(result.ok).toBe(true);
    expect(result.status).toBe(200);
    expect(result.body).toBe("hello");
    expect(result.bytes).toBe(5);
    expect(result.checksum).toBe(checksumSha256("hello"));
    expect(result.headers["x-probe"]).toBe("1");
    expect(result.finalUrl).toBe(`${baseUrl}/ok`);
    expect(seenUserAgents[seenUserAgents.length - 1]).toBe("test-agent/1");
  });

  it("decodes the body as UTF-8 and counts raw bytes", async () => {
    const result = await fetchTarget(`${baseUrl}/utf8`);
    expect(result.body).toBe("héllo wörld");
    expect(result.bytes).toBe(Buffer.byteLength("héllo wörld", "utf8"));
  });

  it("follows redirects and reports the final URL", async () => {
    const result = await fetchTarget(`${baseUrl}/moved`);
    expect(result.url).toBe(`${baseUrl}/moved`);
    expect(result.finalUrl).toBe(`${baseUrl}/ok`);
    expect(result.body).toBe("hello");
  });

  it("raises HTTPError carrying status 404", async () => {
    const err = await expectRejection(fetchTarget(`${baseUrl}/missing`), HTTPError);
    expect(err.status).toBe(404);
    expect(err.body).toBe("not here");
    expect(err.url).toBe(`${baseUrl}/missing`);
    expect(err.message).toBe(`http_404 Not Found for ${baseUrl}/missing`);
  });

  it("raises a timeout NetworkError when the server does not answer", async () => {
    const err = await expectRejection(fetchTarget(`${baseUrl}/hang`, { timeoutMs: 100 }), NetworkError);
    expect(err.kind).toBe("timeout");
    expect(err.message).toBe(`timeout after 100ms for ${baseUrl}/hang`);
  });

  it("reports a 404 as an http failure value", async () => {
    const result = await fetchTargetResult(`${baseUrl}/missing`);
    expect(result).toMatchObject({ ok: false, kind: "http", status: 404 });
  });
});

describe("fetchTarget transport failures", () => {
  it("raises connection_refused when nothing listens on the port", async () => {
    const { server, baseUrl } = await listen((_req, res) => res.end());
    await close(server);
    const err = await expectRejection(fetchTarget(`${baseUrl}/ok`), NetworkError);
    expect(err.kind).toBe("connection_refused");
    expect(err.exitCode).toBe(3);
  });

  it("classifies DNS failures from the wrapped cause", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed", {
        cause: Object.assign(new Error("getaddrinfo ENOTFOUND example.test"), { code: "ENOTFOUND" })
      });
    };
    const err = await expectRejection(fetchTarget("https://example.test/", { fetchImpl }), NetworkError);
    expect(err.kind).toBe("dns_failure");
    expect(err.message).toBe("dns_failure for https://example.test/: fetch failed: getaddrinfo ENOTFOUND example.test");
  });

  it("looks inside AggregateError causes", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED ::1:80"), { code: "ECONNREFUSED" });
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed", { cause: new AggregateError([refused], "all attempts failed") });
    };
    const err = await expectRejection(fetchTarget("http://localhost/", { fetchImpl }), NetworkError);
    expect(err.kind).toBe("connection_refused");
  });

  it("falls back to the generic network kind", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const result = await fetchTargetResult("https://example.test/", { fetchImpl });
    expect(result).toMatchObject({ ok: false, kind: "network", message: "network for https://example.test/: fetch failed" });
  });
});
