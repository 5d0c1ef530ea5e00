import { loadConfiguration } from "./config";
import type { Configuration } from "./config";
import { ConfigurationError, ExitCode } from "./errors";
import { fetchTargetResult } from "./fetch";
import type { FetchResult } from "./fetch";
import { log } from "./log";
import { resolveSettings } from "./settings";
import type { Env } from "./settings";

export type OutputSink = {
  write(chunk: string, callback: (err?: Error | null) => void): boolean;
};

export type RunOptions = {
  configPath: string;
  env: Env;
  fetchImpl?: typeof fetch;
  stdout?: OutputSink;
};

export type RunOutcome = {
  exitCode: ExitCode;
  configuration?: Configuration;
  result?: FetchResult;
};

function writeBody(sink: OutputSink, body: string): Promise<void> {
  return new Promise((resolve, reject) => {
    sink.write(body, (err) => (err ? reject(err) : resolve()));
  });
}

/** Loads the configuration, fetches the target once and maps the outcome to an exit code. */
export async function runOnce(options: RunOptions): Promise<RunOutcome> {
  const settings = resolveSettings(options.env);

  let configuration: Configuration;
  try {
    configuration = loadConfiguration(options.configPath);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log("error", "config_error", { source: err.source, line: err.line, key: err.key, message: err.message });
      return { exitCode: err.exitCode };
    }
    throw err;
  }

  log("info", "fetch_start", { url: configuration.targetUrl, timeout_ms: settings.timeoutMs });
  const result = await fetchTargetResult(configuration.targetUrl, { ...settings, fetchImpl: options.fetchImpl });

  if (!result.ok) {
    log("error", "fetch_failed", {
      url: result.url,
      kind: result.kind,
      status: result.status,
      elapsed_ms: result.elapsedMs,
      message: result.message
    });
    return { exitCode: result.kind === "http" ? ExitCode.Http : ExitCode.Network, configuration, result };
  }

  await writeBody(options.stdout ?? process.stdout, result.body);
  log("info", "fetch_ok", {
    url: result.finalUrl,
    status: result.status,
    bytes: result.bytes,
    sha256: result.checksum,
    elapsed_ms: result.elapsedMs
  });
  return { exitCode: ExitCode.Success, configuration, result };
}
