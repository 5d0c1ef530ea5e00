export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  Configuration: 2,
  Network: 3,
  Http: 4
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type NetworkErrorKind = "connection_refused" | "dns_failure" | "connection_reset" | "timeout" | "network";

export class TargetFetchError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: unknown;

  constructor(message: string, exitCode: ExitCode, cause?: unknown) {
    super(message);
    this.name = "TargetFetchError";
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

export type ConfigurationErrorDetails = {
  source: string;
  line?: number;
  key?: string;
};

/** Bad or missing configuration. Raised before any network activity. */
export class ConfigurationError extends TargetFetchError {
  public readonly source: string;
  public readonly line: number | undefined;
  public readonly key: string | undefined;

  constructor(message: string, details: ConfigurationErrorDetails, cause?: unknown) {
    super(message, ExitCode.Configuration, cause);
    this.name = "ConfigurationError";
    this.source = details.source;
    this.line = details.line;
    this.key = details.key;
  }
}

export class NetworkError extends TargetFetchError {
  public readonly kind: NetworkErrorKind;
  public readonly url: string;

  constructor(kind: NetworkErrorKind, url: string, message: string, cause?: unknown) {
    super(message, ExitCode.Network, cause);
    this.name = "NetworkError";
    this.kind = kind;
    this.url = url;
  }
}

/** Non-2xx response. The body is kept for diagnostics. */
export class HTTPError extends TargetFetchError {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly body: string;

  constructor(url: string, status: number, statusText: string, body: string) {
    super(`http_${status}${statusText ? ` ${statusText}` : ""} for ${url}`, ExitCode.Http);
    this.name = "HTTPError";
    this.status = status;
    this.statusText = statusText;
    this.url = url;
    this.body = body;
  }
}

/** Reads a Node-style `code` off an unknown error, e.g. "ENOENT" or "ECONNREFUSED". */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
