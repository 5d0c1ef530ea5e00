import fs from "fs";
import path from "path";
import { ConfigurationError, errorCode } from "./errors";

export const TARGET_URL_KEY = "TARGET_URL";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ALLOWED_PROTOCOLS = ["http:", "https:"];

export type Configuration = {
  source: string;
  targetUrl: string;
  values: Readonly<Record<string, string>>;
};

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) return value.slice(1, -1);
  }
  return value;
}

function parseEntries(text: string, source: string): Record<string, string> {
  const values: Record<string, string> = {};
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, "");
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const lineNo = i + 1;
    const eq = trimmed.indexOf("=");
    if (eq === -1) {
      throw new ConfigurationError(`Malformed line ${lineNo} in ${source}: expected KEY=VALUE`, { source, line: lineNo });
    }
    const key = trimmed.slice(0, eq).trim();
    if (!KEY_PATTERN.test(key)) {
      throw new ConfigurationError(`Invalid key "${key}" on line ${lineNo} in ${source}`, { source, line: lineNo, key });
    }
    values[key] = unquote(trimmed.slice(eq + 1).trim());
  }
  return values;
}

function validateTargetUrl(raw: string | undefined, source: string): string {
  if (raw === undefined || raw === "") {
    throw new ConfigurationError(`${TARGET_URL_KEY} is missing in ${source}`, { source, key: TARGET_URL_KEY });
  }
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (err) {
    throw new ConfigurationError(
      `${TARGET_URL_KEY} is not a valid absolute URL: ${raw}`,
      { source, key: TARGET_URL_KEY },
      err
    );
  }
  // WHATWG URL accepts "http:host" and rewrites it; fetch gets the raw string.
  if (!/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(raw)) {
    throw new ConfigurationError(`${TARGET_URL_KEY} is not a valid absolute URL: ${raw}`, { source, key: TARGET_URL_KEY });
  }
  if (!ALLOWED_PROTOCOLS.includes(parsed.protocol)) {
    throw new ConfigurationError(
      `${TARGET_URL_KEY} must use http or https, got ${parsed.protocol.replace(/:$/, "")}`,
      { source, key: TARGET_URL_KEY }
    );
  }
  return raw;
}

/**
 * Parses `KEY=VALUE` text. Blank lines and lines starting with `#` are skipped;
 * the first `=` splits key from value, so values may contain `=` and `#`.
 * Matching surrounding quotes are stripped. Later duplicates win.
 */
export function parseConfiguration(text: string, source: string): Configuration {
  const values = parseEntries(text, source);
  const targetUrl = validateTargetUrl(values[TARGET_URL_KEY], source);
  return { source, targetUrl, values: Object.freeze(values) };
}

export function loadConfiguration(filePath: string): Configuration {
  const source = path.resolve(filePath);
  let text: string;
  try {
    text = fs.readFileSync(source, "utf8");
  } catch (err) {
    const code = errorCode(err);
    const message =
      code === "ENOENT" ? `Configuration file not found: ${source}` : `Cannot read configuration file ${source} (${code ?? "read_error"})`;
    throw new ConfigurationError(message, { source }, err);
  }
  return parseConfiguration(text, source);
}
