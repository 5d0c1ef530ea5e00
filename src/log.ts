export type LogLevel = "info" | "warn" | "error" | "fatal";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

function formatValue(value: string | number | boolean | null): string {
  if (typeof value !== "string") return String(value);
  return value === "" || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
}

export function formatLine(level: LogLevel, event: string, fields: LogFields = {}): string {
  const parts = [`[${level}]`, event];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

// stdout carries the fetched body, so every log line goes to stderr.
export function log(level: LogLevel, event: string, fields?: LogFields): void {
  const line = formatLine(level, event, fields);
  if (level === "warn") console.warn(line);
  else console.error(line);
}
