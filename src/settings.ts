import { log } from "./log";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = "target-fetch/0.1";
// Largest delay setTimeout accepts; anything above fires after 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export type RuntimeSettings = {
  timeoutMs: number;
  userAgent: string;
};

export type Env = Record<string, string | undefined>;

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    log("warn", "invalid_setting", { key: "FETCH_TIMEOUT_MS", value: raw, fallback: DEFAULT_TIMEOUT_MS });
    return DEFAULT_TIMEOUT_MS;
  }
  return value;
}

export function resolveSettings(env: Env): RuntimeSettings {
  const userAgent = env.HTTP_USER_AGENT?.trim();
  return {
    timeoutMs: parseTimeout(env.FETCH_TIMEOUT_MS),
    userAgent: userAgent || DEFAULT_USER_AGENT
  };
}
