#!/usr/bin/env node
import dotenv from "dotenv";
import path from "path";
import { ExitCode } from "./errors";
import { runOnce } from "./run";
import type { RunOptions } from "./run";
import type { Env } from "./settings";

export type MainDeps = Pick<RunOptions, "fetchImpl" | "stdout">;

/** `argv` is the argument list after the script name; `[config-file]` defaults to `.env`. */
export async function main(argv: string[], env: Env, deps: MainDeps = {}): Promise<number> {
  try {
    const configPath = path.resolve(argv[0] ?? ".env");
    // Runtime knobs (FETCH_TIMEOUT_MS, HTTP_USER_AGENT) may sit next to TARGET_URL;
    // real environment variables win over the file.
    const fileEnv: Record<string, string> = {};
    dotenv.config({ path: configPath, processEnv: fileEnv });
    const outcome = await runOnce({ ...deps, configPath, env: { ...fileEnv, ...env } });
    return outcome.exitCode;
  } catch (err) {
    console.error("[fatal] target-fetch failed", err);
    return ExitCode.Unexpected;
  }
}

if (require.main === module) {
  main(process.argv.slice(2), process.env).then((code) => process.exit(code));
}
