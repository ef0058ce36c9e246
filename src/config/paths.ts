import { existsSync } from "node:fs";
import path from "node:path";
import type { Env } from "./credentials";

export const CONFIG_FILE_NAME = "turnstream.config.json";
export const CONFIG_PATH_ENV = "TURNSTREAM_CONFIG_PATH";

export type ConfigLocation = {
  path: string;
  // True when the path came from TURNSTREAM_CONFIG_PATH
  explicit: boolean;
  exists: boolean;
};

export function resolveConfigPath(cwd: string = process.cwd(), env: Env = process.env): ConfigLocation {
  const fromEnv = env[CONFIG_PATH_ENV];
  if (fromEnv) {
    const p = path.resolve(cwd, fromEnv);
    return { path: p, explicit: true, exists: existsSync(p) };
  }
  const candidates = [path.join(cwd, CONFIG_FILE_NAME), path.join(cwd, "config", CONFIG_FILE_NAME)];
  for (const p of candidates) {
    if (existsSync(p)) {
      return { path: p, explicit: false, exists: true };
    }
  }
  return { path: path.join(cwd, CONFIG_FILE_NAME), explicit: false, exists: false };
}
