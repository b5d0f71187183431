import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { DEFAULT_CONFIG, applyEnv, type Config } from "./schema.js";
import { getDataPath } from "../utils/helpers.js";
import { getRecord } from "../utils/json.js";

export function getConfigPath(): string {
  return path.join(getDataPath(), "config.json");
}


function str(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function int(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) ? value : fallback;
}

function strList(value: unknown, fallback: string[]): string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string") ? [...value] : [...fallback];
}

/** Overlays a parsed config file on the defaults, ignoring keys of the wrong type. */
export function mergeConfig(data: unknown): Config {
  const d = DEFAULT_CONFIG;
  const spotify = getRecord(data, "spotify");
  const scheduler = getRecord(data, "scheduler");
  const web = getRecord(data, "web");
  return {
    spotify: {
      clientId: str(spotify.clientId, d.spotify.clientId),
      clientSecret: str(spotify.clientSecret, d.spotify.clientSecret),
      redirectUri: str(spotify.redirectUri, d.spotify.redirectUri),
      scopes: strList(spotify.scopes, d.spotify.scopes),
      tokenPath: str(spotify.tokenPath, d.spotify.tokenPath),
    },
    scheduler: {
      workDir: str(scheduler.workDir, d.scheduler.workDir),
      activateScript: str(scheduler.activateScript, d.scheduler.activateScript),
    },
    web: {
      host: str(web.host, d.web.host),
      port: int(web.port, d.web.port),
    },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const p = configPath ?? getConfigPath();
  if (!fs.existsSync(p)) return applyEnv(mergeConfig({}), env);

  try {
    const raw = fs.readFileSync(p, "utf8");
    return applyEnv(mergeConfig(JSON.parse(raw)), env);
  } catch (err) {
    console.warn(chalk.yellow(`Warning: Failed to load config from ${p}: ${String(err)}`));
    return applyEnv(mergeConfig({}), env);
  }
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(config, null, 2), "utf8");
}
