import fs from "node:fs";
import path from "node:path";
import os from "node:os";

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

/** `~/.cueplay`, or `$CUEPLAY_HOME` when set. */
export function getDataPath(): string {
  const override = process.env.CUEPLAY_HOME?.trim();
  return ensureDir(override ? path.resolve(expandHome(override)) : path.join(os.homedir(), ".cueplay"));
}

export function getWorkDir(configured?: string): string {
  return path.resolve(configured ? expandHome(configured) : process.cwd());
}

/** How a fresh process re-invokes this program: runtime, loader flags, entry script. */
export function selfCommand(): string[] {
  const script = process.argv[1] ? path.resolve(process.argv[1]) : "cueplay";
  return [process.execPath, ...process.execArgv, script];
}
