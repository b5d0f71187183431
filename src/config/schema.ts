import path from "node:path";

export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  tokenPath: string;
}

export interface Config {
  spotify: SpotifyConfig;
  scheduler: {
    /** Directory the deferred job changes into before re-invoking cueplay. Empty means the current directory. */
    workDir: string;
    /** Shell script dot-sourced before the job runs. Empty means auto-detect. */
    activateScript: string;
  };
  web: {
    host: string;
    port: number;
  };
}

export const DEFAULT_CONFIG: Config = {
  spotify: {
    clientId: "",
    clientSecret: "",
    redirectUri: "http://127.0.0.1:8888/callback",
    scopes: ["user-modify-playback-state", "user-read-playback-state"],
    tokenPath: path.join("~", ".cueplay", "token.json"),
  },
  scheduler: {
    workDir: "",
    activateScript: "",
  },
  web: { host: "0.0.0.0", port: 5000 },
};

const ENV_OVERRIDES: Array<[string, (config: Config, value: string) => void]> = [
  ["SPOTIFY_CLIENT_ID", (c, v) => { c.spotify.clientId = v; }],
  ["SPOTIFY_CLIENT_SECRET", (c, v) => { c.spotify.clientSecret = v; }],
  ["SPOTIFY_REDIRECT_URI", (c, v) => { c.spotify.redirectUri = v; }],
  ["CUEPLAY_WORKDIR", (c, v) => { c.scheduler.workDir = v; }],
  ["CUEPLAY_ACTIVATE", (c, v) => { c.scheduler.activateScript = v; }],
  ["PORT", (c, v) => {
    const port = Number(v);
    if (Number.isInteger(port) && port > 0 && port < 65536) c.web.port = port;
  }],
];

/** Environment variables win over the config file. */
export function applyEnv(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  for (const [name, apply] of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (value) apply(config, value);
  }
  return config;
}
