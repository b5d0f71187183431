import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import prompts from "prompts";
import { nanoid } from "nanoid";
import type { SpotifyConfig } from "../config/schema.js";
import { AuthFailureError } from "../errors.js";
import { expandHome } from "../utils/helpers.js";
import { getNumber, getString } from "../utils/json.js";

const AUTHORIZE_URL = "https://accounts.spotify.com/authorize";
const TOKEN_URL = "https://accounts.spotify.com/api/token";
const EXPIRY_MARGIN_MS = 60_000;

export interface StoredToken {
  accessToken: string;
  refreshToken: string;
  expiresAt: number;
}

export interface SpotifyAuthOptions {
  /** Whether the interactive authorization flow may run when no token is cached. */
  interactive: boolean;
  fetch?: typeof fetch;
  now?: () => number;
  /** Shows the authorize URL and returns the URL the browser was redirected to. */
  askRedirect?: (authorizeUrl: string) => Promise<string>;
}

async function promptRedirect(authorizeUrl: string): Promise<string> {
  console.log(chalk.cyan("\nOpen this URL in a browser and approve access:"));
  console.log(authorizeUrl);
  const res = await prompts({
    type: "text",
    name: "url",
    message: "Paste the URL you were redirected to",
    validate: (v: string) => (v && v.trim().length > 0 ? true : "URL cannot be empty"),
  });
  return String(res.url ?? "");
}

/** OAuth authorization-code flow with a token cached on disk. */
export class SpotifyAuth {
  private cached: StoredToken | null = null;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly askRedirect: (authorizeUrl: string) => Promise<string>;

  constructor(private readonly config: SpotifyConfig, private readonly options: SpotifyAuthOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.askRedirect = options.askRedirect ?? promptRedirect;
  }

  private get tokenPath(): string {
    return path.resolve(expandHome(this.config.tokenPath));
  }

  private readToken(): StoredToken | null {
    if (this.cached) return this.cached;
    if (!fs.existsSync(this.tokenPath)) return null;
    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.tokenPath, "utf8"));
      const accessToken = getString(data, "accessToken");
      const expiresAt = getNumber(data, "expiresAt");
      if (!accessToken || expiresAt === null) return null;
      this.cached = { accessToken, refreshToken: getString(data, "refreshToken"), expiresAt };
      return this.cached;
    } catch (err) {
      console.warn(chalk.yellow(`Warning: ignoring unreadable token cache ${this.tokenPath}: ${String(err)}`));
      return null;
    }
  }

  private writeToken(token: StoredToken): void {
    this.cached = token;
    fs.mkdirSync(path.dirname(this.tokenPath), { recursive: true });
    fs.writeFileSync(this.tokenPath, JSON.stringify(token, null, 2), { encoding: "utf8", mode: 0o600 });
  }

  private requireClient(): void {
    if (!this.config.clientId || !this.config.clientSecret) {
      throw new AuthFailureError("Spotify client credentials are not configured. Set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET.");
    }
  }

  authorizeUrl(state: string): string {
    const url = new URL(AUTHORIZE_URL);
    url.searchParams.set("client_id", this.config.clientId);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("redirect_uri", this.config.redirectUri);
    url.searchParams.set("scope", this.config.scopes.join(" "));
    url.searchParams.set("state", state);
    return url.toString();
  }

  private async requestToken(body: Record<string, string>, previousRefresh = ""): Promise<StoredToken> {
    const basic = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString("base64");
    const res = await this.fetchImpl(TOKEN_URL, {
      method: "POST",
      headers: { Authorization: `Basic ${basic}`, "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams(body).toString(),
    });
    const data: unknown = await res.json().catch(() => ({}));
    if (!res.ok) {
      const reason = getString(data, "error_description") || getString(data, "error") || res.statusText;
      throw new AuthFailureError(`Spotify rejected the token request: ${reason}`);
    }
    const accessToken = getString(data, "access_token");
    if (!accessToken) throw new AuthFailureError("Spotify token response did not include an access token");
    const token: StoredToken = {
      accessToken,
      refreshToken: getString(data, "refresh_token") || previousRefresh,
      expiresAt: this.now() + (getNumber(data, "expires_in") ?? 3600) * 1000,
    };
    this.writeToken(token);
    return token;
  }

  private async authorizeInteractively(): Promise<StoredToken> {
    const state = nanoid(16);
    const redirected = (await this.askRedirect(this.authorizeUrl(state))).trim();
    let url: URL;
    try {
      url = new URL(redirected);
    } catch {
      throw new AuthFailureError("The pasted value is not a URL");
    }
    const error = url.searchParams.get("error");
    if (error) throw new AuthFailureError(`Authorization was denied: ${error}`);
    if (url.searchParams.get("state") !== state) throw new AuthFailureError("Authorization state mismatch");
    const code = url.searchParams.get("code");
    if (!code) throw new AuthFailureError("The redirect URL carries no authorization code");
    return this.requestToken({ grant_type: "authorization_code", code, redirect_uri: this.config.redirectUri });
  }

  async getAccessToken(): Promise<string> {
    const token = this.readToken();
    if (token && token.expiresAt - EXPIRY_MARGIN_MS > this.now()) return token.accessToken;
    this.requireClient();
    if (token?.refreshToken) {
      const refreshed = await this.requestToken({ grant_type: "refresh_token", refresh_token: token.refreshToken }, token.refreshToken);
      return refreshed.accessToken;
    }
    if (!this.options.interactive) {
      throw new AuthFailureError("No cached Spotify login. Run `cueplay devices` once in a terminal to sign in.");
    }
    return (await this.authorizeInteractively()).accessToken;
  }
}
