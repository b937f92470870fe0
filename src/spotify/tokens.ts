import { readFile, writeFile } from "node:fs/promises";
import type { Logger } from "../utils/logger";

const TOKEN_URL = "https://accounts.spotify.com/api/token";
const EXPIRY_MARGIN_SECONDS = 60;

/** On-disk token cache, in the layout the authorization helper writes. */
export type TokenCache = {
  access_token: string;
  token_type: string;
  expires_in: number;
  scope: string;
  expires_at: number;
  refresh_token: string;
};

type RefreshResponse = {
  access_token: string;
  token_type?: string;
  expires_in: number;
  scope?: string;
  refresh_token?: string;
};

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export type TokenStoreOptions = {
  cachePath: string;
  clientId?: string;
  clientSecret?: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
};

function parseTokenCache(raw: string, cachePath: string): TokenCache {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null) {
    throw new Error(`Spotify token cache at ${cachePath} is not a JSON object`);
  }
  const record: Record<string, unknown> = { ...data };
  const { access_token, refresh_token, expires_at } = record;
  if (typeof access_token !== "string" || typeof refresh_token !== "string" || typeof expires_at !== "number") {
    throw new Error(`Spotify token cache at ${cachePath} is missing access_token, refresh_token or expires_at`);
  }
  return {
    access_token,
    refresh_token,
    expires_at,
    token_type: typeof record.token_type === "string" ? record.token_type : "Bearer",
    expires_in: typeof record.expires_in === "number" ? record.expires_in : 3600,
    scope: typeof record.scope === "string" ? record.scope : "",
  };
}

function parseRefreshResponse(data: unknown): RefreshResponse {
  if (typeof data !== "object" || data === null) {
    throw new Error("Spotify token refresh returned a non-object body");
  }
  const record: Record<string, unknown> = { ...data };
  const { access_token, expires_in } = record;
  if (typeof access_token !== "string" || typeof expires_in !== "number" || !Number.isFinite(expires_in)) {
    throw new Error("Spotify token refresh response is missing access_token or expires_in");
  }
  return {
    access_token,
    expires_in,
    token_type: typeof record.token_type === "string" ? record.token_type : undefined,
    scope: typeof record.scope === "string" ? record.scope : undefined,
    refresh_token: typeof record.refresh_token === "string" ? record.refresh_token : undefined,
  };
}

export class SpotifyTokenStore implements AccessTokenProvider {
  private options: TokenStoreOptions;
  private logger: Logger;
  private fetchImpl: typeof fetch;
  private now: () => number;
  private cached: TokenCache | null = null;
  private refreshing: Promise<TokenCache> | null = null;

  constructor(options: TokenStoreOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(): Promise<string> {
    const token = this.cached ?? (await this.load());
    if (!this.isExpired(token)) return token.access_token;

    // Concurrent callers share one refresh request.
    if (!this.refreshing) {
      this.refreshing = this.refresh(token).finally(() => {
        this.refreshing = null;
      });
    }
    const refreshed = await this.refreshing;
    return refreshed.access_token;
  }

  private isExpired(token: TokenCache): boolean {
    return token.expires_at - EXPIRY_MARGIN_SECONDS < this.now() / 1000;
  }

  private async load(): Promise<TokenCache> {
    const { cachePath } = this.options;
    let raw: string;
    try {
      raw = await readFile(cachePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new Error(`No Spotify token cache found at ${cachePath}`);
      }
      throw err;
    }
    this.cached = parseTokenCache(raw, cachePath);
    return this.cached;
  }

  private async refresh(token: TokenCache): Promise<TokenCache> {
    const { clientId, clientSecret, cachePath } = this.options;
    if (!clientId || !clientSecret) {
      throw new Error("SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET are required to refresh the Spotify token");
    }
    this.logger.info("Spotify token expired, refreshing");

    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
    const res = await this.fetchImpl(TOKEN_URL, {
      method: "POST",
      headers: {
        Authorization: `Basic ${credentials}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({ grant_type: "refresh_token", refresh_token: token.refresh_token }).toString(),
    });
    if (!res.ok) {
      throw new Error(`Spotify token refresh failed: HTTP ${res.status}`);
    }
    const body = parseRefreshResponse(await res.json());

    const next: TokenCache = {
      access_token: body.access_token,
      token_type: body.token_type ?? token.token_type,
      expires_in: body.expires_in,
      scope: body.scope ?? token.scope,
      expires_at: Math.floor(this.now() / 1000) + body.expires_in,
      refresh_token: body.refresh_token ?? token.refresh_token,
    };
    this.cached = next;
    await writeFile(cachePath, JSON.stringify(next), "utf8");
    this.logger.info("Spotify token refreshed", { expiresAt: next.expires_at });
    return next;
  }
}
