import type { SearchType } from "../types";
import type { AccessTokenProvider } from "./tokens";

const API_BASE = "https://api.spotify.com/v1";
const TOP_TRACKS_MARKET = "US";

export type SpotifyUser = {
  id: string;
  display_name: string | null;
};

export type SpotifyDevice = {
  id: string | null;
  name: string;
  type: string;
  is_active: boolean;
};

export type SpotifyArtist = {
  id: string;
  name: string;
  uri: string;
};

export type SpotifyAlbum = {
  id: string;
  name: string;
  uri: string;
  artists: SpotifyArtist[];
};

export type SpotifyTrack = {
  id: string;
  name: string;
  uri: string;
  duration_ms: number;
  artists: SpotifyArtist[];
  album: SpotifyAlbum;
};

export type SpotifyPlaylist = {
  id: string;
  name: string;
  uri: string;
};

type Paging<T> = { items: T[] };

// Playlist search can return null entries for removed playlists.
export type SearchResults = {
  tracks?: Paging<SpotifyTrack>;
  artists?: Paging<SpotifyArtist>;
  albums?: Paging<SpotifyAlbum>;
  playlists?: Paging<SpotifyPlaylist | null>;
};

export type CurrentPlayback = {
  is_playing: boolean;
  progress_ms: number | null;
  item: SpotifyTrack | null;
};

export type PlaybackTarget = { uris: string[] } | { context_uri: string };

export interface SpotifyWebApi {
  currentUser(): Promise<SpotifyUser>;
  devices(): Promise<SpotifyDevice[]>;
  search(query: string, type: SearchType, limit: number): Promise<SearchResults>;
  artistTopTracks(artistId: string): Promise<SpotifyTrack[]>;
  startPlayback(deviceId: string | null, target?: PlaybackTarget): Promise<void>;
  pausePlayback(deviceId: string | null): Promise<void>;
  nextTrack(deviceId: string | null): Promise<void>;
  previousTrack(deviceId: string | null): Promise<void>;
  currentPlayback(): Promise<CurrentPlayback | null>;
}

export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(`HTTP ${status}: ${message}`);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

function errorMessageFrom(text: string, fallback: string): string {
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body) {
      const { error } = body;
      if (typeof error === "string") return error;
      if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
      }
    }
  } catch {
    // not JSON; use the raw text
  }
  return text.trim() || fallback;
}

type RequestOptions = {
  query?: Record<string, string | number | null | undefined>;
  body?: unknown;
};

export class SpotifyWebClient implements SpotifyWebApi {
  private tokens: AccessTokenProvider;
  private fetchImpl: typeof fetch;

  constructor(tokens: AccessTokenProvider, options: { fetchImpl?: typeof fetch } = {}) {
    this.tokens = tokens;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private async request<T>(method: string, path: string, options: RequestOptions = {}): Promise<T | null> {
    const url = new URL(`${API_BASE}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== null && value !== undefined) url.searchParams.set(key, String(value));
    }

    const token = await this.tokens.getAccessToken();
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    const res = await this.fetchImpl(url.toString(), { method, headers, body });
    if (!res.ok) {
      throw new SpotifyApiError(res.status, errorMessageFrom(await res.text(), res.statusText));
    }
    const text = await res.text();
    if (res.status === 204 || !text) return null;
    return JSON.parse(text) as T;
  }

  private async requestJson<T>(method: string, path: string, options: RequestOptions = {}): Promise<T> {
    const data = await this.request<T>(method, path, options);
    if (data === null) {
      throw new SpotifyApiError(502, `Empty response from ${path}`);
    }
    return data;
  }

  currentUser(): Promise<SpotifyUser> {
    return this.requestJson<SpotifyUser>("GET", "/me");
  }

  async devices(): Promise<SpotifyDevice[]> {
    const data = await this.requestJson<{ devices: SpotifyDevice[] }>("GET", "/me/player/devices");
    return data.devices;
  }

  search(query: string, type: SearchType, limit: number): Promise<SearchResults> {
    return this.requestJson<SearchResults>("GET", "/search", { query: { q: query, type, limit } });
  }

  async artistTopTracks(artistId: string): Promise<SpotifyTrack[]> {
    const data = await this.requestJson<{ tracks: SpotifyTrack[] }>(
      "GET",
      `/artists/${encodeURIComponent(artistId)}/top-tracks`,
      { query: { market: TOP_TRACKS_MARKET } }
    );
    return data.tracks;
  }

  async startPlayback(deviceId: string | null, target?: PlaybackTarget): Promise<void> {
    await this.request("PUT", "/me/player/play", { query: { device_id: deviceId }, body: target });
  }

  async pausePlayback(deviceId: string | null): Promise<void> {
    await this.request("PUT", "/me/player/pause", { query: { device_id: deviceId } });
  }

  async nextTrack(deviceId: string | null): Promise<void> {
    await this.request("POST", "/me/player/next", { query: { device_id: deviceId } });
  }

  async previousTrack(deviceId: string | null): Promise<void> {
    await this.request("POST", "/me/player/previous", { query: { device_id: deviceId } });
  }

  currentPlayback(): Promise<CurrentPlayback | null> {
    return this.request<CurrentPlayback>("GET", "/me/player");
  }
}
