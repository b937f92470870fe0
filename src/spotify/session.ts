import type { ActionResult, MediaControl, PlaybackAction, SearchType } from "../types";
import type { Logger } from "../utils/logger";
import { describeError } from "../utils/errors";
import { type SearchResults, SpotifyApiError, type SpotifyWebApi } from "./api";

export const NOT_INITIALIZED_MESSAGE =
  "Spotify not initialized. Authorize Spotify to create the token cache, then retry.";
const NO_ACTIVE_DEVICE = "No active device found. Please open Spotify.";
const NO_DEVICE_AVAILABLE = "No Spotify device available. Please open Spotify.";
const DEVICE_NOT_FOUND = "Device not found. Please open Spotify and start playing something first.";
const PREMIUM_REQUIRED = "Premium account required for playback control.";
const SEARCH_LIMIT = 10;
const ARTIST_TOP_TRACKS = 10;

function failure(message: string): ActionResult {
  return { status: "error", message };
}

/**
 * Spotify connection state shared by every request: readiness and the device
 * playback is sent to. Initialization and device lookups are single-flight,
 * so concurrent commands await the same call instead of racing on the cache.
 */
export class SpotifySession implements MediaControl {
  private api: SpotifyWebApi;
  private logger: Logger;
  private ready = false;
  private deviceId: string | null = null;
  private initializing: Promise<boolean> | null = null;
  private resolvingDevice: Promise<string | null> | null = null;

  constructor(api: SpotifyWebApi, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  isReady(): boolean {
    return this.ready;
  }

  /** Resolves false when the account check fails; a later call tries again. */
  initialize(): Promise<boolean> {
    if (this.ready) return Promise.resolve(true);
    if (!this.initializing) {
      this.initializing = this.connect().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async connect(): Promise<boolean> {
    try {
      const user = await this.api.currentUser();
      this.logger.info("Spotify connected", { user: user.display_name ?? user.id });
    } catch (err) {
      this.logger.error("Failed to initialize Spotify", { message: describeError(err) });
      return false;
    }
    this.ready = true;
    await this.ensureDevice();
    return true;
  }

  ensureDevice(): Promise<string | null> {
    if (this.deviceId) return Promise.resolve(this.deviceId);
    if (!this.resolvingDevice) {
      this.resolvingDevice = this.lookupDevice().finally(() => {
        this.resolvingDevice = null;
      });
    }
    return this.resolvingDevice;
  }

  private async lookupDevice(): Promise<string | null> {
    try {
      const devices = (await this.api.devices()).filter((d) => d.id);
      const device = devices.find((d) => d.is_active) ?? devices[0];
      if (!device) {
        this.logger.warn("No Spotify devices found. Please open Spotify on a device.");
        return null;
      }
      this.deviceId = device.id;
      this.logger.info(device.is_active ? "Using active device" : "Using device", { device: device.name });
      return this.deviceId;
    } catch (err) {
      this.logger.error("Error getting devices", { message: describeError(err) });
      return null;
    }
  }

  close(): void {
    this.ready = false;
    this.deviceId = null;
  }

  private apiFailure(err: unknown, notFoundMessage: string): ActionResult {
    if (err instanceof SpotifyApiError) {
      if (err.status === 404) {
        this.deviceId = null;
        return failure(notFoundMessage);
      }
      if (err.status === 403) return failure(PREMIUM_REQUIRED);
      this.logger.error("Spotify API error", { status: err.status, message: err.message });
      return failure(`Spotify error: ${err.message}`);
    }
    this.logger.error("Spotify request failed", { message: describeError(err) });
    return failure(describeError(err));
  }

  async controlPlayback(action: PlaybackAction): Promise<ActionResult> {
    if (!(await this.initialize())) return failure(NOT_INITIALIZED_MESSAGE);
    const deviceId = await this.ensureDevice();
    if (!deviceId) return failure(NO_ACTIVE_DEVICE);

    try {
      switch (action) {
        case "play":
          await this.api.startPlayback(deviceId);
          return { status: "success", message: "Playback resumed" };
        case "pause":
          await this.api.pausePlayback(deviceId);
          return { status: "success", message: "Playback paused" };
        case "skip":
        case "next":
          await this.api.nextTrack(deviceId);
          return { status: "success", message: "Skipped to next track" };
        case "previous":
          await this.api.previousTrack(deviceId);
          return { status: "success", message: "Playing previous track" };
      }
    } catch (err) {
      return this.apiFailure(err, NO_ACTIVE_DEVICE);
    }
  }

  async searchAndPlay(query: string, type: SearchType): Promise<ActionResult> {
    if (!(await this.initialize())) return failure(NOT_INITIALIZED_MESSAGE);
    const deviceId = await this.ensureDevice();
    if (!deviceId) return failure(NO_DEVICE_AVAILABLE);

    try {
      this.logger.info("Searching Spotify", { type, query });
      const results = await this.api.search(query, type, SEARCH_LIMIT);
      const played = await this.playFirstMatch(results, type, deviceId);
      return played ?? failure(`No ${type} found for '${query}'`);
    } catch (err) {
      return this.apiFailure(err, DEVICE_NOT_FOUND);
    }
  }

  private async playFirstMatch(
    results: SearchResults,
    type: SearchType,
    deviceId: string
  ): Promise<ActionResult | null> {
    switch (type) {
      case "track": {
        const track = results.tracks?.items[0];
        if (!track) return null;
        const artist = track.artists[0]?.name ?? "Unknown artist";
        await this.api.startPlayback(deviceId, { uris: [track.uri] });
        return { status: "success", message: `Playing: ${track.name} by ${artist}`, track: track.name, artist };
      }
      case "artist": {
        const artist = results.artists?.items[0];
        if (!artist) return null;
        const topTracks = await this.api.artistTopTracks(artist.id);
        if (topTracks.length === 0) return null;
        await this.api.startPlayback(deviceId, {
          uris: topTracks.slice(0, ARTIST_TOP_TRACKS).map((t) => t.uri),
        });
        return { status: "success", message: `Playing top tracks by ${artist.name}`, artist: artist.name };
      }
      case "playlist": {
        const playlist = results.playlists?.items.find((p) => p !== null);
        if (!playlist) return null;
        await this.api.startPlayback(deviceId, { context_uri: playlist.uri });
        return { status: "success", message: `Playing playlist: ${playlist.name}`, playlist: playlist.name };
      }
      case "album": {
        const album = results.albums?.items[0];
        if (!album) return null;
        const artist = album.artists[0]?.name ?? "Unknown artist";
        await this.api.startPlayback(deviceId, { context_uri: album.uri });
        return {
          status: "success",
          message: `Playing album: ${album.name} by ${artist}`,
          album: album.name,
          artist,
        };
      }
    }
  }

  async getCurrentTrack(): Promise<ActionResult> {
    if (!(await this.initialize())) return failure(NOT_INITIALIZED_MESSAGE);

    try {
      const current = await this.api.currentPlayback();
      if (!current?.item) {
        return { status: "success", message: "No track currently playing" };
      }
      const track = current.item;
      const artist = track.artists[0]?.name ?? "Unknown artist";
      return {
        status: "success",
        message: `Now playing: ${track.name} by ${artist}`,
        is_playing: current.is_playing,
        track: track.name,
        artist,
        album: track.album.name,
        progress: current.progress_ms ?? 0,
        duration: track.duration_ms,
      };
    } catch (err) {
      this.logger.error("Error getting current track", { message: describeError(err) });
      return failure(describeError(err));
    }
  }
}
