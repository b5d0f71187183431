import { AuthFailureError, CueplayError, ErrorCode, NotFoundError } from "../errors.js";
import { getArray, getBoolean, getNumber, getRecord, getString } from "../utils/json.js";
import type { SpotifyConfig } from "../config/schema.js";
import { SpotifyAuth } from "./auth.js";
import { formatMediaUri, type MediaReference } from "./reference.js";
import type { AlbumInfo, ArtistInfo, Device, MediaService, PlaylistInfo, TrackInfo } from "./service.js";

const API_BASE = "https://api.spotify.com/v1";

type TokenSource = Pick<SpotifyAuth, "getAccessToken">;

export class SpotifyApiError extends CueplayError {
  constructor(readonly status: number, message: string) {
    super(ErrorCode.SERVICE_ERROR, message);
    this.name = "SpotifyApiError";
  }
}

function names(list: unknown[]): string[] {
  return list.map((item) => getString(item, "name")).filter(Boolean);
}

export function toDevice(raw: unknown): Device {
  return {
    id: getString(raw, "id"),
    name: getString(raw, "name", "<unnamed>"),
    type: getString(raw, "type", "unknown"),
    isActive: getBoolean(raw, "is_active"),
    isPrivateSession: getBoolean(raw, "is_private_session"),
    volumePercent: getNumber(raw, "volume_percent"),
  };
}

/** Spotify Web API over fetch. */
export class SpotifyService implements MediaService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly auth: TokenSource, fetchImpl?: typeof fetch) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  private async request(method: string, pathname: string, body?: unknown): Promise<unknown> {
    const token = await this.auth.getAccessToken();
    const res = await this.fetchImpl(`${API_BASE}${pathname}`, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (res.status === 204) return null;
    const text = await res.text();
    let data: unknown = null;
    try {
      data = text ? JSON.parse(text) : null;
    } catch {
      data = { error: { message: text } };
    }
    if (res.status === 401) throw new AuthFailureError(`Spotify rejected the access token: ${getString(getRecord(data, "error"), "message", res.statusText)}`);
    if (res.status === 404) throw new NotFoundError(getString(getRecord(data, "error"), "message", `${pathname} not found`));
    if (!res.ok) {
      const message = getString(getRecord(data, "error"), "message", res.statusText);
      throw new SpotifyApiError(res.status, `Spotify API ${method} ${pathname} failed (${res.status}): ${message}`);
    }
    return data;
  }

  async listDevices(): Promise<Device[]> {
    const data = await this.request("GET", "/me/player/devices");
    return getArray(data, "devices").map(toDevice);
  }

  async fetchTrack(id: string): Promise<TrackInfo> {
    const data = await this.request("GET", `/tracks/${id}`);
    return {
      name: getString(data, "name"),
      artists: names(getArray(data, "artists")),
      durationMs: getNumber(data, "duration_ms") ?? 0,
    };
  }

  async fetchAlbum(id: string): Promise<AlbumInfo> {
    const data = await this.request("GET", `/albums/${id}`);
    return {
      name: getString(data, "name"),
      artists: names(getArray(data, "artists")),
      totalTracks: getNumber(data, "total_tracks") ?? 0,
    };
  }

  async fetchPlaylist(id: string): Promise<PlaylistInfo> {
    const data = await this.request("GET", `/playlists/${id}?fields=name,owner(display_name,id),tracks(total)`);
    const owner = getRecord(data, "owner");
    return {
      name: getString(data, "name"),
      owner: getString(owner, "display_name") || getString(owner, "id"),
      totalTracks: getNumber(getRecord(data, "tracks"), "total") ?? 0,
    };
  }

  async fetchArtist(id: string): Promise<ArtistInfo> {
    const data = await this.request("GET", `/artists/${id}`);
    return { name: getString(data, "name"), followers: getNumber(getRecord(data, "followers"), "total") ?? 0 };
  }

  async startPlayback(deviceId: string, ref: MediaReference): Promise<void> {
    await this.request("PUT", "/me/player", { device_ids: [deviceId], play: false });
    const uri = formatMediaUri(ref);
    const body = ref.kind === "track" ? { uris: [uri], position_ms: 0 } : { context_uri: uri };
    await this.request("PUT", `/me/player/play?device_id=${encodeURIComponent(deviceId)}`, body);
  }

  async setVolume(deviceId: string, percent: number): Promise<void> {
    const volume = Math.min(100, Math.max(0, Math.round(percent)));
    await this.request("PUT", `/me/player/volume?volume_percent=${volume}&device_id=${encodeURIComponent(deviceId)}`);
  }

  async currentVolumePercent(): Promise<number | null> {
    const data = await this.request("GET", "/me/player");
    return data === null ? null : getNumber(getRecord(data, "device"), "volume_percent");
  }
}

export function createSpotifyService(config: SpotifyConfig, interactive: boolean): SpotifyService {
  return new SpotifyService(new SpotifyAuth(config, { interactive }));
}
