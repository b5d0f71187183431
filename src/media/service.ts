import type { MediaReference } from "./reference.js";

export interface Device {
  id: string;
  name: string;
  type: string;
  isActive: boolean;
  isPrivateSession: boolean;
  volumePercent: number | null;
}

export interface TrackInfo {
  name: string;
  artists: string[];
  durationMs: number;
}

export interface AlbumInfo {
  name: string;
  artists: string[];
  totalTracks: number;
}

export interface PlaylistInfo {
  name: string;
  owner: string;
  totalTracks: number;
}

export interface ArtistInfo {
  name: string;
  followers: number;
}

/** Remote playback capability. Authentication is the implementation's concern. */
export interface MediaService {
  listDevices(): Promise<Device[]>;
  fetchTrack(id: string): Promise<TrackInfo>;
  fetchAlbum(id: string): Promise<AlbumInfo>;
  fetchPlaylist(id: string): Promise<PlaylistInfo>;
  fetchArtist(id: string): Promise<ArtistInfo>;
  startPlayback(deviceId: string, ref: MediaReference): Promise<void>;
  setVolume(deviceId: string, percent: number): Promise<void>;
  /** Volume of the active device, or null when nothing is playing. */
  currentVolumePercent(): Promise<number | null>;
}

function formatMs(ms: number): string {
  const total = Math.round(ms / 1000);
  return `${Math.floor(total / 60)}:${String(total % 60).padStart(2, "0")}`;
}

/** One-line human description of a reference, e.g. `Track: Song by Artist (3:45)`. */
export async function describeMedia(service: MediaService, ref: MediaReference): Promise<string> {
  switch (ref.kind) {
    case "track": {
      const t = await service.fetchTrack(ref.id);
      return `Track: ${t.name} by ${t.artists.join(", ")} (${formatMs(t.durationMs)})`;
    }
    case "album": {
      const a = await service.fetchAlbum(ref.id);
      return `Album: ${a.name} by ${a.artists.join(", ")} (${a.totalTracks} tracks)`;
    }
    case "playlist": {
      const p = await service.fetchPlaylist(ref.id);
      return `Playlist: ${p.name} by ${p.owner} (${p.totalTracks} tracks)`;
    }
    case "artist": {
      const a = await service.fetchArtist(ref.id);
      return `Artist: ${a.name}`;
    }
  }
}
