// Spotify Web API payloads (only the fields this project reads).

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface SpotifyArtist {
  id: string | null;
  name: string;
}

export interface SpotifyTrack {
  id: string | null;
  uri: string;
  name: string;
  artists: SpotifyArtist[];
  is_local?: boolean;
}

export interface SavedTrackItem {
  added_at: string;
  track: SpotifyTrack | null;
}

export interface PlaylistTrackItem {
  added_at: string | null;
  // Newer payloads carry the entry under `item`; older ones under `track`.
  item?: SpotifyTrack | null;
  track?: SpotifyTrack | null;
}

export interface SimplePlaylist {
  id: string;
  name: string;
  owner: { id: string; display_name?: string | null };
}

export interface PagingResponse<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  next: string | null;
}

// Domain values handed to the processors.

export interface Track {
  id: string;
  name: string;
  artists: string[];
  addedAt: string;
}

export interface PlaylistRef {
  id: string;
  name: string;
  ownerId: string;
}

export interface PlaylistEntry {
  /** Null when the entry is unavailable (deleted, region-restricted or a local file). */
  trackId: string | null;
}

export interface UserProfile {
  id: string;
  displayName: string | null;
}

export interface NewPlaylist {
  name: string;
  description: string;
  public: boolean;
  collaborative: boolean;
}

export interface Page<T> {
  items: T[];
  total: number;
  /** Slots of the remote collection this page covered, when some were dropped from `items`. */
  span?: number;
}

export interface YearResult {
  year: number;
  playlistId: string;
  createdPlaylist: boolean;
  removedCount: number;
  addedCount: number;
  imageApplied: boolean;
}

export interface SortSummary {
  likedCount: number;
  skippedCount: number;
  years: YearResult[];
}

export interface RemovalSummary {
  scannedCount: number;
  markedCount: number;
  removedCount: number;
  failedBatchCount: number;
}
