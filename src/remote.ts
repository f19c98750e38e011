import type { NewPlaylist, Page, PlaylistEntry, PlaylistRef, Track, UserProfile } from "./types";

// Capabilities the processors consume. SpotifyClient implements all of them;
// tests substitute in-memory fakes.

export interface LibraryApi {
  listLikedTracks(offset: number, limit: number, signal?: AbortSignal): Promise<Page<Track>>;
  removeFromLibrary(trackIds: readonly string[], signal?: AbortSignal): Promise<void>;
}

export interface PlaylistApi {
  listUserPlaylists(userId: string, offset: number, limit: number, signal?: AbortSignal): Promise<Page<PlaylistRef>>;
  createPlaylist(userId: string, playlist: NewPlaylist, signal?: AbortSignal): Promise<PlaylistRef>;
  listPlaylistTracks(playlistId: string, offset: number, limit: number, signal?: AbortSignal): Promise<Page<PlaylistEntry>>;
  addToPlaylist(playlistId: string, trackIds: readonly string[], signal?: AbortSignal): Promise<void>;
  removeFromPlaylist(playlistId: string, trackIds: readonly string[], signal?: AbortSignal): Promise<void>;
}

export interface PlaylistImageApi {
  setPlaylistImage(playlistId: string, jpeg: Buffer, signal?: AbortSignal): Promise<void>;
}

export interface ProfileApi {
  currentUser(signal?: AbortSignal): Promise<UserProfile>;
}

export interface CoverImageGenerator {
  generate(seedName: string): Promise<Buffer>;
}

export interface Processor<TSummary> {
  run(signal?: AbortSignal): Promise<TSummary>;
}
