import { chunk } from "./batcher";
import { logger as defaultLogger, type Logger } from "./logger";
import type { LibraryApi, PlaylistApi, PlaylistImageApi, ProfileApi } from "./remote";
import type {
  NewPlaylist,
  Page,
  PagingResponse,
  PlaylistEntry,
  PlaylistRef,
  PlaylistTrackItem,
  SavedTrackItem,
  SimplePlaylist,
  SpotifyUser,
  Track,
  UserProfile
} from "./types";

export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com/api";
const MAX_RETRIES = 4;
const REQUEST_TIMEOUT_MS = 30000;
const LIBRARY_REMOVE_BATCH_SIZE = 50;

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(signal?.reason);
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function parseRetryAfterMs(headerValue: string | null): number | null {
  if (!headerValue) {
    return null;
  }

  const seconds = Number(headerValue);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return null;
  }

  return seconds * 1000;
}

function backoffMs(attempt: number): number {
  return 500 * 2 ** (attempt - 1);
}

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  try {
    const parsed = JSON.parse(bodyText) as {
      error?: { message?: string } | string;
      error_description?: string;
      message?: string;
    };

    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? `${parsed.error} (${parsed.error_description})` : parsed.error;
      return `Spotify API request failed with status ${status}: ${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}

export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

export function trackUri(trackId: string): string {
  return `spotify:track:${trackId}`;
}

export function toTrack(item: SavedTrackItem): Track | null {
  const track = item.track;
  if (!track || !track.id || track.is_local === true) {
    return null;
  }

  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map((artist) => artist.name),
    addedAt: item.added_at
  };
}

export function toPlaylistEntry(item: PlaylistTrackItem): PlaylistEntry {
  const track = item.item ?? item.track ?? null;
  if (!track || !track.id || track.is_local === true) {
    return { trackId: null };
  }

  return { trackId: track.id };
}

function toPlaylistRef(playlist: SimplePlaylist): PlaylistRef {
  return { id: playlist.id, name: playlist.name, ownerId: playlist.owner.id };
}

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface RequestOptions {
  method?: HttpMethod;
  body?: unknown;
  rawBody?: { contentType: string; data: string };
  signal?: AbortSignal;
}

export interface SpotifyClientOptions {
  logger?: Logger;
  fetch?: typeof fetch;
}

export class SpotifyClient implements LibraryApi, PlaylistApi, PlaylistImageApi, ProfileApi {
  private accessToken: string | null = null;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly refreshToken: string,
    options: SpotifyClientOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async refreshAccessToken(signal?: AbortSignal): Promise<string> {
    const params = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: this.refreshToken,
      client_id: this.clientId,
      client_secret: this.clientSecret
    });

    const bodyText = await this.send(
      `${SPOTIFY_ACCOUNTS_BASE}/token`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: params.toString()
      },
      signal
    );

    const parsed = JSON.parse(bodyText) as { access_token?: string };
    if (!parsed.access_token) {
      throw new Error("Spotify token response did not include access_token");
    }

    this.accessToken = parsed.access_token;
    return parsed.access_token;
  }

  async currentUser(signal?: AbortSignal): Promise<UserProfile> {
    const user = await this.request<SpotifyUser>(`${SPOTIFY_API_BASE}/me`, { signal });
    return { id: user.id, displayName: user.display_name };
  }

  async listLikedTracks(offset: number, limit: number, signal?: AbortSignal): Promise<Page<Track>> {
    const page = await this.request<PagingResponse<SavedTrackItem>>(
      `${SPOTIFY_API_BASE}/me/tracks?limit=${limit}&offset=${offset}`,
      { signal }
    );

    // Local files and removed catalog entries have no id but still occupy a slot.
    const tracks: Track[] = [];
    for (const item of page.items) {
      const track = toTrack(item);
      if (track) {
        tracks.push(track);
      } else {
        this.logger.debug(`Ignoring liked item without a track id at offset ${offset}.`);
      }
    }

    return { items: tracks, total: page.total, span: page.items.length };
  }

  async removeFromLibrary(trackIds: readonly string[], signal?: AbortSignal): Promise<void> {
    for (const ids of chunk(trackIds, LIBRARY_REMOVE_BATCH_SIZE)) {
      await this.request<void>(`${SPOTIFY_API_BASE}/me/tracks`, { method: "DELETE", body: { ids }, signal });
    }
  }

  async listUserPlaylists(userId: string, offset: number, limit: number, signal?: AbortSignal): Promise<Page<PlaylistRef>> {
    const page = await this.request<PagingResponse<SimplePlaylist | null>>(
      `${SPOTIFY_API_BASE}/users/${encodeURIComponent(userId)}/playlists?limit=${limit}&offset=${offset}`,
      { signal }
    );

    const playlists: PlaylistRef[] = [];
    for (const playlist of page.items) {
      if (playlist) {
        playlists.push(toPlaylistRef(playlist));
      }
    }

    return { items: playlists, total: page.total, span: page.items.length };
  }

  async createPlaylist(userId: string, playlist: NewPlaylist, signal?: AbortSignal): Promise<PlaylistRef> {
    const created = await this.request<SimplePlaylist>(
      `${SPOTIFY_API_BASE}/users/${encodeURIComponent(userId)}/playlists`,
      {
        method: "POST",
        body: {
          name: playlist.name,
          description: playlist.description,
          public: playlist.public,
          collaborative: playlist.collaborative
        },
        signal
      }
    );

    return toPlaylistRef(created);
  }

  async listPlaylistTracks(
    playlistId: string,
    offset: number,
    limit: number,
    signal?: AbortSignal
  ): Promise<Page<PlaylistEntry>> {
    const page = await this.request<PagingResponse<PlaylistTrackItem>>(
      `${SPOTIFY_API_BASE}/playlists/${playlistId}/items?limit=${limit}&offset=${offset}`,
      { signal }
    );

    return { items: page.items.map(toPlaylistEntry), total: page.total };
  }

  async addToPlaylist(playlistId: string, trackIds: readonly string[], signal?: AbortSignal): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/playlists/${playlistId}/items`, {
      method: "POST",
      body: { uris: trackIds.map(trackUri) },
      signal
    });
  }

  async removeFromPlaylist(playlistId: string, trackIds: readonly string[], signal?: AbortSignal): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/playlists/${playlistId}/items`, {
      method: "DELETE",
      body: { tracks: trackIds.map((id) => ({ uri: trackUri(id) })) },
      signal
    });
  }

  async setPlaylistImage(playlistId: string, jpeg: Buffer, signal?: AbortSignal): Promise<void> {
    await this.request<void>(`${SPOTIFY_API_BASE}/playlists/${playlistId}/images`, {
      method: "PUT",
      rawBody: { contentType: "image/jpeg", data: jpeg.toString("base64") },
      signal
    });
  }

  private async request<T>(url: string, options: RequestOptions): Promise<T> {
    const method = options.method ?? "GET";
    let refreshed = false;

    while (true) {
      const accessToken = this.accessToken ?? (await this.refreshAccessToken(options.signal));
      const headers: Record<string, string> = {
        Accept: "application/json",
        Authorization: `Bearer ${accessToken}`
      };

      let body: string | undefined;
      if (options.rawBody) {
        headers["Content-Type"] = options.rawBody.contentType;
        body = options.rawBody.data;
      } else if (options.body !== undefined) {
        headers["Content-Type"] = "application/json";
        body = JSON.stringify(options.body);
      }

      this.logger.debug(`Spotify request: ${method} ${url}`);

      try {
        const bodyText = await this.send(url, { method, headers, body }, options.signal);
        if (!bodyText) {
          return undefined as T;
        }

        return JSON.parse(bodyText) as T;
      } catch (error) {
        if (error instanceof SpotifyApiError && error.status === 401 && !refreshed) {
          this.logger.warn("Spotify access token rejected. Refreshing and retrying once.");
          this.accessToken = null;
          refreshed = true;
          continue;
        }

        throw error;
      }
    }
  }

  // The caller's signal is checked between attempts only; a call already sent runs to completion.
  private async send(url: string, init: RequestInit, signal?: AbortSignal): Promise<string> {
    let attempt = 0;

    while (true) {
      signal?.throwIfAborted();

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      } catch (error) {
        const timedOut = controller.signal.aborted;
        if (timedOut && attempt < MAX_RETRIES) {
          attempt += 1;
          this.logger.warn(`Spotify request timed out after ${REQUEST_TIMEOUT_MS}ms. Retrying attempt ${attempt}.`);
          await sleep(backoffMs(attempt), signal);
          continue;
        }

        throw error;
      } finally {
        clearTimeout(timeoutId);
      }

      const bodyText = await response.text();

      if (response.ok) {
        return bodyText;
      }

      const shouldRetry = response.status === 429 || response.status >= 500;
      if (shouldRetry && attempt < MAX_RETRIES) {
        attempt += 1;
        const waitMs = parseRetryAfterMs(response.headers.get("retry-after")) ?? backoffMs(attempt);
        this.logger.warn(`Spotify responded ${response.status}. Retrying attempt ${attempt} in ${waitMs}ms.`);
        await sleep(waitMs, signal);
        continue;
      }

      throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
    }
  }
}
