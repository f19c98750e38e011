import type { Logger } from "./logger";
import { pages } from "./pager";
import type { PlaylistApi } from "./remote";
import type { PlaylistRef } from "./types";

export const PLAYLIST_PAGE_SIZE = 50;

export function yearPlaylistName(year: number): string {
  return `Liked Songs (${year})`;
}

// First match in page order; names compare exactly.
export async function findOwnedPlaylist(
  api: Pick<PlaylistApi, "listUserPlaylists">,
  ownerId: string,
  name: string,
  options: { logger: Logger; signal?: AbortSignal }
): Promise<PlaylistRef | null> {
  options.logger.info(`Searching for existing playlist named '${name}'...`);

  const walk = pages(
    (offset, limit, signal) => api.listUserPlaylists(ownerId, offset, limit, signal),
    { limit: PLAYLIST_PAGE_SIZE, signal: options.signal }
  );

  for await (const playlists of walk) {
    const match = playlists.find((playlist) => playlist.name === name && playlist.ownerId === ownerId);
    if (match) {
      options.logger.info(`Found existing playlist: '${match.name}' (${match.id}).`);
      return { ...match };
    }
  }

  options.logger.info(`No existing playlist named '${name}'.`);
  return null;
}
