import { chunk, PLAYLIST_WRITE_BATCH_SIZE } from "./batcher";
import { createLogger, describeError, type Logger } from "./logger";
import { collectAll } from "./pager";
import { findOwnedPlaylist, yearPlaylistName } from "./playlist-locator";
import type { CoverImageGenerator, LibraryApi, PlaylistApi, PlaylistImageApi, Processor, ProfileApi } from "./remote";
import { classifyByYear } from "./track-classifier";
import type { SortSummary, YearResult } from "./types";

export const LIKED_TRACKS_PAGE_SIZE = 50;
export const PLAYLIST_ITEMS_PAGE_SIZE = 100;

export type SortStage = "fetch-library" | "fetch-user" | "locate" | "create" | "clear" | "fill";

export type PlaylistSorterClient = Pick<LibraryApi, "listLikedTracks"> & PlaylistApi & PlaylistImageApi & ProfileApi;

export class PlaylistSortError extends Error {
  readonly stage: SortStage;
  readonly year: number | null;

  constructor(stage: SortStage, year: number | null, cause: unknown) {
    const where = year === null ? `stage ${stage}` : `year ${year} (stage ${stage})`;
    super(`Playlist sort failed at ${where}: ${describeError(cause)}`, { cause });
    this.name = "PlaylistSortError";
    this.stage = stage;
    this.year = year;
  }
}

export interface PlaylistSorterOptions {
  logger?: Logger;
  imageGenerator?: CoverImageGenerator | null;
}

export function yearPlaylistDescription(year: number): string {
  return `All songs I liked that were added in ${year}.`;
}

export class PlaylistSorter implements Processor<SortSummary> {
  private readonly logger: Logger;
  private readonly imageGenerator: CoverImageGenerator | null;

  constructor(
    private readonly client: PlaylistSorterClient,
    options: PlaylistSorterOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("sorter");
    this.imageGenerator = options.imageGenerator ?? null;
  }

  async run(signal?: AbortSignal): Promise<SortSummary> {
    this.logger.info("Starting liked songs sorter...");

    const likedTracks = await this.step("fetch-library", null, signal, () =>
      collectAll((offset, limit, pageSignal) => this.client.listLikedTracks(offset, limit, pageSignal), {
        limit: LIKED_TRACKS_PAGE_SIZE,
        signal,
        onPage: ({ collected, total }) => this.logger.info(`Fetched ${collected}/${total} liked songs...`)
      })
    );
    this.logger.info(`Total liked songs fetched: ${likedTracks.length}`);

    if (likedTracks.length === 0) {
      this.logger.info("No liked tracks found. Nothing to do.");
      return { likedCount: 0, skippedCount: 0, years: [] };
    }

    const { buckets, years, skipped } = classifyByYear(likedTracks, this.logger);
    const user = await this.step("fetch-user", null, signal, () => this.client.currentUser(signal));
    this.logger.info(`Logged in as: ${user.displayName ?? user.id}`);
    this.logger.info(`Found songs spanning ${years.length} years: ${years.join(", ")}`);

    const results: YearResult[] = [];
    for (const year of years) {
      signal?.throwIfAborted();
      results.push(await this.reconcileYear(user.id, year, buckets.get(year) ?? [], signal));
    }

    return { likedCount: likedTracks.length, skippedCount: skipped.length, years: results };
  }

  private async reconcileYear(
    userId: string,
    year: number,
    trackIds: readonly string[],
    signal: AbortSignal | undefined
  ): Promise<YearResult> {
    const playlistName = yearPlaylistName(year);
    this.logger.info(`--- Processing year ${year} (${trackIds.length} tracks) ---`);

    const existing = await this.step("locate", year, signal, () =>
      findOwnedPlaylist(this.client, userId, playlistName, { logger: this.logger, signal })
    );

    let playlistId: string;
    let removedCount = 0;

    if (existing) {
      playlistId = existing.id;
      this.logger.info(`Clearing '${existing.name}'.`);
      removedCount = await this.step("clear", year, signal, () => this.clearPlaylist(existing.id, signal));
    } else {
      const created = await this.step("create", year, signal, () =>
        this.client.createPlaylist(
          userId,
          { name: playlistName, description: yearPlaylistDescription(year), public: false, collaborative: false },
          signal
        )
      );
      playlistId = created.id;
      this.logger.info(`Created new playlist: '${created.name}' (${created.id}).`);
    }

    const imageApplied = await this.applyCoverImage(playlistId, playlistName, signal);

    await this.step("fill", year, signal, () => this.fillPlaylist(playlistId, trackIds, signal));

    return {
      year,
      playlistId,
      createdPlaylist: existing === null,
      removedCount,
      addedCount: trackIds.length,
      imageApplied
    };
  }

  private async clearPlaylist(playlistId: string, signal: AbortSignal | undefined): Promise<number> {
    const entries = await collectAll(
      (offset, limit, pageSignal) => this.client.listPlaylistTracks(playlistId, offset, limit, pageSignal),
      {
        limit: PLAYLIST_ITEMS_PAGE_SIZE,
        signal,
        onPage: ({ collected, total }) => this.logger.debug(`Fetched ${collected}/${total} existing playlist entries...`)
      }
    );

    const trackIds: string[] = [];
    for (const entry of entries) {
      // Unavailable entries have no id and cannot be removed by id.
      if (entry.trackId) {
        trackIds.push(entry.trackId);
      }
    }

    if (trackIds.length === 0) {
      this.logger.info("Playlist is already empty. No tracks to remove.");
      return 0;
    }

    for (const batch of chunk(trackIds, PLAYLIST_WRITE_BATCH_SIZE)) {
      signal?.throwIfAborted();
      this.logger.info(`  Removing batch of ${batch.length} tracks...`);
      await this.client.removeFromPlaylist(playlistId, batch, signal);
    }

    this.logger.info(`Finished removing all ${trackIds.length} old tracks.`);
    return trackIds.length;
  }

  private async fillPlaylist(playlistId: string, trackIds: readonly string[], signal: AbortSignal | undefined): Promise<void> {
    for (const batch of chunk(trackIds, PLAYLIST_WRITE_BATCH_SIZE)) {
      signal?.throwIfAborted();
      this.logger.info(`  Adding batch of ${batch.length} tracks...`);
      await this.client.addToPlaylist(playlistId, batch, signal);
    }

    this.logger.info(`Finished adding all ${trackIds.length} tracks.`);
  }

  private async applyCoverImage(playlistId: string, playlistName: string, signal: AbortSignal | undefined): Promise<boolean> {
    if (!this.imageGenerator) {
      return false;
    }

    this.logger.info("Generating custom cover image...");

    let jpeg: Buffer;
    try {
      jpeg = await this.imageGenerator.generate(playlistName);
    } catch (error) {
      this.logger.warn(`Could not generate image for '${playlistName}': ${describeError(error)}`);
      return false;
    }

    try {
      await this.client.setPlaylistImage(playlistId, jpeg, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      this.logger.warn(`Could not upload cover image for '${playlistName}': ${describeError(error)}`);
      return false;
    }

    this.logger.info("Custom cover image uploaded.");
    return true;
  }

  private async step<T>(
    stage: SortStage,
    year: number | null,
    signal: AbortSignal | undefined,
    action: () => Promise<T>
  ): Promise<T> {
    try {
      return await action();
    } catch (error) {
      // A cancelled run surfaces the abort reason as is.
      if (signal?.aborted) {
        throw error;
      }

      throw new PlaylistSortError(stage, year, error);
    }
  }
}
