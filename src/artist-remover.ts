import { createLogger, describeError, type Logger } from "./logger";
import type { LibraryApi, Processor } from "./remote";
import type { RemovalSummary, Track } from "./types";

export const LIKED_TRACKS_SCAN_PAGE_SIZE = 50;

export function buildBlocklist(artists: Iterable<string>): ReadonlySet<string> {
  const names = new Set<string>();
  for (const artist of artists) {
    const trimmed = artist.trim();
    if (trimmed) {
      names.add(trimmed);
    }
  }

  return names;
}

export interface ArtistRemoverOptions {
  logger?: Logger;
  pageSize?: number;
}

export class ArtistRemover implements Processor<RemovalSummary> {
  private readonly logger: Logger;
  private readonly pageSize: number;

  constructor(
    private readonly library: LibraryApi,
    private readonly blocklist: ReadonlySet<string>,
    options: ArtistRemoverOptions = {}
  ) {
    this.logger = options.logger ?? createLogger("artist-remover");
    this.pageSize = options.pageSize ?? LIKED_TRACKS_SCAN_PAGE_SIZE;
  }

  async run(signal?: AbortSignal): Promise<RemovalSummary> {
    this.logger.info(`Starting artist track removal for ${this.blocklist.size} artist(s)...`);

    const summary: RemovalSummary = { scannedCount: 0, markedCount: 0, removedCount: 0, failedBatchCount: 0 };
    let offset = 0;
    let total: number | null = null;

    while (true) {
      signal?.throwIfAborted();

      this.logger.info(`Fetching liked songs page (offset: ${offset})...`);
      const page = await this.library.listLikedTracks(offset, this.pageSize, signal);

      if (total === null) {
        total = page.total;
        this.logger.info(`Found ${total} total liked songs to process.`);
      }

      const span = page.span ?? page.items.length;
      if (span === 0) {
        this.logger.info("No more liked songs found.");
        break;
      }

      summary.scannedCount += page.items.length;
      const marked = this.findTracksToRemove(page.items);
      summary.markedCount += marked.length;

      let removedFromPage = 0;
      if (marked.length > 0) {
        this.logger.info(`Removing ${marked.length} track(s) from this page.`);
        try {
          await this.library.removeFromLibrary(marked, signal);
          removedFromPage = marked.length;
          this.logger.info("Batch removal successful.");
        } catch (error) {
          if (signal?.aborted) {
            throw error;
          }

          summary.failedBatchCount += 1;
          this.logger.error(`Failed to remove a batch of ${marked.length} track(s): ${describeError(error)}`);
        }
      } else {
        this.logger.info("No tracks matching criteria on this page.");
      }

      summary.removedCount += removedFromPage;
      total -= removedFromPage;
      // Removed tracks shift the rest of the library down, so only the kept ones are stepped over.
      offset += span - removedFromPage;

      if (offset >= total) {
        this.logger.info("All songs have been processed.");
        break;
      }
    }

    this.logger.info(
      `Artist removal complete. scanned=${summary.scannedCount} marked=${summary.markedCount} removed=${summary.removedCount} failedBatches=${summary.failedBatchCount}`
    );

    return summary;
  }

  private findTracksToRemove(tracks: readonly Track[]): string[] {
    const ids: string[] = [];

    for (const track of tracks) {
      const artist = track.artists.find((name) => this.blocklist.has(name));
      if (artist !== undefined) {
        this.logger.info(`  [MARK] '${track.name}' by ${artist}`);
        ids.push(track.id);
      }
    }

    return ids;
  }
}
