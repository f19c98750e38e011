import { Command } from "commander";
import { ArtistRemover, buildBlocklist } from "./artist-remover";
import { ConfigError, loadBlockedArtists, loadConfig, readArtistFile, type AppConfig } from "./config";
import { WaveCoverGenerator } from "./cover-image";
import { createLogger, describeError } from "./logger";
import { PlaylistSorter } from "./playlist-sorter";
import { SpotifyClient } from "./spotify-client";
import type { RemovalSummary, SortSummary } from "./types";

const logger = createLogger();

function createClient(config: AppConfig): SpotifyClient {
  return new SpotifyClient(config.spotifyClientId, config.spotifyClientSecret, config.spotifyRefreshToken, {
    logger: createLogger("spotify")
  });
}

function runSignal(timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn("Interrupted. Stopping after the current request.");
    controller.abort(new Error("Run interrupted"));
  };
  const timeoutId = setTimeout(() => controller.abort(new Error(`Run exceeded ${timeoutMs}ms`)), timeoutMs);

  process.once("SIGINT", onInterrupt);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      process.removeListener("SIGINT", onInterrupt);
    }
  };
}

function logSortSummary(summary: SortSummary): void {
  for (const result of summary.years) {
    logger.info(
      [
        `Year ${result.year}:`,
        `playlistId=${result.playlistId}`,
        `createdPlaylist=${result.createdPlaylist}`,
        `removedCount=${result.removedCount}`,
        `addedCount=${result.addedCount}`,
        `imageApplied=${result.imageApplied}`
      ].join(" ")
    );
  }

  logger.info(
    `Sort complete. likedCount=${summary.likedCount} skippedCount=${summary.skippedCount} years=${summary.years.length}`
  );
}

function logRemovalSummary(summary: RemovalSummary): void {
  logger.info(
    [
      "Removal complete.",
      `scannedCount=${summary.scannedCount}`,
      `markedCount=${summary.markedCount}`,
      `removedCount=${summary.removedCount}`,
      `failedBatchCount=${summary.failedBatchCount}`
    ].join(" ")
  );
}

async function runSort(options: { images: boolean }): Promise<void> {
  const config = loadConfig();
  const client = createClient(config);
  const sorter = new PlaylistSorter(client, {
    logger: createLogger("sorter"),
    imageGenerator: options.images ? new WaveCoverGenerator() : null
  });

  const { signal, dispose } = runSignal(config.runTimeoutMs);
  try {
    logSortSummary(await sorter.run(signal));
  } finally {
    dispose();
  }
}

async function runRemoveArtists(artists: string[], options: { file?: string }): Promise<void> {
  const config = loadConfig();
  const fromFile = options.file ? readArtistFile(options.file) : [];
  const blocklist = buildBlocklist([...artists, ...fromFile, ...loadBlockedArtists(config)]);

  if (blocklist.size === 0) {
    throw new ConfigError("No artists to remove. Pass names or --file, or set BLOCKED_ARTISTS or BLOCKED_ARTISTS_FILE.");
  }

  const remover = new ArtistRemover(createClient(config), blocklist, { logger: createLogger("artist-remover") });

  const { signal, dispose } = runSignal(config.runTimeoutMs);
  try {
    logRemovalSummary(await remover.run(signal));
  } finally {
    dispose();
  }
}

const program = new Command()
  .name("liked-songs-sorter")
  .description("Organise Spotify liked songs into yearly playlists and prune them by artist.");

program
  .command("sort", { isDefault: true })
  .description('Create or refresh one "Liked Songs (<year>)" playlist per year songs were saved in.')
  .option("--no-images", "skip generating cover images")
  .action((options: { images: boolean }) => runSort(options));

program
  .command("remove-artists")
  .description("Remove liked songs by any of the given artists.")
  .argument("[artists...]", "artist names, matched exactly")
  .option("-f, --file <path>", "file with one artist name per line")
  .action((artists: string[], options: { file?: string }) => runRemoveArtists(artists, options));

program.parseAsync(process.argv).catch((error) => {
  logger.error(`Run failed: ${describeError(error)}`);
  process.exitCode = 1;
});
