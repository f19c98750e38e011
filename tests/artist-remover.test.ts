import { describe, expect, it } from "vitest";
import { ArtistRemover, buildBlocklist } from "../src/artist-remover";
import { InMemorySpotify, recordingLogger, track } from "./fakes/in-memory-spotify";

const USER = { id: "me", displayName: "Test User" };
const ADDED = "2024-02-02T02:02:02Z";

describe("buildBlocklist", () => {
  it("trims names, drops blanks and deduplicates", () => {
    expect([...buildBlocklist([" BadArtist ", "", "BadArtist", "Other"])]).toEqual(["BadArtist", "Other"]);
  });
});

describe("ArtistRemover", () => {
  it("removes tracks credited to a blocked artist and keeps the rest", async () => {
    const spotify = new InMemorySpotify(USER, [
      track("x", ADDED, ["Someone", "BadArtist"]),
      track("y", ADDED, ["GoodArtist"])
    ]);
    const logger = recordingLogger();

    const summary = await new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger }).run();

    expect(spotify.callsOf("removeFromLibrary")).toEqual([{ op: "removeFromLibrary", ids: ["x"] }]);
    expect(spotify.liked.map((t) => t.id)).toEqual(["y"]);
    expect(summary).toEqual({ scannedCount: 2, markedCount: 1, removedCount: 1, failedBatchCount: 0 });
    expect(logger.lines).toContainEqual({ level: "info", message: "  [MARK] 'Track x' by BadArtist" });
  });

  it("matches artist names exactly", async () => {
    const spotify = new InMemorySpotify(USER, [track("x", ADDED, ["badartist"])]);

    const summary = await new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger: recordingLogger() }).run();

    expect(spotify.callsOf("removeFromLibrary")).toEqual([]);
    expect(summary.markedCount).toBe(0);
  });

  it("marks a track once even when several of its artists are blocked", async () => {
    const spotify = new InMemorySpotify(USER, [track("x", ADDED, ["BadArtist", "WorseArtist"])]);

    await new ArtistRemover(spotify, buildBlocklist(["BadArtist", "WorseArtist"]), { logger: recordingLogger() }).run();

    expect(spotify.callsOf("removeFromLibrary")).toEqual([{ op: "removeFromLibrary", ids: ["x"] }]);
  });

  it("issues one removal per page and scans the whole shrinking library", async () => {
    const liked = Array.from({ length: 120 }, (_, i) => track(`t${i}`, ADDED, [i % 2 === 0 ? "BadArtist" : "GoodArtist"]));
    const spotify = new InMemorySpotify(USER, liked);

    const summary = await new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger: recordingLogger() }).run();

    expect(spotify.callsOf("listLikedTracks").map((call) => call.offset)).toEqual([0, 25, 50]);
    expect(spotify.callsOf("removeFromLibrary").map((call) => call.ids.length)).toEqual([25, 25, 10]);
    expect(spotify.liked).toHaveLength(60);
    expect(spotify.liked.every((t) => t.artists[0] === "GoodArtist")).toBe(true);
    expect(summary).toEqual({ scannedCount: 120, markedCount: 60, removedCount: 60, failedBatchCount: 0 });
  });

  it("logs a failed removal and continues with the next page", async () => {
    const spotify = new InMemorySpotify(USER, [
      track("t0", ADDED, ["BadArtist"]),
      track("t1", ADDED, ["GoodArtist"]),
      track("t2", ADDED, ["BadArtist"]),
      track("t3", ADDED, ["GoodArtist"])
    ]);
    spotify.failOn("removeFromLibrary", (call) =>
      call.op === "removeFromLibrary" && call.ids.includes("t0") ? new Error("rate limited") : null
    );
    const logger = recordingLogger();

    const summary = await new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger, pageSize: 2 }).run();

    expect(summary).toEqual({ scannedCount: 4, markedCount: 2, removedCount: 1, failedBatchCount: 1 });
    expect(spotify.liked.map((t) => t.id)).toEqual(["t0", "t1", "t3"]);
    expect(logger.lines).toContainEqual({ level: "error", message: "Failed to remove a batch of 1 track(s): rate limited" });
  });

  it("propagates a failure to read the library", async () => {
    const spotify = new InMemorySpotify(USER, [track("t0", ADDED, ["BadArtist"])]);
    spotify.failOn("listLikedTracks", () => new Error("offline"));

    await expect(
      new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger: recordingLogger() }).run()
    ).rejects.toThrow("offline");
  });

  it("finishes immediately on an empty library", async () => {
    const spotify = new InMemorySpotify(USER, []);

    const summary = await new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), { logger: recordingLogger() }).run();

    expect(summary).toEqual({ scannedCount: 0, markedCount: 0, removedCount: 0, failedBatchCount: 0 });
    expect(spotify.calls).toEqual([{ op: "listLikedTracks", offset: 0, limit: 50 }]);
  });

  it("stops between pages once cancelled", async () => {
    const liked = Array.from({ length: 4 }, (_, i) => track(`t${i}`, ADDED, ["BadArtist"]));
    const spotify = new InMemorySpotify(USER, liked);
    const controller = new AbortController();
    spotify.failOn("removeFromLibrary", () => {
      controller.abort(new Error("cancelled"));
      return null;
    });

    const run = new ArtistRemover(spotify, buildBlocklist(["BadArtist"]), {
      logger: recordingLogger(),
      pageSize: 2
    }).run(controller.signal);

    await expect(run).rejects.toThrow("cancelled");
    expect(spotify.callsOf("removeFromLibrary")).toEqual([{ op: "removeFromLibrary", ids: ["t0", "t1"] }]);
  });
});
