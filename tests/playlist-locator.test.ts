import { describe, expect, it } from "vitest";
import { findOwnedPlaylist, PLAYLIST_PAGE_SIZE, yearPlaylistName } from "../src/playlist-locator";
import { InMemorySpotify, recordingLogger } from "./fakes/in-memory-spotify";

const USER = { id: "me", displayName: "Test User" };

function fillerPlaylists(spotify: InMemorySpotify, count: number): void {
  for (let i = 0; i < count; i += 1) {
    spotify.addPlaylist({ id: `filler-${i}`, name: `Mix ${i}`, ownerId: USER.id, trackIds: [] });
  }
}

describe("yearPlaylistName", () => {
  it("formats the yearly playlist name", () => {
    expect(yearPlaylistName(2023)).toBe("Liked Songs (2023)");
  });
});

describe("findOwnedPlaylist", () => {
  it("returns null after exhausting every page without a match", async () => {
    const spotify = new InMemorySpotify(USER);
    fillerPlaylists(spotify, PLAYLIST_PAGE_SIZE + 3);

    const found = await findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() });

    expect(found).toBeNull();
    expect(spotify.callsOf("listUserPlaylists").map((call) => call.offset)).toEqual([0, 50, 53]);
  });

  it("finds a match on a later page and stops reading", async () => {
    const spotify = new InMemorySpotify(USER);
    fillerPlaylists(spotify, PLAYLIST_PAGE_SIZE + 1);
    spotify.addPlaylist({ id: "target", name: "Liked Songs (2023)", ownerId: USER.id, trackIds: [] });
    fillerPlaylists(spotify, PLAYLIST_PAGE_SIZE);

    const found = await findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() });

    expect(found).toEqual({ id: "target", name: "Liked Songs (2023)", ownerId: USER.id });
    expect(spotify.callsOf("listUserPlaylists")).toHaveLength(2);
  });

  it("requires the owner to match as well as the name", async () => {
    const spotify = new InMemorySpotify(USER);
    spotify.addPlaylist({ id: "theirs", name: "Liked Songs (2023)", ownerId: "someone-else", trackIds: [] });
    spotify.addPlaylist({ id: "mine", name: "Liked Songs (2023)", ownerId: USER.id, trackIds: [] });

    const found = await findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() });

    expect(found?.id).toBe("mine");
  });

  it("returns the first match in page order", async () => {
    const spotify = new InMemorySpotify(USER);
    spotify.addPlaylist({ id: "first", name: "Liked Songs (2023)", ownerId: USER.id, trackIds: [] });
    spotify.addPlaylist({ id: "second", name: "Liked Songs (2023)", ownerId: USER.id, trackIds: [] });

    const found = await findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() });

    expect(found?.id).toBe("first");
  });

  it("compares names exactly", async () => {
    const spotify = new InMemorySpotify(USER);
    spotify.addPlaylist({ id: "lower", name: "liked songs (2023)", ownerId: USER.id, trackIds: [] });
    spotify.addPlaylist({ id: "spaced", name: "Liked Songs (2023) ", ownerId: USER.id, trackIds: [] });

    const found = await findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() });

    expect(found).toBeNull();
  });

  it("propagates listing errors", async () => {
    const spotify = new InMemorySpotify(USER);
    spotify.failOn("listUserPlaylists", () => new Error("listing failed"));

    await expect(
      findOwnedPlaylist(spotify, USER.id, "Liked Songs (2023)", { logger: recordingLogger() })
    ).rejects.toThrow("listing failed");
  });
});
