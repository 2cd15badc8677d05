import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PlaylistValidationError } from "../../errors";
import type { CatalogClient } from "../../spotify";
import { publishPlaylist, validatePublishRequest } from "../publish";

function fakeCatalog() {
  return {
    createPlaylist: vi.fn<CatalogClient["createPlaylist"]>(async () => ({
      id: "pl1",
      external_urls: { spotify: "https://open.spotify.com/playlist/pl1" },
    })),
    addPlaylistItems: vi.fn<CatalogClient["addPlaylistItems"]>(
      async () => "snapshot-1",
    ),
  };
}

describe("validatePublishRequest", () => {
  it("accepts a complete request", () => {
    expect(validatePublishRequest("user-1", "Mix", ["t1"])).toEqual([]);
  });

  it("reports every problem at once", () => {
    expect(validatePublishRequest(" ", "  ", [])).toEqual([
      "user id is required",
      "playlist name is required",
      "no tracks to add",
    ]);
  });

  it("limits name length and track count", () => {
    const ids = Array.from({ length: 101 }, (_, i) => `t${i}`);
    expect(validatePublishRequest("u", "x".repeat(101), ids)).toEqual([
      "playlist name must be at most 100 characters",
      "at most 100 tracks can be published",
    ]);
    expect(validatePublishRequest("u", "x".repeat(100), ids.slice(1))).toEqual(
      [],
    );
  });

  it("rejects blank track ids", () => {
    expect(validatePublishRequest("u", "Mix", ["t1", ""])).toEqual([
      "track ids must not be empty",
    ]);
  });
});

describe("publishPlaylist", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates the playlist and adds tracks in order", async () => {
    const catalog = fakeCatalog();

    const published = await publishPlaylist(catalog, "user-1", "  Late Night  ", [
      "t3",
      "t1",
      "t2",
    ]);

    expect(published).toEqual({
      id: "pl1",
      url: "https://open.spotify.com/playlist/pl1",
    });
    expect(catalog.createPlaylist).toHaveBeenCalledWith("user-1", {
      name: "Late Night",
      public: true,
      description: undefined,
    });
    expect(catalog.addPlaylistItems).toHaveBeenCalledWith("pl1", [
      "t3",
      "t1",
      "t2",
    ]);
  });

  it("passes visibility and description through", async () => {
    const catalog = fakeCatalog();
    await publishPlaylist(catalog, "user-1", "Mix", ["t1"], {
      public: false,
      description: "rainy day",
    });
    expect(catalog.createPlaylist).toHaveBeenCalledWith("user-1", {
      name: "Mix",
      public: false,
      description: "rainy day",
    });
  });

  it("makes no call for an invalid request", async () => {
    const catalog = fakeCatalog();
    await expect(
      publishPlaylist(catalog, "user-1", "Mix", []),
    ).rejects.toBeInstanceOf(PlaylistValidationError);
    expect(catalog.createPlaylist).not.toHaveBeenCalled();
  });

  it("propagates a failed append after creating the playlist", async () => {
    const catalog = fakeCatalog();
    catalog.addPlaylistItems.mockRejectedValueOnce(new Error("502"));

    await expect(
      publishPlaylist(catalog, "user-1", "Mix", ["t1"]),
    ).rejects.toThrow("502");
    expect(catalog.createPlaylist).toHaveBeenCalledTimes(1);
  });
});
