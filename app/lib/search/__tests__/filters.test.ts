import { describe, expect, it } from "vitest";
import {
  isAlternateVersion,
  isWithinPopularityCeiling,
  normalizeTitle,
} from "../filters";
import { normalizeTrack } from "../normalize";

describe("isAlternateVersion", () => {
  it("matches excluded keywords case-insensitively", () => {
    expect(isAlternateVersion("Midnight City (Eric Prydz REMIX)")).toBe(true);
    expect(isAlternateVersion("Holocene - Live at the Forum")).toBe(true);
    expect(isAlternateVersion("Radio Edit")).toBe(true);
  });

  it("matches substrings inside words", () => {
    expect(isAlternateVersion("Deliverance")).toBe(true);
    expect(isAlternateVersion("Discovery")).toBe(true);
  });

  it("accepts ordinary titles", () => {
    expect(isAlternateVersion("Night Drive")).toBe(false);
  });

  it("takes a custom keyword list", () => {
    expect(isAlternateVersion("Night Drive", ["DRIVE"])).toBe(true);
    expect(isAlternateVersion("Remix", [])).toBe(false);
  });
});

describe("normalizeTitle", () => {
  it("only lowercases", () => {
    expect(normalizeTitle("  Hello, World ")).toBe("  hello, world ");
  });
});

describe("isWithinPopularityCeiling", () => {
  it("includes the ceiling itself", () => {
    expect(isWithinPopularityCeiling(10000, 10000)).toBe(true);
    expect(isWithinPopularityCeiling(10001, 10000)).toBe(false);
    expect(isWithinPopularityCeiling(0, 0)).toBe(true);
  });
});

describe("normalizeTrack", () => {
  it("keeps the first artist and the track url", () => {
    expect(
      normalizeTrack({
        id: "t1",
        name: "Song",
        artists: [
          { id: "a1", name: "First" },
          { id: "a2", name: "Second" },
        ],
        external_urls: { spotify: "https://open.spotify.com/track/t1?si=x" },
      }),
    ).toEqual({
      catalogId: "t1",
      title: "Song",
      primaryArtistId: "a1",
      primaryArtistName: "First",
      externalUrl: "https://open.spotify.com/track/t1?si=x",
    });
  });

  it("builds a url when the record has none", () => {
    const candidate = normalizeTrack({
      id: "t2",
      name: "Song",
      artists: [{ id: "a1" }],
    });
    expect(candidate?.externalUrl).toBe("https://open.spotify.com/track/t2");
    expect(candidate?.primaryArtistName).toBe("");
  });

  it("rejects records without id, title or artist id", () => {
    expect(normalizeTrack(null)).toBeNull();
    expect(normalizeTrack({ name: "Song", artists: [{ id: "a1" }] })).toBeNull();
    expect(normalizeTrack({ id: "t1", name: "", artists: [{ id: "a1" }] })).toBeNull();
    expect(normalizeTrack({ id: "t1", name: "Song", artists: [{ name: "X" }] })).toBeNull();
    expect(normalizeTrack({ id: "t1", name: "Song", artists: null })).toBeNull();
  });
});
