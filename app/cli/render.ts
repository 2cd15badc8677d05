import type { ZodError } from "zod";
import type { PlaylistDraft } from "../lib/playlist/types";
import type { Explanation } from "../lib/search/explain";
import type { AcceptedSong } from "../lib/search/types";

export const USAGE = `
moodcrate turns a description of a mood or style into a Spotify playlist.

Usage:
  moodcrate generate --text <description> [options]
  moodcrate auth-url
  moodcrate auth-exchange --code <authorization code>

Generate options:
  --text <text>            What the playlist should sound like (required)
  --name <name>            Playlist name used when publishing
  --count <1-100>          Number of songs (default 10)
  --max-followers <n>      Skip artists with more followers than this (default 10000)
  --concurrency <n>        Parallel artist lookups and explanations (default 4)
  --skip-failed-lookups    Skip a song whose artist lookup fails instead of aborting
  --no-explain             Do not ask the language model why each song fits
  --yes                    Publish right away without prompting

Environment:
  OPENAI_API_KEY, OPENAI_MODEL, SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET,
  SPOTIFY_REDIRECT_URI, SPOTIFY_REFRESH_TOKEN or SPOTIFY_ACCESS_TOKEN,
  CATALOG_MARKET, MOODCRATE_LOG_DIR, MOODCRATE_RUN_LOG
`.trim();

export function formatSongLine(position: number, song: AcceptedSong): string {
  const artist = song.primaryArtistName || "Unknown artist";
  return `${position}. ${song.title} by ${artist} - ${song.externalUrl}`;
}

export function formatExplanationLine(explanation: Explanation): string {
  return `   This song fits your input because: ${explanation.text}`;
}

export function renderDraft(
  draft: PlaylistDraft,
  explanations: readonly Explanation[] | null,
): string[] {
  const lines = ["Suggested Songs:"];
  draft.acceptedSongs.forEach((song, i) => {
    lines.push(formatSongLine(i + 1, song));
    const explanation = explanations?.[i];
    if (explanation) lines.push(formatExplanationLine(explanation));
  });
  if (draft.acceptedSongs.length < draft.requestedCount) {
    lines.push(
      `Found ${draft.acceptedSongs.length} of ${draft.requestedCount} requested songs.`,
    );
  }
  return lines;
}

export function formatValidationIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".") || "input";
    return `  - ${field}: ${issue.message}`;
  });
}
