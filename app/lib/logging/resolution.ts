import { join } from "path";
import type { AcceptedSong, DebugInfo } from "../search/types";
import { appendJsonlCapped } from "./jsonl";

export const RESOLUTION_LOG_FILE = "resolution.jsonl";

function summarizeSongs(songs: readonly AcceptedSong[], maxSamples = 5) {
  return {
    count: songs.length,
    samples: songs.slice(0, maxSamples).map((song) => ({
      id: song.catalogId,
      title: song.title,
      artist: song.primaryArtistName,
    })),
  };
}

export async function logResolutionRun(params: {
  dir: string;
  sourceText: string;
  requestedCount: number;
  popularityCeiling: number;
  songs: readonly AcceptedSong[];
  debugInfo: DebugInfo;
}): Promise<void> {
  const { dir, sourceText, requestedCount, popularityCeiling, songs, debugInfo } =
    params;
  try {
    const entry = {
      timestamp: new Date().toISOString(),
      sourceText: sourceText.slice(0, 500),
      phrase: debugInfo.phrase,
      requestedCount,
      popularityCeiling,
      outcome: debugInfo.outcome,
      pagesFetched: debugInfo.pagesFetched,
      popularityLookups: debugInfo.popularityLookups,
      rejected: debugInfo.rejected,
      error: debugInfo.error,
      songs: summarizeSongs(songs),
    };

    await appendJsonlCapped(join(dir, RESOLUTION_LOG_FILE), entry, 10);
  } catch (error) {
    console.error("Failed to log resolution run:", error);
  }
}
