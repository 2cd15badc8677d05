/**
 * explain.ts
 *
 * One-sentence "why this song" blurbs. Display-only: a failure here never
 * affects which songs are in the draft.
 */

import pLimit from "p-limit";
import type { CompletionClient } from "../openai";
import { EXPLAIN_SONG_TEMPLATE } from "../prompts";
import type { AcceptedSong, SearchPhrase } from "./types";

// Response metadata that some completion wrappers leak into the text.
export const DEFAULT_EXPLANATION_MARKER = "additional_kwargs";
export const EXPLANATION_PLACEHOLDER = "(explanation unavailable)";

export type Explanation =
  | { ok: true; text: string }
  | { ok: false; text: string; error: unknown };

export interface ExplainOptions {
  /** Everything from the first occurrence of this marker on is dropped. */
  marker?: string;
  placeholder?: string;
}

export function stripAfterMarker(text: string, marker: string): string {
  if (!marker) return text.trim();
  const idx = text.indexOf(marker);
  return (idx === -1 ? text : text.slice(0, idx)).trim();
}

export async function explainSong(
  phrase: SearchPhrase,
  title: string,
  artistName: string,
  llm: CompletionClient,
  options: ExplainOptions = {},
): Promise<Explanation> {
  const marker = options.marker ?? DEFAULT_EXPLANATION_MARKER;
  const placeholder = options.placeholder ?? EXPLANATION_PLACEHOLDER;

  try {
    const content = await llm.complete(
      EXPLAIN_SONG_TEMPLATE({ phrase, title, artist: artistName }),
    );
    const text = stripAfterMarker(content, marker);
    return { ok: true, text: text || placeholder };
  } catch (error) {
    console.error("[EXPLAIN] Explanation failed", { title, artistName, error });
    return { ok: false, text: placeholder, error };
  }
}

/**
 * Explains every song, `concurrency` calls at a time. Output order matches
 * input order.
 */
export async function explainSongs(
  phrase: SearchPhrase,
  songs: readonly AcceptedSong[],
  llm: CompletionClient,
  options: ExplainOptions & { concurrency?: number } = {},
): Promise<Explanation[]> {
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? 1)));
  return Promise.all(
    songs.map((song) =>
      limit(() =>
        explainSong(phrase, song.title, song.primaryArtistName, llm, options),
      ),
    ),
  );
}
