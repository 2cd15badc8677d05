/**
 * keywords.ts
 *
 * Turns a free-text playlist description into a catalog search phrase with a
 * single completion call.
 */

import type { CompletionClient } from "../openai";
import { SEARCH_PHRASE_TEMPLATE } from "../prompts";
import type { SearchPhrase } from "./types";

/**
 * Returned instead of a phrase when the language model call fails.
 */
export const EXTRACTION_FAILED: unique symbol = Symbol("extraction-failed");
export type ExtractionFailure = typeof EXTRACTION_FAILED;

export async function extractSearchPhrase(
  freeText: string,
  llm: CompletionClient,
): Promise<SearchPhrase | ExtractionFailure> {
  try {
    const content = await llm.complete(SEARCH_PHRASE_TEMPLATE(freeText));
    return content.trim().toLowerCase();
  } catch (err) {
    console.error("[KEYWORDS] Search phrase extraction failed", err);
    return EXTRACTION_FAILED;
  }
}

/**
 * True when there is something worth searching for.
 */
export function isUsablePhrase(
  phrase: SearchPhrase | ExtractionFailure | null | undefined,
): phrase is SearchPhrase {
  return typeof phrase === "string" && phrase.trim().length > 0;
}
