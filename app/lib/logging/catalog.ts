import { join } from "path";
import { appendJsonlCapped } from "./jsonl";

export const CATALOG_LOG_FILE = "catalog.jsonl";

/**
 * Keeps the last few raw search responses for debugging relevance issues.
 */
export async function logCatalogSearch(params: {
  dir: string;
  query: string;
  offset: number;
  rawResponse: unknown;
}): Promise<void> {
  const { dir, query, offset, rawResponse } = params;
  try {
    await appendJsonlCapped(
      join(dir, CATALOG_LOG_FILE),
      {
        timestamp: new Date().toISOString(),
        endpoint: "search",
        query,
        offset,
        rawResponse,
      },
      3,
    );
  } catch (error) {
    console.error("Failed to log catalog response:", error);
  }
}
