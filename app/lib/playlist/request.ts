import { z } from "zod";

export const MIN_SONG_COUNT = 1;
export const MAX_SONG_COUNT = 100;
export const DEFAULT_SONG_COUNT = 10;
export const DEFAULT_POPULARITY_CEILING = 10_000;
export const DEFAULT_PLAYLIST_NAME = "My Spotify Playlist";

export const generationRequestSchema = z.object({
  sourceText: z.string(),
  // Left unset, publishing falls back to DEFAULT_PLAYLIST_NAME. A blank
  // value is kept so publishing can reject it.
  playlistName: z.string().optional(),
  requestedCount: z
    .number()
    .int()
    .min(MIN_SONG_COUNT)
    .max(MAX_SONG_COUNT)
    .default(DEFAULT_SONG_COUNT),
  popularityCeiling: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_POPULARITY_CEILING),
});

export type GenerationRequestInput = z.input<typeof generationRequestSchema>;
export type GenerationRequest = z.output<typeof generationRequestSchema>;

/**
 * Throws a ZodError describing every invalid field.
 */
export function parseGenerationRequest(
  input: GenerationRequestInput,
): GenerationRequest {
  return generationRequestSchema.parse(input);
}
