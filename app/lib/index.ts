export * from "./search";
export { PlaylistSession, type PlaylistSessionDeps } from "./playlist/session";
export {
  publishPlaylist,
  validatePlaylistContent,
  validatePublishRequest,
} from "./playlist/publish";
export * from "./playlist/request";
export type {
  GenerationResult,
  PlaylistDraft,
  PublishedPlaylist,
} from "./playlist/types";
export { createSpotifyClient, type CatalogClient } from "./spotify";
export * from "./spotifyAuth";
export {
  createOpenAICompletionClient,
  type CompletionClient,
} from "./openai";
export { loadConfig, type AppConfig } from "./config";
export * from "./errors";
