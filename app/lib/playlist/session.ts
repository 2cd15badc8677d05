/**
 * session.ts
 *
 * Owns the playlist draft for one user session and runs the three actions on
 * it: generate, regenerate and publish.
 *
 * Actions are serialized, so a publish never observes a draft that a
 * regeneration is halfway through replacing, and publish works from a copy
 * of the track ids taken when it starts.
 */

import { PlaylistValidationError } from "../errors";
import { logResolutionRun } from "../logging/resolution";
import type { CompletionClient } from "../openai";
import type { CatalogClient } from "../spotify";
import { createPopularityOracle } from "../search/artistPopularity";
import { extractSearchPhrase, isUsablePhrase } from "../search/keywords";
import { resolveSongs } from "../search/pipeline";
import type { ResolveOptions } from "../search/types";
import {
  publishPlaylist,
  validatePlaylistContent,
  type PublishOptions,
} from "./publish";
import {
  DEFAULT_PLAYLIST_NAME,
  parseGenerationRequest,
  type GenerationRequest,
  type GenerationRequestInput,
} from "./request";
import type {
  GenerationResult,
  PlaylistDraft,
  PublishedPlaylist,
} from "./types";

export interface PlaylistSessionDeps {
  llm: CompletionClient;
  catalog: CatalogClient;
  resolve?: Omit<ResolveOptions, "signal">;
  /** Per-run artist popularity cache. Defaults to true. */
  cachePopularity?: boolean;
  /** Directory for resolution.jsonl; null or undefined disables it. */
  logDir?: string | null;
  publish?: PublishOptions;
  now?: () => Date;
}

export class PlaylistSession {
  private draft: PlaylistDraft | null = null;
  private lastRequest: GenerationRequest | null = null;
  private draftVersion = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: PlaylistSessionDeps) {}

  get currentDraft(): PlaylistDraft | null {
    return this.draft;
  }

  /**
   * Starts a new generation cycle. The previous draft is dropped before the
   * search begins, whatever the outcome.
   */
  async generate(
    input: GenerationRequestInput,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    const request = parseGenerationRequest(input);
    return this.serialize(async () => {
      this.draft = null;
      this.lastRequest = request;
      return this.run(request, signal);
    });
  }

  /**
   * Re-runs the last request with the same text and parameters. A
   * successful run replaces the draft; an empty one leaves it as it was.
   */
  async regenerate(signal?: AbortSignal): Promise<GenerationResult> {
    return this.serialize(async () => {
      const request = this.lastRequest;
      if (!request) {
        throw new Error("Nothing to regenerate: generate a playlist first");
      }
      return this.run(request, signal);
    });
  }

  /**
   * Publishes the current draft under `name`, falling back to the name given
   * at generation time and then to DEFAULT_PLAYLIST_NAME. Only an absent name
   * falls back; a blank one fails validation.
   */
  async publish(name?: string): Promise<PublishedPlaylist> {
    return this.serialize(async () => {
      const draft = this.draft;
      if (!draft) {
        throw new PlaylistValidationError([
          "no draft to publish; generate a playlist first",
        ]);
      }

      const trackIds = draft.acceptedSongs.map((song) => song.catalogId);
      const playlistName = name ?? draft.playlistName ?? DEFAULT_PLAYLIST_NAME;
      const issues = validatePlaylistContent(playlistName, trackIds);
      if (issues.length > 0) {
        throw new PlaylistValidationError(issues);
      }

      const user = await this.deps.catalog.currentUser();
      return publishPlaylist(
        this.deps.catalog,
        user.id,
        playlistName,
        trackIds,
        this.deps.publish,
      );
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async run(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    const { llm, catalog } = this.deps;

    const phrase = await extractSearchPhrase(request.sourceText, llm);
    const popularity = createPopularityOracle(catalog, {
      cache: this.deps.cachePopularity ?? true,
    });

    const { songs, debugInfo } = await resolveSongs(
      phrase,
      request.requestedCount,
      request.popularityCeiling,
      { catalog, popularity },
      { ...this.deps.resolve, signal, debug: true },
    );

    if (this.deps.logDir) {
      await logResolutionRun({
        dir: this.deps.logDir,
        sourceText: request.sourceText,
        requestedCount: request.requestedCount,
        popularityCeiling: request.popularityCeiling,
        songs,
        debugInfo,
      });
    }

    if (songs.length === 0) {
      return {
        status: "empty",
        searchPhrase: isUsablePhrase(phrase) ? phrase : null,
        debugInfo,
      };
    }

    this.draftVersion += 1;
    const draft: PlaylistDraft = {
      sourceText: request.sourceText,
      searchPhrase: isUsablePhrase(phrase) ? phrase : "",
      requestedCount: request.requestedCount,
      popularityCeiling: request.popularityCeiling,
      playlistName: request.playlistName,
      acceptedSongs: songs,
      version: this.draftVersion,
      createdAt: (this.deps.now?.() ?? new Date()).toISOString(),
    };
    this.draft = draft;

    return { status: "ok", draft, debugInfo };
  }
}
