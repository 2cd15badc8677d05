import { ZodError } from "zod";
import { describeError, PlaylistValidationError } from "../lib/errors";
import type { CompletionClient } from "../lib/openai";
import type { PlaylistSession } from "../lib/playlist/session";
import type { GenerationResult } from "../lib/playlist/types";
import {
  DEFAULT_POPULARITY_CEILING,
  DEFAULT_SONG_COUNT,
} from "../lib/playlist/request";
import { explainSongs } from "../lib/search/explain";
import { getFlagNumber, getFlagString, hasFlag, type ParsedArgs } from "./flags";
import { formatValidationIssues, renderDraft } from "./render";

export const DEFAULT_LOOKUP_CONCURRENCY = 4;
// 128 + SIGINT, as shells report an interrupted command.
export const EXIT_CANCELLED = 130;

export interface CliIO {
  print(line: string): void;
  /** Absent when there is no terminal to ask. */
  ask?(question: string): Promise<string>;
}

export interface GenerateFlags {
  text: string;
  /** Undefined when --name was not given. */
  name: string | undefined;
  count: number;
  maxFollowers: number;
  explain: boolean;
  yes: boolean;
}

export interface GenerateCommandDeps {
  session: PlaylistSession;
  llm: CompletionClient;
  io: CliIO;
  explainConcurrency?: number;
  signal?: AbortSignal;
}

export function readGenerateFlags(parsed: ParsedArgs): GenerateFlags {
  const rawName = parsed.flags.get("name");
  return {
    text: getFlagString(parsed, "text") ?? parsed.positionals.join(" "),
    // A bare --name is an empty name, which publishing rejects.
    name: typeof rawName === "string" ? rawName : rawName ? "" : undefined,
    count: getFlagNumber(parsed, DEFAULT_SONG_COUNT, "count"),
    maxFollowers: getFlagNumber(
      parsed,
      DEFAULT_POPULARITY_CEILING,
      "max-followers",
    ),
    explain: !hasFlag(parsed, "no-explain"),
    yes: hasFlag(parsed, "yes"),
  };
}

async function showResult(
  result: GenerationResult,
  flags: GenerateFlags,
  deps: GenerateCommandDeps,
): Promise<boolean> {
  const { io } = deps;

  if (result.status === "empty") {
    if (result.debugInfo.outcome === "cancelled") {
      io.print("Cancelled.");
    } else if (result.searchPhrase === null) {
      io.print(
        "Could not turn your description into a search. No suitable songs found.",
      );
    } else {
      io.print("No suitable songs found.");
    }
    return false;
  }

  const { draft } = result;
  const explanations = flags.explain
    ? await explainSongs(draft.searchPhrase, draft.acceptedSongs, deps.llm, {
        concurrency: deps.explainConcurrency,
      })
    : null;

  for (const line of renderDraft(draft, explanations)) io.print(line);
  return true;
}

type PublishOutcome = "published" | "invalid" | "failed";

async function publishDraft(
  deps: GenerateCommandDeps,
  name: string | undefined,
): Promise<PublishOutcome> {
  try {
    const playlist = await deps.session.publish(name);
    deps.io.print(`Playlist created: ${playlist.url}`);
    return "published";
  } catch (error) {
    if (error instanceof PlaylistValidationError) {
      deps.io.print(`Cannot publish: ${error.issues.join("; ")}`);
      return "invalid";
    }
    console.error("[PUBLISH] Publishing failed", error);
    deps.io.print(`Error creating playlist: ${describeError(error)}`);
    return "failed";
  }
}

function isCancelled(result: GenerationResult): boolean {
  return result.status === "empty" && result.debugInfo.outcome === "cancelled";
}

/**
 * Runs one generate cycle, then offers publish / regenerate until the user
 * quits. Returns the process exit code.
 */
export async function runGenerate(
  flags: GenerateFlags,
  deps: GenerateCommandDeps,
): Promise<number> {
  const { session, io } = deps;

  let result: GenerationResult;
  try {
    io.print("Let's find some songs that match your vibe.");
    result = await session.generate(
      {
        sourceText: flags.text,
        playlistName: flags.name,
        requestedCount: flags.count,
        popularityCeiling: flags.maxFollowers,
      },
      deps.signal,
    );
  } catch (error) {
    if (error instanceof ZodError) {
      io.print("Invalid options:");
      for (const line of formatValidationIssues(error)) io.print(line);
      return 1;
    }
    throw error;
  }

  if (!(await showResult(result, flags, deps))) {
    return isCancelled(result) ? EXIT_CANCELLED : 0;
  }

  if (flags.yes) {
    return (await publishDraft(deps, flags.name)) === "published" ? 0 : 1;
  }
  const { ask } = io;
  if (!ask) return 0;

  // Resolves to null once the run is interrupted at a prompt.
  const prompt = async (question: string): Promise<string | null> => {
    try {
      return await ask(question);
    } catch (error) {
      if (deps.signal?.aborted) return null;
      throw error;
    }
  };

  for (;;) {
    const reply = await prompt("[p]ublish to Spotify, [r]egenerate or [q]uit? ");
    if (reply === null) {
      io.print("Cancelled.");
      return EXIT_CANCELLED;
    }
    const answer = reply.trim().toLowerCase();

    if (answer === "p" || answer === "publish") {
      const name = flags.name ?? (await prompt("Playlist name: "));
      if (name === null) {
        io.print("Cancelled.");
        return EXIT_CANCELLED;
      }
      const outcome = await publishDraft(deps, name);
      // A rejected name goes back to the prompt.
      if (outcome === "invalid" && flags.name === undefined) continue;
      return outcome === "published" ? 0 : 1;
    }

    if (answer === "r" || answer === "regenerate") {
      io.print("Let's find some different songs that match your vibe.");
      const next = await session.regenerate(deps.signal);
      if (isCancelled(next)) {
        io.print("Cancelled.");
        return EXIT_CANCELLED;
      }
      if (!(await showResult(next, flags, deps))) {
        io.print("Keeping the previous suggestions.");
      }
      continue;
    }

    return 0;
  }
}
