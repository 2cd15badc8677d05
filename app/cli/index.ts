#!/usr/bin/env node
/**
 * index.ts
 *
 * Command-line entry point: `generate`, `auth-url` and `auth-exchange`.
 */

import "dotenv/config";
import { stdin as input, stdout as output } from "process";
import { createInterface } from "readline/promises";
import { loadConfig, requireOpenAIKey, type AppConfig } from "../lib/config";
import { ConfigurationError, describeError } from "../lib/errors";
import { createOpenAICompletionClient } from "../lib/openai";
import { PlaylistSession } from "../lib/playlist/session";
import { createSpotifyClient } from "../lib/spotify";
import { createTokenProvider } from "../lib/spotifyAuth";
import { runAuthExchange, runAuthUrl } from "./auth";
import {
  getFlagNumber,
  getFlagString,
  hasFlag,
  parseArgs,
  type ParsedArgs,
} from "./flags";
import {
  DEFAULT_LOOKUP_CONCURRENCY,
  readGenerateFlags,
  runGenerate,
  type CliIO,
} from "./generate";
import { USAGE } from "./render";

async function generateCommand(
  config: AppConfig,
  parsed: ParsedArgs,
  io: CliIO,
): Promise<number> {
  const flags = readGenerateFlags(parsed);
  if (!flags.text.trim()) {
    io.print("Missing --text");
    io.print(USAGE);
    return 1;
  }

  const concurrency = getFlagNumber(
    parsed,
    DEFAULT_LOOKUP_CONCURRENCY,
    "concurrency",
  );
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    io.print("--concurrency must be a positive integer");
    return 1;
  }

  const llm = createOpenAICompletionClient({
    apiKey: requireOpenAIKey(config),
    model: config.openai.model,
  });
  const catalog = createSpotifyClient({
    tokens: createTokenProvider(config.spotify),
    responseLogDir: config.logging.runLog ? config.logging.dir : null,
  });
  const session = new PlaylistSession({
    llm,
    catalog,
    resolve: {
      market: config.spotify.market,
      concurrency,
      onLookupFailure: hasFlag(parsed, "skip-failed-lookups")
        ? "skip"
        : "abort",
    },
    logDir: config.logging.runLog ? config.logging.dir : null,
  });

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const rl =
    input.isTTY && !flags.yes ? createInterface({ input, output }) : null;
  // readline takes Ctrl-C at a prompt and emits its own SIGINT.
  rl?.on("SIGINT", onInterrupt);
  try {
    return await runGenerate(flags, {
      session,
      llm,
      explainConcurrency: concurrency,
      io: {
        print: io.print,
        ask: rl
          ? (question) =>
              rl.question(question, { signal: controller.signal })
          : undefined,
      },
      signal: controller.signal,
    });
  } finally {
    rl?.close();
    process.removeListener("SIGINT", onInterrupt);
  }
}

export async function main(argv: string[]): Promise<number> {
  const parsed = parseArgs(argv);
  const [command, ...rest] = parsed.positionals;
  const commandArgs: ParsedArgs = { ...parsed, positionals: rest };
  const io: CliIO = { print: (line) => console.log(line) };

  if (!command || command === "help" || hasFlag(parsed, "help")) {
    io.print(USAGE);
    return command || hasFlag(parsed, "help") ? 0 : 1;
  }

  try {
    const config = loadConfig();
    switch (command) {
      case "generate":
        return await generateCommand(config, commandArgs, io);
      case "auth-url":
        return runAuthUrl(config, io);
      case "auth-exchange":
        return await runAuthExchange(
          config,
          getFlagString(commandArgs, "code"),
          io,
        );
      default:
        io.print(`Unknown command: ${command}`);
        io.print(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.print("Configuration error:");
      for (const issue of error.issues) io.print(`  - ${issue}`);
      return 1;
    }
    console.error("[CLI] Command failed", error);
    io.print(`Error: ${describeError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("[CLI] Unexpected failure", error);
      process.exitCode = 1;
    },
  );
}
