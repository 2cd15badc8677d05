/**
 * jsonl.ts
 *
 * Line-capped JSONL files. One entry per line, so the cap is a line count
 * and the oldest lines go first.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";

export async function readJsonlLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw error;
  }
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function appendJsonlCapped(
  filePath: string,
  entry: unknown,
  maxEntries: number,
): Promise<void> {
  if (!Number.isInteger(maxEntries) || maxEntries < 1) {
    throw new RangeError(
      `maxEntries must be a positive integer, got ${maxEntries}`,
    );
  }

  await mkdir(dirname(filePath), { recursive: true });

  const previous = await readJsonlLines(filePath);
  const kept = maxEntries === 1 ? [] : previous.slice(-(maxEntries - 1));
  kept.push(JSON.stringify(entry));
  await writeFile(filePath, `${kept.join("\n")}\n`);
}
