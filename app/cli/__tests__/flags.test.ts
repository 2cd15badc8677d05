import { describe, expect, it } from "vitest";
import { getFlagNumber, getFlagString, hasFlag, parseArgs } from "../flags";

describe("parseArgs", () => {
  it("splits positionals and flags", () => {
    const parsed = parseArgs([
      "generate",
      "--text",
      "rainy jazz",
      "--count=5",
      "--yes",
      "extra",
    ]);

    expect(parsed.positionals).toEqual(["generate", "extra"]);
    expect(Object.fromEntries(parsed.flags)).toEqual({
      text: "rainy jazz",
      count: "5",
      yes: true,
    });
  });

  it("treats a flag followed by another flag as boolean", () => {
    const parsed = parseArgs(["--no-explain", "--name", "Mix"]);
    expect(parsed.flags.get("no-explain")).toBe(true);
    expect(parsed.flags.get("name")).toBe("Mix");
  });

  it("keeps an empty value after =", () => {
    expect(parseArgs(["--name="]).flags.get("name")).toBe("");
  });
});

describe("flag getters", () => {
  const parsed = parseArgs(["--c", "7", "--max-followers", "lots", "--name="]);

  it("reads the first non-empty string among aliases", () => {
    expect(getFlagString(parsed, "count", "c")).toBe("7");
    expect(getFlagString(parsed, "name")).toBeUndefined();
  });

  it("parses numbers with a fallback", () => {
    expect(getFlagNumber(parsed, 10, "count", "c")).toBe(7);
    expect(getFlagNumber(parsed, 10, "missing")).toBe(10);
    expect(getFlagNumber(parsed, 10, "max-followers")).toBeNaN();
  });

  it("checks presence", () => {
    expect(hasFlag(parsed, "nope", "name")).toBe(true);
    expect(hasFlag(parsed, "nope")).toBe(false);
  });
});
