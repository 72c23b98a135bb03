import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { parseCliArgs } from "../../cli/options.js";
import { ConfigurationError } from "../../errors.js";

function parse(...args: string[]) {
  return parseCliArgs(["node", "ragengine-ingest", ...args]);
}

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const options = parse("--index", "tax_index", "--file", "rules.txt");
    expect(options).toMatchObject({
      mode: "create",
      index: "tax_index",
      file: "rules.txt",
      metadata: [],
      allowDuplicates: false,
      limit: 10,
      offset: 0,
      maxTextLength: 1000,
      system: "You are a helpful assistant.",
      temperature: 0.7,
      maxTokens: 2048,
      contextTokenRatio: 0.5,
      json: false,
      showSources: false,
      verbose: false,
    });
    expect(options.maxChars).toBeUndefined();
    expect(options.retries).toBeUndefined();
  });

  it("collects repeated --metadata flags in order", () => {
    const options = parse("--metadata", "subject=tax", "--metadata", "year=2025");
    expect(options.metadata).toEqual(["subject=tax", "year=2025"]);
  });

  it("converts numeric flags", () => {
    const options = parse(
      "--mode", "list",
      "--limit", "25",
      "--offset", "50",
      "--max-chars", "1200",
      "--overlap-chars", "0",
      "--connect-timeout", "2.5",
      "--retries", "5",
    );
    expect(options).toMatchObject({
      mode: "list",
      limit: 25,
      offset: 50,
      maxChars: 1200,
      overlapChars: 0,
      connectTimeout: 2.5,
      retries: 5,
    });
  });

  it("accepts the query alias and the indexes mode", () => {
    expect(parse("--mode", "query").mode).toBe("query");
    expect(parse("--mode", "indexes").mode).toBe("indexes");
  });

  it("rejects a limit above 100", () => {
    expect(() => parse("--limit", "500")).toThrow(
      "Invalid arguments: --limit: Number must be less than or equal to 100",
    );
  });

  it("rejects a non-numeric value", () => {
    expect(() => parse("--max-tokens", "many")).toThrow(ConfigurationError);
  });

  it("rejects zero retries", () => {
    expect(() => parse("--retries", "0")).toThrow(/^Invalid arguments: --retries:/);
  });

  it("rejects an out-of-range context token ratio", () => {
    expect(() => parse("--context-token-ratio", "1.5")).toThrow(/--context-token-ratio/);
  });

  it("rejects an unknown mode through commander", () => {
    expect(() => parse("--mode", "delete")).toThrow(CommanderError);
  });

  it("rejects an unknown flag through commander", () => {
    expect(() => parse("--bogus")).toThrow(CommanderError);
  });
});
