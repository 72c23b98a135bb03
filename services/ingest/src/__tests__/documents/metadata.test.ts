import { describe, it, expect } from "vitest";
import {
  mergeMetadata,
  metadataFromFlags,
  parseKeyValuePairs,
  parseMetadataJson,
} from "../../documents/metadata.js";
import { MetadataParseError } from "../../errors.js";

describe("parseKeyValuePairs", () => {
  it("parses repeated key=value pairs as strings", () => {
    expect(parseKeyValuePairs(["subject=tax", "year=2025"])).toEqual({
      subject: "tax",
      year: "2025",
    });
  });

  it("splits only on the first '='", () => {
    expect(parseKeyValuePairs(["query=a=b"])).toEqual({ query: "a=b" });
  });

  it("keeps an empty value", () => {
    expect(parseKeyValuePairs(["note="])).toEqual({ note: "" });
  });

  it("lets a later pair override an earlier one", () => {
    expect(parseKeyValuePairs(["k=1", "k=2"])).toEqual({ k: "2" });
  });

  it("rejects a pair without '='", () => {
    expect(() => parseKeyValuePairs(["subject"])).toThrow(MetadataParseError);
  });

  it("rejects an empty key", () => {
    expect(() => parseKeyValuePairs(["=tax"])).toThrow('Invalid --metadata: empty key in "=tax"');
  });
});

describe("parseMetadataJson", () => {
  it("keeps JSON value types", () => {
    expect(
      parseMetadataJson('{"s":"x","n":1.5,"b":true,"z":null,"a":[1,"two"],"o":{"k":false}}'),
    ).toEqual({ s: "x", n: 1.5, b: true, z: null, a: [1, "two"], o: { k: false } });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseMetadataJson("{author:")).toThrow(MetadataParseError);
  });

  it("rejects a JSON array", () => {
    expect(() => parseMetadataJson("[1,2]")).toThrow(
      "Invalid --metadata-json: must be a JSON object (key-value pairs)",
    );
  });

  it("rejects a JSON scalar", () => {
    expect(() => parseMetadataJson("42")).toThrow(MetadataParseError);
  });

  it("names the flag it was given in errors", () => {
    expect(() => parseMetadataJson("null", "--metadata-filter")).toThrow(
      "Invalid --metadata-filter: must be a JSON object (key-value pairs)",
    );
  });
});

describe("mergeMetadata", () => {
  it("lets the JSON value win on a shared key", () => {
    expect(mergeMetadata({ author: "flag", subject: "tax" }, { author: "json" })).toEqual({
      author: "json",
      subject: "tax",
    });
  });

  it("returns the pairs unchanged when there is no JSON", () => {
    expect(mergeMetadata({ a: "1" }, undefined)).toEqual({ a: "1" });
  });
});

describe("metadataFromFlags", () => {
  it("merges both flags with the right value types", () => {
    const merged = metadataFromFlags(["subject=tax"], '{"author":"kaito","year":2025}');
    expect(merged).toEqual({ subject: "tax", author: "kaito", year: 2025 });
    expect(typeof merged?.year).toBe("number");
    expect(typeof merged?.subject).toBe("string");
  });

  it("returns undefined when neither flag is given", () => {
    expect(metadataFromFlags([], undefined)).toBeUndefined();
  });
});
