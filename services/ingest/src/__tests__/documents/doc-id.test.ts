import { describe, it, expect } from "vitest";
import { makeDocId, sha256Hex } from "../../documents/doc-id.js";

const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("makeDocId", () => {
  it("is the URL-namespace version 5 UUID of file://<path>#chunk=<index>", () => {
    expect(makeDocId("/tmp/a.txt", 0)).toBe("c0a95341-cce8-51f5-8c0c-1257d69e81b7");
  });

  it("is a version 5 UUID", () => {
    expect(makeDocId("/data/cra-tax-rules.txt", 3)).toMatch(UUID_V5);
  });

  it("returns the same ID for the same path and index", () => {
    expect(makeDocId("/data/doc.txt", 0)).toBe(makeDocId("/data/doc.txt", 0));
  });

  it("returns different IDs for different chunk indices", () => {
    expect(makeDocId("/data/doc.txt", 0)).not.toBe(makeDocId("/data/doc.txt", 1));
  });

  it("returns different IDs for different paths", () => {
    expect(makeDocId("/data/a.txt", 0)).not.toBe(makeDocId("/data/b.txt", 0));
  });
});

describe("sha256Hex", () => {
  it("hashes UTF-8 text to lowercase hex", () => {
    expect(sha256Hex("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});
