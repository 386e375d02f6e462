import { describe, it, expect } from "vitest";
import {
  sha256Bytes,
  sha256String,
  contentHash,
  canonicalJsonStringify,
  merkleRoot,
} from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256Bytes produces known hash for known input", () => {
    // SHA-256 of empty string
    expect(sha256Bytes(Buffer.from(""))).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("test")).toBe("9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
  });
});

describe("Canonical JSON", () => {
  it("sorts keys at every depth", () => {
    expect(canonicalJsonStringify({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it("content hash ignores key order but not array order", () => {
    expect(contentHash({ x: 1, y: 2 })).toBe(contentHash({ y: 2, x: 1 }));
    expect(contentHash([1, 2])).not.toBe(contentHash([2, 1]));
  });
});

describe("Merkle Root", () => {
  it("of nothing is the empty-string hash", () => {
    expect(merkleRoot([])).toBe(sha256String(""));
  });

  it("of one hash is that hash", () => {
    expect(merkleRoot(["a"])).toBe("a");
  });

  it("pairs hashes and repeats an odd tail", () => {
    expect(merkleRoot(["a", "b"])).toBe(sha256String("ab"));
    expect(merkleRoot(["a", "b", "c"])).toBe(sha256String(sha256String("ab") + sha256String("cc")));
  });
});
