import { describe, it, expect } from "vitest";
import { TransformLog } from "../src/trace/transform_log.js";
import { merkleRoot } from "../src/shared/hash.js";

function sampleLog(): TransformLog {
  const log = new TransformLog("T01");
  log.record("bind", { rows: 3 }, "state-0");
  log.record("setTitle", { title: "Demographics" }, "state-1");
  log.record("setMissingText", { text: "NE" }, "state-2");
  return log;
}

describe("TransformLog", () => {
  it("links each entry to the previous content hash", () => {
    const entries = sampleLog().entries();
    expect(entries.map((e) => e.position)).toEqual([0, 1, 2]);
    expect(entries[0].hashChain.previousHash).toBeNull();
    expect(entries[1].hashChain.previousHash).toBe(entries[0].hashChain.contentHash);
    expect(entries[2].hashChain.previousHash).toBe(entries[1].hashChain.contentHash);
  });

  it("carries the Merkle root of the chain so far", () => {
    const entries = sampleLog().entries();
    expect(entries[2].hashChain.merkleRoot).toBe(merkleRoot(entries.map((e) => e.hashChain.contentHash)));
  });

  it("gives each entry a v4 trace id", () => {
    for (const e of sampleLog().entries()) {
      expect(e.traceId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(e.tableId).toBe("T01");
    }
  });

  it("validates an untouched chain", () => {
    expect(sampleLog().validateChain()).toEqual({ valid: true, errors: [] });
  });

  it("detects edited parameters", () => {
    const entries = structuredClone(sampleLog().entries());
    entries[1].params = { title: "Edited" };
    const result = new TransformLog("T01", entries).validateChain();
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["Entry 1: content hash mismatch"]);
  });

  it("detects a removed entry", () => {
    const entries = structuredClone(sampleLog().entries());
    entries.splice(1, 1);
    const result = new TransformLog("T01", entries).validateChain();
    expect(result.errors).toEqual([
      "Entry 1: position mismatch (expected 1, got 2)",
      "Entry 1: previous hash does not match prior entry content hash",
    ]);
  });

  it("forks without sharing later entries", () => {
    const log = sampleLog();
    const fork = log.fork();
    log.record("setStubLabel", { label: "x" }, "state-3");
    expect(fork.entries()).toHaveLength(3);
    expect(log.entries()).toHaveLength(4);
  });
});
