/**
 * Render configuration: CLI values over environment over defaults.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_RENDER_CONFIG, loadRenderConfig, parseMarkStyle } from "../src/shared/render_config.js";

describe("parseMarkStyle", () => {
  it("defaults to numeric", () => {
    expect(parseMarkStyle()).toBe("numeric");
    expect(parseMarkStyle("roman")).toBe("numeric");
  });

  it("accepts letter aliases from either source", () => {
    expect(parseMarkStyle("letters")).toBe("alphabetic");
    expect(parseMarkStyle(undefined, " ALPHA ")).toBe("alphabetic");
  });

  it("prefers the CLI argument", () => {
    expect(parseMarkStyle("numeric", "alphabetic")).toBe("numeric");
  });
});

describe("loadRenderConfig", () => {
  it("falls back to defaults", () => {
    expect(loadRenderConfig({}, {})).toEqual(DEFAULT_RENDER_CONFIG);
    expect(DEFAULT_RENDER_CONFIG).toEqual({ markStyle: "numeric", missingText: "", confidence: 0.95 });
  });

  it("reads the environment", () => {
    const config = loadRenderConfig(
      {},
      { TABLE_MARK_STYLE: "a", TABLE_MISSING_TEXT: "NA", TABLE_CONFIDENCE: "0.9" },
    );
    expect(config).toEqual({ markStyle: "alphabetic", missingText: "NA", confidence: 0.9 });
  });

  it("lets CLI values override the environment", () => {
    const config = loadRenderConfig(
      { missingText: "-", confidence: "0.8" },
      { TABLE_MISSING_TEXT: "NA", TABLE_CONFIDENCE: "0.9" },
    );
    expect(config.missingText).toBe("-");
    expect(config.confidence).toBe(0.8);
  });

  it("rejects confidence levels outside (0, 1)", () => {
    expect(() => loadRenderConfig({ confidence: "1.5" }, {})).toThrow(ZodError);
    expect(() => loadRenderConfig({ confidence: "abc" }, {})).toThrow(ZodError);
  });
});
