import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LegacyStyle } from "../types/font.types";
import { engineLogger } from "./logger";
import { os2StyleSchema, parseFontStyle, parseStyleRequest } from "./validation";

beforeEach(() => {
  engineLogger.clear();
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseStyleRequest", () => {
  it("accepts each request kind without clamping", () => {
    expect(parseStyleRequest({ kind: "absolute", weight: 1100, italic: false })).toEqual({
      kind: "absolute",
      weight: 1100,
      italic: false,
    });
    expect(parseStyleRequest({ kind: "relative", style: "BOLD_ITALIC" })).toEqual({
      kind: "relative",
      style: LegacyStyle.BOLD_ITALIC,
    });
    expect(parseStyleRequest({ kind: "fromFontTable" })).toEqual({ kind: "fromFontTable" });
    expect(parseStyleRequest({ kind: "rebaseWeight", weight: -5 })).toEqual({
      kind: "rebaseWeight",
      weight: -5,
    });
  });

  it("falls back to a NORMAL relative request in lenient mode", () => {
    const request = parseStyleRequest({ kind: "relative", style: "HEAVY" }, "lenient");
    expect(request).toEqual({ kind: "relative", style: "NORMAL" });

    const [entry] = engineLogger.getEntries();
    expect(entry.level).toBe("warn");
    expect(entry.component).toBe("Validation");
    expect(entry.action).toBe("lenient fallback");
  });

  it("throws every issue in strict mode", () => {
    expect(() =>
      parseStyleRequest({ kind: "absolute", weight: "bold", italic: false }, "strict")
    ).toThrow("[Validation] weight: Expected number, received string");
  });

  it("rejects an unknown kind in strict mode", () => {
    expect(() => parseStyleRequest({ kind: "variable" }, "strict")).toThrow(
      /^\[Validation\] kind: /
    );
  });
});

describe("parseFontStyle", () => {
  it("clamps the declared weight and reads italic", () => {
    expect(parseFontStyle({ weight: 0, italic: true })).toEqual({ weight: 1, slant: "italic" });
  });

  it("accepts a slant instead of an italic flag", () => {
    expect(parseFontStyle({ slant: "italic" })).toEqual({ weight: 400, slant: "italic" });
  });

  it("prefers an explicit slant over the italic flag", () => {
    expect(parseFontStyle({ weight: 700, italic: true, slant: "upright" })).toEqual({
      weight: 700,
      slant: "upright",
    });
  });

  it("falls back to regular for unusable input", () => {
    expect(parseFontStyle("bold", "lenient")).toEqual({ weight: 400, slant: "upright" });
  });
});

describe("os2StyleSchema", () => {
  it("accepts raw and decoded fsSelection", () => {
    expect(os2StyleSchema.parse({ usWeightClass: 700, fsSelection: 0x21 })).toEqual({
      usWeightClass: 700,
      fsSelection: 0x21,
    });
    expect(os2StyleSchema.parse({ fsSelection: { italic: true, bold: false } })).toEqual({
      fsSelection: { italic: true },
    });
  });

  it("keeps an out-of-range weight class for clamping", () => {
    expect(os2StyleSchema.parse({ usWeightClass: 0, fsSelection: 0x0001 })).toEqual({
      usWeightClass: 0,
      fsSelection: 0x0001,
    });
  });

  it("rejects a fsSelection of the wrong type", () => {
    expect(os2StyleSchema.safeParse({ fsSelection: "italic" }).success).toBe(false);
  });
});
