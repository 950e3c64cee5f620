/**
 * Font style primitives
 * Weight clamping, FontStyle construction and legacy-style derivation
 */

import type { FontStyle } from "../../types/font.types";
import { FontSlant, LegacyStyle } from "../../types/font.types";

export const MIN_WEIGHT = 1;
export const MAX_WEIGHT = 1000;
export const NORMAL_WEIGHT = 400;
export const BOLD_WEIGHT = 700;

/** Weights at or above this read as bold in the legacy enum */
export const BOLD_THRESHOLD = 600;

/** Added to the base weight when a relative request asks for bold */
export const BOLD_DELTA = 300;

/**
 * Clamp a weight into [1, 1000], rounding to an integer first.
 * NaN clamps to the minimum.
 */
export function clampWeight(weight: number): number {
  if (Number.isNaN(weight)) return MIN_WEIGHT;
  return Math.max(MIN_WEIGHT, Math.min(MAX_WEIGHT, Math.round(weight)));
}

export function createFontStyle(weight: number, slant: FontSlant = FontSlant.UPRIGHT): FontStyle {
  return Object.freeze({ weight: clampWeight(weight), slant });
}

export function slantFromItalic(italic: boolean): FontSlant {
  return italic ? FontSlant.ITALIC : FontSlant.UPRIGHT;
}

export function computeLegacyStyle(weight: number, slant: FontSlant): LegacyStyle {
  const bold = clampWeight(weight) >= BOLD_THRESHOLD;
  const italic = slant === FontSlant.ITALIC;

  if (bold && italic) return LegacyStyle.BOLD_ITALIC;
  if (bold) return LegacyStyle.BOLD;
  if (italic) return LegacyStyle.ITALIC;
  return LegacyStyle.NORMAL;
}

export function legacyStyleOf(style: FontStyle): LegacyStyle {
  return computeLegacyStyle(style.weight, style.slant);
}

export function legacyStyleFlags(style: LegacyStyle): { bold: boolean; italic: boolean } {
  return {
    bold: style === LegacyStyle.BOLD || style === LegacyStyle.BOLD_ITALIC,
    italic: style === LegacyStyle.ITALIC || style === LegacyStyle.BOLD_ITALIC,
  };
}

export function fontStyleEquals(a: FontStyle, b: FontStyle): boolean {
  return a.weight === b.weight && a.slant === b.slant;
}
