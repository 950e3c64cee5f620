/**
 * Family selector
 * Picks the variant (and family) that represents a requested style
 */

import type {
  FontFakery,
  FontFamily,
  FontStyle,
  FontVariant,
  ResolvedIdentity,
} from "../../types/font.types";
import { FontSlant } from "../../types/font.types";
import type { ResolveByFontTable } from "../../types/resolver.types";
import { RESOLVE_BY_FONT_TABLE } from "../../types/resolver.types";
import {
  BOLD_THRESHOLD,
  NORMAL_WEIGHT,
  createFontStyle,
  slantFromItalic,
} from "../style/fontStyle";

export interface VariantSelection {
  style: FontStyle;
  familyIndex: number;
  variant: FontVariant;
}

export interface VariantMatch {
  variant: FontVariant;
  fakery: FontFakery;
}

export interface IdentityMatch extends VariantMatch {
  familyIndex: number;
  family: FontFamily;
}

/** A fake bold is only worth drawing two weight grades or more above the variant */
const FAKE_BOLD_MIN_GAP = 200;

function assertFamilies(families: readonly FontFamily[]): void {
  if (families.length === 0) {
    throw new Error("[FamilySelector] Family list must not be empty");
  }
  families.forEach((family, index) => {
    if (family.variants.length === 0) {
      throw new Error(`[FamilySelector] Family ${index} ("${family.name}") has no variants`);
    }
  });
}

function isRegularLike(style: FontStyle): boolean {
  return style.slant === FontSlant.UPRIGHT && style.weight <= NORMAL_WEIGHT;
}

/**
 * Heaviest upright variant at or below 400 in one family.
 * First declared wins ties.
 */
function findRegularCandidate(family: FontFamily): FontVariant | null {
  let best: FontVariant | null = null;
  for (const variant of family.variants) {
    if (!isRegularLike(variant.style)) continue;
    if (!best || variant.style.weight > best.style.weight) {
      best = variant;
    }
  }
  return best;
}

/**
 * Representative "regular" from the declared styles.
 * Falls back to the first family's first variant when no family has a
 * regular-like variant.
 */
function selectByFontTable(families: readonly FontFamily[]): VariantSelection {
  let selection: VariantSelection | null = null;

  for (const [familyIndex, family] of families.entries()) {
    const candidate = findRegularCandidate(family);
    if (!candidate) continue;
    if (!selection || candidate.style.weight > selection.style.weight) {
      selection = { style: candidate.style, familyIndex, variant: candidate };
    }
  }

  if (selection) return selection;

  const first = families[0].variants[0];
  return { style: first.style, familyIndex: 0, variant: first };
}

/**
 * Distance between a wanted and an actual style, in weight grades (hundreds)
 * plus 2 for a slant mismatch. 0 means identical.
 */
export function computeMatchScore(wanted: FontStyle, actual: FontStyle): number {
  if (wanted.weight === actual.weight && wanted.slant === actual.slant) return 0;
  let score = Math.abs(Math.trunc(wanted.weight / 100) - Math.trunc(actual.weight / 100));
  if (wanted.slant !== actual.slant) score += 2;
  return score;
}

export function computeFakery(wanted: FontStyle, actual: FontStyle): FontFakery {
  return {
    fakeBold:
      wanted.weight >= BOLD_THRESHOLD && wanted.weight - actual.weight >= FAKE_BOLD_MIN_GAP,
    fakeItalic: wanted.slant === FontSlant.ITALIC && actual.slant === FontSlant.UPRIGHT,
  };
}

function closestVariant(
  family: FontFamily,
  style: FontStyle
): { variant: FontVariant; score: number } {
  let best = family.variants[0];
  let bestScore = computeMatchScore(style, best.style);
  for (const variant of family.variants.slice(1)) {
    const score = computeMatchScore(style, variant.style);
    if (score < bestScore) {
      best = variant;
      bestScore = score;
    }
  }
  return { variant: best, score: bestScore };
}

/**
 * Closest variant of one family for a style, with the fakery needed to reach it
 */
export function matchVariant(family: FontFamily, style: FontStyle): VariantMatch {
  if (family.variants.length === 0) {
    throw new Error(`[FamilySelector] Family "${family.name}" has no variants`);
  }
  const { variant } = closestVariant(family, style);
  return { variant, fakery: computeFakery(style, variant.style) };
}

function selectForStyle(families: readonly FontFamily[], style: FontStyle): VariantSelection {
  let familyIndex = 0;
  let { variant, score } = closestVariant(families[0], style);

  families.slice(1).forEach((family, offset) => {
    const candidate = closestVariant(family, style);
    if (candidate.score < score) {
      familyIndex = offset + 1;
      variant = candidate.variant;
      score = candidate.score;
    }
  });

  return { style, familyIndex, variant };
}

/**
 * Select the variant matching a requested weight/italic.
 *
 * Explicit values fix the style directly (weight clamped); the families only
 * decide which variant carries it. RESOLVE_BY_FONT_TABLE takes that side of
 * the style from the declared regular-like anchor.
 */
export function selectVariant(
  families: readonly FontFamily[],
  requestedWeight: number | ResolveByFontTable,
  requestedItalic: boolean | ResolveByFontTable
): VariantSelection {
  assertFamilies(families);

  const weightFromTable = requestedWeight === RESOLVE_BY_FONT_TABLE;
  const italicFromTable = requestedItalic === RESOLVE_BY_FONT_TABLE;

  if (weightFromTable && italicFromTable) {
    return selectByFontTable(families);
  }

  const anchor = weightFromTable || italicFromTable ? selectByFontTable(families).style : null;
  const weight = requestedWeight === RESOLVE_BY_FONT_TABLE ? anchor?.weight : requestedWeight;
  const slant =
    requestedItalic === RESOLVE_BY_FONT_TABLE ? anchor?.slant : slantFromItalic(requestedItalic);

  return selectForStyle(families, createFontStyle(weight ?? NORMAL_WEIGHT, slant));
}

/**
 * Which family and variant a renderer should draw a resolved identity with
 */
export function matchIdentity(identity: ResolvedIdentity): IdentityMatch {
  assertFamilies(identity.families);
  const { familyIndex, variant } = selectForStyle(identity.families, identity.style);
  return {
    familyIndex,
    family: identity.families[familyIndex],
    variant,
    fakery: computeFakery(identity.style, variant.style),
  };
}
