/**
 * Family list construction: group parsed variants into ordered families.
 * Pure functions only.
 */

import type { FontFamily, FontVariant } from "../types/font.types";

const UNKNOWN_FAMILY = "Unknown";

export function createFamily(name: string, variants: readonly FontVariant[]): FontFamily {
  if (variants.length === 0) {
    throw new Error(`[Families] Family "${name}" has no variants`);
  }
  return Object.freeze({ name, variants: Object.freeze([...variants]) });
}

/**
 * Group variants by familyName, families in first-seen order,
 * variants in input order within each family.
 */
export function groupVariantsByFamily(variants: readonly FontVariant[]): readonly FontFamily[] {
  const map = new Map<string, FontVariant[]>();
  for (const variant of variants) {
    const family = variant.familyName?.trim() || UNKNOWN_FAMILY;
    const list = map.get(family) ?? [];
    list.push(variant);
    map.set(family, list);
  }

  return Object.freeze(Array.from(map, ([name, list]) => createFamily(name, list)));
}
