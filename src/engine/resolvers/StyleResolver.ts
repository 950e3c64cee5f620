/**
 * Style resolver
 * Turns a style request (and optional base identity) into a new immutable
 * ResolvedIdentity.
 *
 * Relative requests work from the base's stored baseWeight, never from its
 * displayed weight: BOLD then NORMAL returns to the base, and BOLD twice
 * stays at base + BOLD_DELTA.
 */

import type { FontFamily, FontStyle, ResolvedIdentity } from "../../types/font.types";
import { FontSlant, LegacyStyle } from "../../types/font.types";
import type {
  AbsoluteRequest,
  FromFontTableRequest,
  RebaseWeightRequest,
  RelativeRequest,
  ResolveByFontTable,
  StyleRequest,
} from "../../types/resolver.types";
import { RESOLVE_BY_FONT_TABLE } from "../../types/resolver.types";
import type { DefaultIdentityRegistry } from "../../stores/defaultIdentityStore";
import { defaultIdentityRegistry } from "../../stores/defaultIdentityStore";
import { engineLogger } from "../logger";
import { selectVariant } from "../selectors/FamilySelector";
import {
  BOLD_DELTA,
  clampWeight,
  createFontStyle,
  legacyStyleFlags,
  legacyStyleOf,
  slantFromItalic,
} from "../style/fontStyle";

function createIdentity(
  style: FontStyle,
  baseWeight: number,
  apiStyle: LegacyStyle,
  families: readonly FontFamily[]
): ResolvedIdentity {
  return Object.freeze({ style, baseWeight, apiStyle, families });
}

/**
 * Families for a request: explicit list, then the base's, then the default's
 */
function familiesFor(
  base: ResolvedIdentity | null | undefined,
  registry: DefaultIdentityRegistry,
  families?: readonly FontFamily[]
): readonly FontFamily[] {
  return families ?? base?.families ?? registry.get().families;
}

function resolveAbsolute(
  request: AbsoluteRequest,
  registry: DefaultIdentityRegistry
): ResolvedIdentity {
  const families = familiesFor(request.base, registry, request.families);
  // Explicit values: the selector clamps and never consults the declared styles
  const { style } = selectVariant(families, request.weight, request.italic);
  return createIdentity(style, style.weight, legacyStyleOf(style), families);
}

function resolveRebase(
  request: RebaseWeightRequest,
  registry: DefaultIdentityRegistry
): ResolvedIdentity {
  const baseWeight = clampWeight(request.weight);
  return createIdentity(
    createFontStyle(baseWeight, FontSlant.UPRIGHT),
    baseWeight,
    LegacyStyle.NORMAL,
    familiesFor(request.base, registry)
  );
}

function resolveRelative(
  request: RelativeRequest,
  registry: DefaultIdentityRegistry
): ResolvedIdentity {
  const base = resolveDefault(request.base, registry);
  const { bold, italic } = legacyStyleFlags(request.style);
  const weight = bold ? clampWeight(base.baseWeight + BOLD_DELTA) : base.baseWeight;
  const style = createFontStyle(weight, slantFromItalic(italic));
  return createIdentity(style, base.baseWeight, legacyStyleOf(style), base.families);
}

function resolveFromFontTable(
  request: FromFontTableRequest,
  registry: DefaultIdentityRegistry
): ResolvedIdentity {
  const families = familiesFor(request.base, registry, request.families);
  const { style } = selectVariant(families, RESOLVE_BY_FONT_TABLE, RESOLVE_BY_FONT_TABLE);
  return createIdentity(style, style.weight, legacyStyleOf(style), families);
}

function dispatch(request: StyleRequest, registry: DefaultIdentityRegistry): ResolvedIdentity {
  switch (request.kind) {
    case "absolute":
      return resolveAbsolute(request, registry);
    case "relative":
      return resolveRelative(request, registry);
    case "fromFontTable":
      return resolveFromFontTable(request, registry);
    case "rebaseWeight":
      return resolveRebase(request, registry);
  }
}

/**
 * Resolve a style request into a new identity.
 * Requests without a base (and without families) read the registry.
 */
export function resolveStyle(
  request: StyleRequest,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  const identity = dispatch(request, registry);
  engineLogger.debug("StyleResolver", "resolve", {
    kind: request.kind,
    weight: identity.style.weight,
    slant: identity.style.slant,
    baseWeight: identity.baseWeight,
    apiStyle: identity.apiStyle,
  });
  return identity;
}

/**
 * The base itself when given, otherwise the registry's default
 */
export function resolveDefault(
  base: ResolvedIdentity | null | undefined,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  return base ?? registry.get();
}

export function createAbsolute(
  base: ResolvedIdentity | null,
  weight: number,
  italic: boolean,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  return resolveStyle({ kind: "absolute", base, weight, italic }, registry);
}

export function createRelative(
  base: ResolvedIdentity | null,
  style: LegacyStyle,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  return resolveStyle({ kind: "relative", base, style }, registry);
}

export function createWithDifferentBaseWeight(
  base: ResolvedIdentity | null,
  weight: number,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  return resolveStyle({ kind: "rebaseWeight", base, weight }, registry);
}

/**
 * Identity over a freshly built family list.
 * Explicit weight and italic are taken as given (weight clamped); either one
 * may be RESOLVE_BY_FONT_TABLE to read it from the declared styles.
 */
export function createFromFamilies(
  families: readonly FontFamily[],
  weight: number | ResolveByFontTable,
  italic: boolean | ResolveByFontTable,
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  if (weight === RESOLVE_BY_FONT_TABLE && italic === RESOLVE_BY_FONT_TABLE) {
    return resolveStyle({ kind: "fromFontTable", families }, registry);
  }
  if (weight !== RESOLVE_BY_FONT_TABLE && italic !== RESOLVE_BY_FONT_TABLE) {
    return resolveStyle({ kind: "absolute", families, weight, italic }, registry);
  }

  const { style } = selectVariant(families, weight, italic);
  const identity = createIdentity(style, style.weight, legacyStyleOf(style), families);
  engineLogger.debug("StyleResolver", "resolve", {
    kind: "mixed",
    weight: style.weight,
    slant: style.slant,
    baseWeight: identity.baseWeight,
    apiStyle: identity.apiStyle,
  });
  return identity;
}

/**
 * Resolve the declared style of start-up families and install it as the default
 */
export function initializeDefaultIdentity(
  families: readonly FontFamily[],
  registry: DefaultIdentityRegistry = defaultIdentityRegistry
): ResolvedIdentity {
  const identity = resolveStyle({ kind: "fromFontTable", families }, registry);
  registry.set(identity);
  engineLogger.info("StyleResolver", "initializeDefault", {
    families: families.map((family) => family.name),
    weight: identity.style.weight,
    slant: identity.style.slant,
  });
  return identity;
}
