/**
 * Font style type definitions
 */

export const FontSlant = {
  UPRIGHT: "upright" as const,
  ITALIC: "italic" as const,
} as const;

export type FontSlant = (typeof FontSlant)[keyof typeof FontSlant];

/**
 * Four-bucket classification kept for callers that think in
 * NORMAL/BOLD/ITALIC/BOLD_ITALIC instead of a continuous weight.
 */
export const LegacyStyle = {
  NORMAL: "NORMAL" as const,
  BOLD: "BOLD" as const,
  ITALIC: "ITALIC" as const,
  BOLD_ITALIC: "BOLD_ITALIC" as const,
} as const;

export type LegacyStyle = (typeof LegacyStyle)[keyof typeof LegacyStyle];

export interface FontStyle {
  readonly weight: number; // 1..1000, always clamped
  readonly slant: FontSlant;
}

export interface FontVariant {
  readonly style: FontStyle;
  readonly familyName?: string;
  readonly postscriptName?: string;
  readonly fileName?: string;
}

export interface FontFamily {
  readonly name: string;
  readonly variants: readonly FontVariant[]; // never empty
}

export interface ResolvedIdentity {
  readonly style: FontStyle;
  /** Weight the identity returns to when asked for NORMAL again */
  readonly baseWeight: number;
  readonly apiStyle: LegacyStyle;
  /** Shared with the identity this one was derived from */
  readonly families: readonly FontFamily[];
}

/** Synthetic emboldening/slanting the renderer applies on top of a variant */
export interface FontFakery {
  fakeBold: boolean;
  fakeItalic: boolean;
}
