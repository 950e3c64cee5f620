/**
 * Resolver request, validation and logging types
 */

import type { FontFamily, LegacyStyle, ResolvedIdentity } from "./font.types";

/**
 * Marks a weight or italic value that should come from the font data itself
 */
export const RESOLVE_BY_FONT_TABLE = "resolve-by-font-table" as const;
export type ResolveByFontTable = typeof RESOLVE_BY_FONT_TABLE;

export interface AbsoluteRequest {
  kind: "absolute";
  weight: number;
  italic: boolean;
  base?: ResolvedIdentity | null;
  /** Takes precedence over the base's families */
  families?: readonly FontFamily[];
}

export interface RelativeRequest {
  kind: "relative";
  style: LegacyStyle;
  base?: ResolvedIdentity | null;
}

export interface FromFontTableRequest {
  kind: "fromFontTable";
  base?: ResolvedIdentity | null;
  families?: readonly FontFamily[];
}

export interface RebaseWeightRequest {
  kind: "rebaseWeight";
  weight: number;
  base?: ResolvedIdentity | null;
}

export type StyleRequest =
  | AbsoluteRequest
  | RelativeRequest
  | FromFontTableRequest
  | RebaseWeightRequest;

/**
 * Validation modes for untyped input
 */
export const ValidationMode = {
  STRICT: "strict" as const, // Throw on any invalid field
  LENIENT: "lenient" as const, // Log a warning and use the fallback
} as const;

export type ValidationMode = (typeof ValidationMode)[keyof typeof ValidationMode];

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  action: string;
  metadata?: Record<string, unknown>;
}
