/**
 * Zod validation for style data arriving untyped (config files, JSON, font tables)
 * LENIENT mode by default: log a warning and use the fallback
 */

import { z } from "zod";
import { getEngineConfig } from "../config/engineConfig";
import type { FontStyle } from "../types/font.types";
import { FontSlant, LegacyStyle } from "../types/font.types";
import type { StyleRequest } from "../types/resolver.types";
import { ValidationMode } from "../types/resolver.types";
import { engineLogger } from "./logger";
import { NORMAL_WEIGHT, createFontStyle, slantFromItalic } from "./style/fontStyle";

// Weights are only required to be numbers; range is enforced by clamping
const weightSchema = z.number();

export const styleRequestSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("absolute"), weight: weightSchema, italic: z.boolean() }),
  z.object({ kind: z.literal("relative"), style: z.nativeEnum(LegacyStyle) }),
  z.object({ kind: z.literal("fromFontTable") }),
  z.object({ kind: z.literal("rebaseWeight"), weight: weightSchema }),
]);

/**
 * Declared style: either `italic` or `slant` may carry the slant
 */
export const fontStyleSchema = z
  .object({
    weight: weightSchema.default(NORMAL_WEIGHT),
    italic: z.boolean().optional(),
    slant: z.nativeEnum(FontSlant).optional(),
  })
  .transform(
    ({ weight, italic, slant }): FontStyle =>
      createFontStyle(weight, slant ?? slantFromItalic(italic ?? false))
  );

/**
 * Fields of a decoded OS/2 table that carry the declared style.
 * fsSelection is a raw bit field or an already-decoded flag object.
 * usWeightClass is left unbounded; createFontStyle clamps it.
 */
export const os2StyleSchema = z.object({
  usWeightClass: z.number().optional(),
  fsSelection: z
    .union([z.number().int().nonnegative(), z.object({ italic: z.boolean().optional() })])
    .optional(),
});

export type Os2Style = z.infer<typeof os2StyleSchema>;

const REQUEST_FALLBACK: StyleRequest = { kind: "relative", style: LegacyStyle.NORMAL };

/**
 * Validate data with the given mode.
 * STRICT throws with every issue; LENIENT warns and returns the fallback.
 */
export function validateWithMode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  fallback: T,
  mode: ValidationMode = getEngineConfig().validationMode
): { success: boolean; data: T; errors: string[] } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data, errors: [] };
  }

  const errors = result.error.issues.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`);

  if (mode === ValidationMode.STRICT) {
    throw new Error(`[Validation] ${errors.join("; ")}`);
  }

  engineLogger.warn("Validation", "lenient fallback", { errors });
  return { success: false, data: fallback, errors };
}

/**
 * Parse a style request from untyped input (no base, no families)
 */
export function parseStyleRequest(input: unknown, mode?: ValidationMode): StyleRequest {
  return validateWithMode<StyleRequest>(styleRequestSchema, input, REQUEST_FALLBACK, mode).data;
}

export function parseFontStyle(input: unknown, mode?: ValidationMode): FontStyle {
  return validateWithMode<FontStyle>(
    fontStyleSchema,
    input,
    createFontStyle(NORMAL_WEIGHT, FontSlant.UPRIGHT),
    mode
  ).data;
}
