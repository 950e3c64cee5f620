/**
 * Declared-style reader
 * Parses a font binary with fontkit and reports the style it declares
 * (OS/2 usWeightClass and italic bit), with name-based fallbacks.
 */

import * as fontkit from "fontkit";
import { z } from "zod";
import type { FontVariant } from "../../types/font.types";
import { engineLogger } from "../logger";
import { BOLD_WEIGHT, NORMAL_WEIGHT, createFontStyle, slantFromItalic } from "../style/fontStyle";
import { os2StyleSchema } from "../validation";
import type { Os2Style } from "../validation";

const collectionSchema = z.object({ fonts: z.array(z.unknown()).min(1) });

const faceSchema = z.object({
  // fontkit reports a missing name record as null
  familyName: z.string().nullish(),
  subfamilyName: z.string().nullish(),
  postscriptName: z.string().nullish(),
  italicAngle: z.number().optional(),
  "OS/2": z.unknown().optional(),
});

type Face = z.infer<typeof faceSchema>;

// Checked in order: compound names before their stems
const SUBFAMILY_WEIGHTS: Array<[RegExp, number]> = [
  [/(extra|ultra)light/, 200],
  [/(semi|demi)bold/, 600],
  [/(extra|ultra)bold/, 800],
  [/hairline|thin/, 100],
  [/light/, 300],
  [/medium/, 500],
  [/bold/, BOLD_WEIGHT],
  [/black|heavy/, 900],
];

/**
 * Weight guessed from a subfamily name such as "SemiBold Italic"
 */
export function weightFromSubfamily(subfamily: string): number {
  const normalized = subfamily.toLowerCase().replace(/[\s_-]+/g, "");
  for (const [pattern, weight] of SUBFAMILY_WEIGHTS) {
    if (pattern.test(normalized)) return weight;
  }
  return NORMAL_WEIGHT;
}

function italicFromOs2(os2: Os2Style | null): boolean | null {
  const fsSelection = os2?.fsSelection;
  if (typeof fsSelection === "number") return (fsSelection & 0x0001) !== 0;
  if (fsSelection && typeof fsSelection.italic === "boolean") return fsSelection.italic;
  return null;
}

function readOs2(face: Face, fileName: string): Os2Style | null {
  if (face["OS/2"] == null) return null;
  const parsed = os2StyleSchema.safeParse(face["OS/2"]);
  if (parsed.success) return parsed.data;
  engineLogger.warn("StyleReader", "invalid OS/2 table", {
    fileName,
    errors: parsed.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`),
  });
  return null;
}

function openFace(buffer: Buffer, fileName: string): Face {
  let created: unknown;
  try {
    created = fontkit.create(buffer);
  } catch (error) {
    throw new Error(`[StyleReader] Failed to parse ${fileName}`, { cause: error });
  }

  const collection = collectionSchema.safeParse(created);
  const face = faceSchema.safeParse(collection.success ? collection.data.fonts[0] : created);
  if (!face.success) {
    throw new Error(`[StyleReader] Unrecognized font object for ${fileName}`);
  }
  return face.data;
}

/**
 * Read the declared style of a font file (first face of a collection)
 */
export function readFontVariant(buffer: Buffer, fileName: string): FontVariant {
  const startTime = Date.now();
  const face = openFace(buffer, fileName);
  const os2 = readOs2(face, fileName);
  const subfamily = face.subfamilyName ?? "";

  let weight = os2?.usWeightClass;
  if (weight === undefined) {
    weight = weightFromSubfamily(subfamily);
    engineLogger.warn("StyleReader", "weight from subfamily name", { fileName, subfamily, weight });
  }

  const italic =
    italicFromOs2(os2) ??
    ((face.italicAngle !== undefined && face.italicAngle !== 0) ||
      /italic|oblique/i.test(subfamily));

  const variant: FontVariant = {
    style: createFontStyle(weight, slantFromItalic(italic)),
    familyName: face.familyName ?? undefined,
    postscriptName: face.postscriptName ?? undefined,
    fileName,
  };

  engineLogger.timed("debug", "StyleReader", "read", startTime, {
    fileName,
    weight: variant.style.weight,
    slant: variant.style.slant,
  });
  return Object.freeze(variant);
}
