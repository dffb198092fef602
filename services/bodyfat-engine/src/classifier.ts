/**
 * Body Fat Classifier
 *
 * Maps (age, sex, %BF) to a normative category using decade age bands.
 * Bounds are inclusive and kept exactly as published, so a value falling
 * between two sub-ranges (e.g. 13.85 for a male in his twenties) is
 * Unclassified.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { bodyFatNormsSchema, type AgeBand, type BodyFatNorms } from "@bodyfat/contracts";
import type { BodyFatCategory, Sex } from "./types.js";

export const BELOW_ESSENTIAL_FAT: BodyFatCategory = "Extremely Lean (Below Essential Fat)";
export const UNCLASSIFIED: BodyFatCategory = "Unclassified";

const NORMS_PATH = fileURLToPath(new URL("../data/body-fat-norms.json", import.meta.url));

let cachedNorms: BodyFatNorms | null = null;

/**
 * Load and validate the normative tables. Throws if the data file is malformed.
 */
export function loadBodyFatNorms(): BodyFatNorms {
  if (cachedNorms) return cachedNorms;
  const raw: unknown = JSON.parse(readFileSync(NORMS_PATH, "utf8"));
  cachedNorms = bodyFatNormsSchema.parse(raw);
  return cachedNorms;
}

export function findAgeBand(age: number, sex: Sex, norms: BodyFatNorms = loadBodyFatNorms()): AgeBand | null {
  return norms[sex].bands.find((band) => age >= band.minAge && age <= band.maxAge) ?? null;
}

export function classifyBodyFat(
  age: number,
  sex: Sex,
  percentage: number,
  norms: BodyFatNorms = loadBodyFatNorms(),
): BodyFatCategory {
  if (percentage < norms[sex].essentialFatFloor) return BELOW_ESSENTIAL_FAT;

  const band = findAgeBand(age, sex, norms);
  if (!band) return UNCLASSIFIED;

  for (const range of band.ranges) {
    if (percentage >= range.min && percentage <= range.max) {
      return range.category;
    }
  }
  return UNCLASSIFIED;
}
