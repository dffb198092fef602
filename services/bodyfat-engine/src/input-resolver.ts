/**
 * Input Resolver
 *
 * Reconciles freshly typed text against the values already stored in the
 * session. Typed text wins; an empty field falls back to the stored value.
 * Every field is resolved independently so all problems surface together.
 */

import { SKINFOLD_SITE_LABELS, skinfoldSites } from "@bodyfat/contracts";
import type { MeasurementValues, RawMeasurementText, Resolution, SkinfoldSite } from "./types.js";

export const MIN_AGE = 1;
export const MAX_AGE = 119;

export const AGE_ERROR = `Age must be a valid number between ${MIN_AGE} and ${MAX_AGE}`;

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const UNSIGNED_INT_PATTERN = /^\+?\d+$/;

/**
 * Parse a skinfold reading. No whitespace trimming; returns null for anything
 * that is not a finite decimal number.
 */
export function parseMeasurementText(rawText: string): number | null {
  if (!DECIMAL_PATTERN.test(rawText)) return null;
  const value = Number(rawText);
  return Number.isFinite(value) ? value : null;
}

export function measurementInvalidMessage(site: SkinfoldSite): string {
  return `${SKINFOLD_SITE_LABELS[site]} measurement must be a valid number`;
}

export function measurementRequiredMessage(site: SkinfoldSite): string {
  return `${SKINFOLD_SITE_LABELS[site]} measurement is required`;
}

export function resolveMeasurement(
  site: SkinfoldSite,
  rawText: string,
  storedValue: number,
): Resolution<number> {
  if (rawText.length > 0) {
    const parsed = parseMeasurementText(rawText);
    if (parsed === null) return { ok: false, error: measurementInvalidMessage(site) };
    return { ok: true, value: parsed };
  }
  if (storedValue > 0) return { ok: true, value: storedValue };
  return { ok: false, error: measurementRequiredMessage(site) };
}

/**
 * Age has no stored fallback: empty, non-integer and out-of-range text all
 * produce the same message.
 */
export function resolveAge(rawText: string): Resolution<number> {
  if (!UNSIGNED_INT_PATTERN.test(rawText)) return { ok: false, error: AGE_ERROR };
  const age = Number(rawText);
  if (!Number.isSafeInteger(age) || age < MIN_AGE || age > MAX_AGE) {
    return { ok: false, error: AGE_ERROR };
  }
  return { ok: true, value: age };
}

export type ResolvedInputs =
  | { ok: true; measurements: MeasurementValues; age: number }
  | { ok: false; errors: string[] };

/**
 * Resolve the seven sites (in declared order) and then age, collecting every
 * error rather than stopping at the first.
 */
export function resolveAll(
  raw: RawMeasurementText,
  stored: MeasurementValues,
  rawAge: string,
): ResolvedInputs {
  const errors: string[] = [];
  const measurements: MeasurementValues = {
    chest: 0,
    abdominal: 0,
    thigh: 0,
    triceps: 0,
    subscapular: 0,
    suprailiac: 0,
    midaxillary: 0,
  };

  for (const site of skinfoldSites) {
    const resolution = resolveMeasurement(site, raw[site], stored[site]);
    if (resolution.ok) {
      measurements[site] = resolution.value;
    } else {
      errors.push(resolution.error);
    }
  }

  const age = resolveAge(rawAge);
  if (!age.ok) errors.push(age.error);

  if (errors.length > 0 || !age.ok) return { ok: false, errors };
  return { ok: true, measurements, age: age.value };
}
