/**
 * Body Fat Session
 *
 * Owns the single stored measurement record for one user session and runs
 * the resolve → estimate → classify pipeline. The stored record is only
 * replaced when every input resolves.
 */

import { classifyBodyFat } from "./classifier.js";
import { estimateBodyDensity, siriBodyFat } from "./density-estimator.js";
import { parseMeasurementText, resolveAll } from "./input-resolver.js";
import { MeasurementSet } from "./measurement-set.js";
import type {
  CalculationInput,
  CalculationOutcome,
  MeasurementValues,
  PersonProfile,
  SkinfoldSite,
} from "./types.js";

export class BodyFatSession {
  private measurements: MeasurementSet;

  constructor(initial: MeasurementSet = MeasurementSet.empty()) {
    this.measurements = initial.clone();
  }

  /**
   * Store a value as the user types. Text that does not parse is ignored.
   * Returns the stored value, or null when the text was ignored.
   */
  updateMeasurement(site: SkinfoldSite, rawText: string): number | null {
    const parsed = parseMeasurementText(rawText);
    if (parsed === null) return null;
    this.measurements.set(site, parsed);
    return parsed;
  }

  calculate(input: CalculationInput): CalculationOutcome {
    const baseline = this.measurements.clone();
    const resolved = resolveAll(input.measurements, baseline.toRecord(), input.age);
    if (!resolved.ok) return { ok: false, errors: resolved.errors };

    const profile: PersonProfile = { age: resolved.age, sex: input.sex };
    const used = MeasurementSet.fromRecord(resolved.measurements);
    const totalMm = used.total();
    const bodyDensity = estimateBodyDensity(totalMm, profile.age, profile.sex);
    const percentage = siriBodyFat(bodyDensity);
    const category = classifyBodyFat(profile.age, profile.sex, percentage);

    this.measurements = used;

    return {
      ok: true,
      result: { ...profile, percentage, category, totalMm, bodyDensity },
    };
  }

  snapshot(): MeasurementValues {
    return this.measurements.toRecord();
  }

  total(): number {
    return this.measurements.total();
  }

  reset(): void {
    this.measurements = MeasurementSet.empty();
  }
}
