/**
 * Measurement Set
 *
 * The seven Jackson & Pollock skinfold sites, in millimetres.
 * A value of 0 means the site has not been measured yet.
 */

import { skinfoldSites } from "@bodyfat/contracts";
import type { MeasurementValues, SkinfoldSite } from "./types.js";

function zeroValues(): MeasurementValues {
  return {
    chest: 0,
    abdominal: 0,
    thigh: 0,
    triceps: 0,
    subscapular: 0,
    suprailiac: 0,
    midaxillary: 0,
  };
}

export class MeasurementSet {
  private readonly values: MeasurementValues;

  private constructor(values: MeasurementValues) {
    this.values = values;
  }

  static empty(): MeasurementSet {
    return new MeasurementSet(zeroValues());
  }

  static fromRecord(record: MeasurementValues): MeasurementSet {
    return new MeasurementSet({ ...record });
  }

  get(site: SkinfoldSite): number {
    return this.values[site];
  }

  set(site: SkinfoldSite, value: number): void {
    this.values[site] = value;
  }

  /**
   * Sum of all seven sites at call time. Never cached.
   */
  total(): number {
    let sum = 0;
    for (const site of skinfoldSites) {
      sum += this.values[site];
    }
    return sum;
  }

  clone(): MeasurementSet {
    return MeasurementSet.fromRecord(this.values);
  }

  toRecord(): MeasurementValues {
    return { ...this.values };
  }
}
