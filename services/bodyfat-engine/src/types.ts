import type { BodyFatCategory, Sex, SkinfoldSite } from "@bodyfat/contracts";

export type { BodyFatCategory, Sex, SkinfoldSite };

export type MeasurementValues = Record<SkinfoldSite, number>;

/** Raw text per site as typed by the user; "" means nothing was typed. */
export type RawMeasurementText = Record<SkinfoldSite, string>;

export type Resolution<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type PersonProfile = {
  age: number;
  sex: Sex;
};

export type BodyFatResult = PersonProfile & {
  percentage: number;
  category: BodyFatCategory;
  /** Sum of the seven skinfolds in mm */
  totalMm: number;
  bodyDensity: number;
};

export type CalculationInput = {
  measurements: RawMeasurementText;
  age: string;
  sex: Sex;
};

export type CalculationOutcome =
  | { ok: true; result: BodyFatResult }
  | { ok: false; errors: string[] };
