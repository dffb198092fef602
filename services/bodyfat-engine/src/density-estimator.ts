/**
 * Density Estimator
 *
 * Jackson & Pollock 7-site body density regression and the Siri
 * density-to-percentage conversion.
 * Pure math, no clamping: implausible totals give implausible percentages.
 */

import type { Sex } from "./types.js";

type DensityCoefficients = {
  intercept: number;
  linear: number;
  quadratic: number;
  age: number;
};

export const DENSITY_COEFFICIENTS: Record<Sex, DensityCoefficients> = {
  Male: { intercept: 1.112, linear: 0.00043499, quadratic: 0.00000055, age: 0.00028826 },
  Female: { intercept: 1.097, linear: 0.00046971, quadratic: 0.00000056, age: 0.00012828 },
};

/**
 * Body density (g/cm³) from the sum of seven skinfolds in mm.
 */
export function estimateBodyDensity(totalMm: number, ageYears: number, sex: Sex): number {
  const c = DENSITY_COEFFICIENTS[sex];
  return c.intercept - c.linear * totalMm + c.quadratic * (totalMm * totalMm) - c.age * ageYears;
}

/**
 * Siri (1961): %BF = 495 / density − 450
 */
export function siriBodyFat(bodyDensity: number): number {
  return 495 / bodyDensity - 450;
}

export function estimateBodyFat(totalMm: number, ageYears: number, sex: Sex): number {
  return siriBodyFat(estimateBodyDensity(totalMm, ageYears, sex));
}
