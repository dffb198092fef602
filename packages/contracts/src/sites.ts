export const skinfoldSites = [
  "chest",
  "abdominal",
  "thigh",
  "triceps",
  "subscapular",
  "suprailiac",
  "midaxillary"
] as const;

export type SkinfoldSite = (typeof skinfoldSites)[number];

export const SKINFOLD_SITE_LABELS: Record<SkinfoldSite, string> = {
  chest: "Chest",
  abdominal: "Abdominal",
  thigh: "Thigh",
  triceps: "Triceps",
  subscapular: "Subscapular",
  suprailiac: "Suprailiac",
  midaxillary: "Midaxillary"
};

export const sexes = ["Male", "Female"] as const;

export type Sex = (typeof sexes)[number];

export const bodyFatCategories = [
  "Extremely Lean (Below Essential Fat)",
  "Excellent",
  "Good",
  "Average",
  "Below Average",
  "Poor",
  "Unclassified"
] as const;

export type BodyFatCategory = (typeof bodyFatCategories)[number];

/** Categories a normative sub-range can carry, in table order. */
export const NORM_CATEGORIES = ["Excellent", "Good", "Average", "Below Average", "Poor"] as const;

export type NormCategory = (typeof NORM_CATEGORIES)[number];

export function isSkinfoldSite(value: string): value is SkinfoldSite {
  return (skinfoldSites as readonly string[]).includes(value);
}
