import { z } from "zod";
import { NORM_CATEGORIES, bodyFatCategories, sexes, skinfoldSites } from "./sites.js";

export const skinfoldSiteSchema = z.enum(skinfoldSites);

export const sexSchema = z.enum(sexes);

export const bodyFatCategorySchema = z.enum(bodyFatCategories);

export const measurementRecordSchema = z.object({
  chest: z.number(),
  abdominal: z.number(),
  thigh: z.number(),
  triceps: z.number(),
  subscapular: z.number(),
  suprailiac: z.number(),
  midaxillary: z.number()
});

export const rawMeasurementsSchema = z
  .object({
    chest: z.string(),
    abdominal: z.string(),
    thigh: z.string(),
    triceps: z.string(),
    subscapular: z.string(),
    suprailiac: z.string(),
    midaxillary: z.string()
  })
  .partial()
  .strict();

// ============================================================================
// Request bodies
// ============================================================================

export const updateMeasurementBodySchema = z.object({
  value: z.string()
});

export const calculateBodySchema = z.object({
  measurements: rawMeasurementsSchema.default({}),
  age: z.string(),
  sex: sexSchema
});

// ============================================================================
// Responses
// ============================================================================

export const bodyFatResultSchema = z.object({
  percentage: z.number(),
  category: bodyFatCategorySchema,
  totalMm: z.number(),
  bodyDensity: z.number(),
  age: z.number().int().min(1).max(119),
  sex: sexSchema
});

export const calculateResponseSchema = z.object({
  result: bodyFatResultSchema,
  resultText: z.string(),
  categoryText: z.string()
});

export const measurementsResponseSchema = z.object({
  measurements: measurementRecordSchema,
  totalMm: z.number()
});

// ============================================================================
// Normative tables
// ============================================================================

export const normRangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
    category: z.enum(NORM_CATEGORIES)
  })
  .refine((range) => range.min <= range.max, { message: "range min must not exceed max" });

export const ageBandSchema = z
  .object({
    minAge: z.number().int().positive(),
    maxAge: z.number().int().positive(),
    ranges: z.array(normRangeSchema).length(NORM_CATEGORIES.length)
  })
  .refine((band) => band.minAge <= band.maxAge, { message: "band minAge must not exceed maxAge" });

export const sexNormsSchema = z.object({
  essentialFatFloor: z.number(),
  bands: z.array(ageBandSchema).min(1)
});

export const bodyFatNormsSchema = z.object({
  Male: sexNormsSchema,
  Female: sexNormsSchema
});

export type MeasurementRecord = z.infer<typeof measurementRecordSchema>;
export type RawMeasurements = z.infer<typeof rawMeasurementsSchema>;
export type UpdateMeasurementBody = z.infer<typeof updateMeasurementBodySchema>;
export type CalculateBody = z.infer<typeof calculateBodySchema>;
export type BodyFatResultDto = z.infer<typeof bodyFatResultSchema>;
export type CalculateResponse = z.infer<typeof calculateResponseSchema>;
export type MeasurementsResponse = z.infer<typeof measurementsResponseSchema>;
export type NormRange = z.infer<typeof normRangeSchema>;
export type AgeBand = z.infer<typeof ageBandSchema>;
export type SexNorms = z.infer<typeof sexNormsSchema>;
export type BodyFatNorms = z.infer<typeof bodyFatNormsSchema>;
