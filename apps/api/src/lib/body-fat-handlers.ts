import {
  calculateBodySchema,
  isSkinfoldSite,
  skinfoldSites,
  updateMeasurementBodySchema,
  type CalculateResponse,
  type MeasurementsResponse,
} from "@bodyfat/contracts";
import {
  formatCategoryText,
  formatErrorCategoryText,
  formatErrorText,
  formatResultText,
  type BodyFatSession,
  type RawMeasurementText,
} from "@bodyfat/engine";
import { ErrorCode, errorBody, type ErrorBody } from "./api-error.js";

export type HandlerResult<T> =
  | { status: 200; body: T }
  | { status: 204 }
  | { status: 400 | 404 | 422; body: ErrorBody };

export function getMeasurements(session: BodyFatSession): HandlerResult<MeasurementsResponse> {
  return {
    status: 200,
    body: { measurements: session.snapshot(), totalMm: session.total() },
  };
}

/**
 * Best-effort update while the user is typing. Unparseable values are
 * accepted and ignored; only an unknown site or a malformed body is an error.
 */
export function updateMeasurement(
  session: BodyFatSession,
  site: string,
  rawBody: unknown,
): HandlerResult<never> {
  if (!isSkinfoldSite(site)) {
    return { status: 404, body: errorBody("Measurement site not found", ErrorCode.NOT_FOUND) };
  }
  const parsed = updateMeasurementBodySchema.safeParse(rawBody);
  if (!parsed.success) {
    return {
      status: 400,
      body: errorBody("Invalid measurement body", ErrorCode.BAD_REQUEST, { issues: parsed.error.issues }),
    };
  }

  const stored = session.updateMeasurement(site, parsed.data.value);
  if (stored !== null) {
    console.log(`Updated ${site} measurement: ${stored}`);
  }
  return { status: 204 };
}

export function resetMeasurements(session: BodyFatSession): HandlerResult<never> {
  session.reset();
  return { status: 204 };
}

export function calculateBodyFat(session: BodyFatSession, rawBody: unknown): HandlerResult<CalculateResponse> {
  const parsed = calculateBodySchema.safeParse(rawBody);
  if (!parsed.success) {
    return {
      status: 400,
      body: errorBody("Invalid calculation body", ErrorCode.BAD_REQUEST, { issues: parsed.error.issues }),
    };
  }

  const { measurements, age, sex } = parsed.data;
  const raw: RawMeasurementText = {
    chest: "",
    abdominal: "",
    thigh: "",
    triceps: "",
    subscapular: "",
    suprailiac: "",
    midaxillary: "",
  };
  for (const site of skinfoldSites) {
    raw[site] = measurements[site] ?? "";
  }

  const outcome = session.calculate({ measurements: raw, age, sex });
  if (!outcome.ok) {
    return {
      status: 422,
      body: errorBody(formatErrorText(outcome.errors), ErrorCode.VALIDATION_FAILED, {
        errors: outcome.errors,
        categoryText: formatErrorCategoryText(),
      }),
    };
  }

  return {
    status: 200,
    body: {
      result: outcome.result,
      resultText: formatResultText(outcome.result),
      categoryText: formatCategoryText(outcome.result),
    },
  };
}
