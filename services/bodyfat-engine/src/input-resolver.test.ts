import { describe, it, expect } from "vitest";
import {
  AGE_ERROR,
  parseMeasurementText,
  resolveAge,
  resolveAll,
  resolveMeasurement,
} from "./input-resolver.js";
import type { MeasurementValues, RawMeasurementText } from "./types.js";

const EMPTY_RAW: RawMeasurementText = {
  chest: "",
  abdominal: "",
  thigh: "",
  triceps: "",
  subscapular: "",
  suprailiac: "",
  midaxillary: "",
};

const ZERO: MeasurementValues = {
  chest: 0,
  abdominal: 0,
  thigh: 0,
  triceps: 0,
  subscapular: 0,
  suprailiac: 0,
  midaxillary: 0,
};

const FULL_RAW: RawMeasurementText = {
  chest: "10",
  abdominal: "15",
  thigh: "20",
  triceps: "10",
  subscapular: "15",
  suprailiac: "15",
  midaxillary: "15",
};

describe("parseMeasurementText", () => {
  it("parses integers and decimals", () => {
    expect(parseMeasurementText("12")).toBe(12);
    expect(parseMeasurementText("12.5")).toBe(12.5);
    expect(parseMeasurementText(".5")).toBe(0.5);
    expect(parseMeasurementText("5.")).toBe(5);
  });

  it("accepts sign and exponent", () => {
    expect(parseMeasurementText("-3")).toBe(-3);
    expect(parseMeasurementText("+4.5")).toBe(4.5);
    expect(parseMeasurementText("1e1")).toBe(10);
  });

  it("rejects text that is not a decimal number", () => {
    expect(parseMeasurementText("")).toBeNull();
    expect(parseMeasurementText("abc")).toBeNull();
    expect(parseMeasurementText("12mm")).toBeNull();
    expect(parseMeasurementText("0x10")).toBeNull();
    expect(parseMeasurementText("Infinity")).toBeNull();
    expect(parseMeasurementText("1e400")).toBeNull();
  });

  it("does not trim whitespace", () => {
    expect(parseMeasurementText(" 12")).toBeNull();
    expect(parseMeasurementText("12 ")).toBeNull();
  });
});

describe("resolveMeasurement", () => {
  it("prefers typed text over the stored value", () => {
    expect(resolveMeasurement("chest", "9", 12.5)).toEqual({ ok: true, value: 9 });
  });

  it("falls back to the stored value when text is empty", () => {
    expect(resolveMeasurement("chest", "", 12.5)).toEqual({ ok: true, value: 12.5 });
  });

  it("requires a value when text is empty and nothing is stored", () => {
    expect(resolveMeasurement("chest", "", 0)).toEqual({
      ok: false,
      error: "Chest measurement is required",
    });
  });

  it("does not fall back to a negative stored value", () => {
    expect(resolveMeasurement("thigh", "", -2)).toEqual({
      ok: false,
      error: "Thigh measurement is required",
    });
  });

  it("reports malformed text even when a stored value exists", () => {
    expect(resolveMeasurement("suprailiac", "abc", 12.5)).toEqual({
      ok: false,
      error: "Suprailiac measurement must be a valid number",
    });
  });

  it("accepts typed zero", () => {
    expect(resolveMeasurement("midaxillary", "0", 0)).toEqual({ ok: true, value: 0 });
  });
});

describe("resolveAge", () => {
  it("accepts the full valid range", () => {
    expect(resolveAge("1")).toEqual({ ok: true, value: 1 });
    expect(resolveAge("30")).toEqual({ ok: true, value: 30 });
    expect(resolveAge("119")).toEqual({ ok: true, value: 119 });
  });

  it("rejects out-of-range ages", () => {
    expect(resolveAge("0")).toEqual({ ok: false, error: AGE_ERROR });
    expect(resolveAge("120")).toEqual({ ok: false, error: AGE_ERROR });
    expect(resolveAge("200")).toEqual({ ok: false, error: AGE_ERROR });
  });

  it("rejects empty, fractional and negative text", () => {
    for (const raw of ["", "30.5", "-5", "abc", " 30"]) {
      expect(resolveAge(raw)).toEqual({ ok: false, error: AGE_ERROR });
    }
  });

  it("uses the fixed age message", () => {
    expect(AGE_ERROR).toBe("Age must be a valid number between 1 and 119");
  });
});

describe("resolveAll", () => {
  it("resolves all fields from typed text", () => {
    const result = resolveAll(FULL_RAW, ZERO, "30");
    expect(result).toEqual({
      ok: true,
      age: 30,
      measurements: {
        chest: 10,
        abdominal: 15,
        thigh: 20,
        triceps: 10,
        subscapular: 15,
        suprailiac: 15,
        midaxillary: 15,
      },
    });
  });

  it("mixes typed text and stored values per field", () => {
    const stored = { ...ZERO, chest: 12.5, thigh: 18 };
    const raw = { ...FULL_RAW, chest: "", thigh: "" };
    const result = resolveAll(raw, stored, "40");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.measurements.chest).toBe(12.5);
    expect(result.measurements.thigh).toBe(18);
    expect(result.measurements.abdominal).toBe(15);
  });

  it("collects every error in site order followed by age", () => {
    const result = resolveAll({ ...FULL_RAW, chest: "abc" }, ZERO, "200");
    expect(result).toEqual({
      ok: false,
      errors: ["Chest measurement must be a valid number", AGE_ERROR],
    });
  });

  it("reports all seven missing sites and the age", () => {
    const result = resolveAll(EMPTY_RAW, ZERO, "");
    expect(result).toEqual({
      ok: false,
      errors: [
        "Chest measurement is required",
        "Abdominal measurement is required",
        "Thigh measurement is required",
        "Triceps measurement is required",
        "Subscapular measurement is required",
        "Suprailiac measurement is required",
        "Midaxillary measurement is required",
        AGE_ERROR,
      ],
    });
  });
});
