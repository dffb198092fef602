import type { BodyFatResult } from "./types.js";

export function formatResultText(result: BodyFatResult): string {
  return `Body Fat Percentage: ${result.percentage.toFixed(2)}%`;
}

export function formatCategoryText(result: BodyFatResult): string {
  return `Category for age ${result.age} (${result.sex}): ${result.category}`;
}

export function formatErrorText(errors: string[]): string {
  return `Errors: ${errors.join(", ")}`;
}

/** Category line shown in place of a result while validation errors remain. */
export function formatErrorCategoryText(): string {
  return "Please fix the errors above";
}
