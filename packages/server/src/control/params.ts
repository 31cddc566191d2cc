/**
 * Query-string schemas for the control endpoints.
 */

import { toValidationIssues, ValidationError } from "@countdown/errors";
import { z } from "zod";

const IntegerParam = z
  .string({ required_error: "is required" })
  .trim()
  .regex(/^[+-]?\d+$/, "must be an integer")
  .transform(Number)
  .refine(Number.isSafeInteger, "is out of range");

export const AdjustParamsSchema = z.object({
  /** Signed whole seconds to add */
  delta: IntegerParam,
});

export const SetParamsSchema = z.object({
  /** New remaining time, whole seconds */
  seconds: IntegerParam.refine((value) => value >= 0, "must not be negative"),
});

export type AdjustParams = z.infer<typeof AdjustParamsSchema>;
export type SetParams = z.infer<typeof SetParamsSchema>;

/**
 * Validate query parameters, throwing a 400-class ValidationError that
 * lists every bad field.
 */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: URLSearchParams): T {
  const result = schema.safeParse(Object.fromEntries(query));
  if (!result.success) {
    const issues = toValidationIssues(result.error, "query");
    throw new ValidationError(
      `Invalid query parameters: ${issues.map((i) => `${i.field} ${i.message}`).join("; ")}`,
      issues,
    );
  }
  return result.data;
}
