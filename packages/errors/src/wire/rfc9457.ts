/**
 * RFC 9457 Problem Details for HTTP APIs
 * https://www.rfc-editor.org/rfc/rfc9457.html
 *
 * Wire format for control API error responses
 */

import { z } from "zod";
import type { ValidationIssue } from "../types.js";

/** Media type for problem detail bodies */
export const PROBLEM_CONTENT_TYPE = "application/problem+json";

/**
 * Problem detail body. `type`, `title`, `status`, `detail` and `instance` are
 * the RFC members; the rest are extensions filled from `CountdownError`.
 */
export interface ProblemDetails {
  /** `/errors/<CODE>` */
  type: string;
  title: string;
  status: number;
  detail?: string;
  /** Request path the problem was raised for */
  instance?: string;
  code?: string;
  traceId?: string;
  /** ISO 8601 */
  timestamp?: string;
  domain?: string;
  metadata?: Record<string, string>;
  /** Field-level issues of a 400 response */
  errors?: ValidationIssue[];
}

export const ValidationIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
  value: z.unknown().optional(),
});

export const ProblemDetailsSchema = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int().min(100).max(599),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
  traceId: z.string().optional(),
  timestamp: z.string().datetime().optional(),
  domain: z.string().optional(),
  metadata: z.record(z.string()).optional(),
  errors: z.array(ValidationIssueSchema).optional(),
});
