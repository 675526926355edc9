// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Response } from "express";

/**
 * Positive integer path id (e.g. `/:id`). Plain decimal digits only; hex,
 * exponent and signed forms are rejected before coercion, and values past
 * Number.MAX_SAFE_INTEGER fail instead of rounding to a neighbour.
 */
export const zIntId = z
  .string()
  .regex(/^[1-9]\d*$/, "Expected a positive decimal id")
  .pipe(
    z.coerce
      .number()
      .int("Expected an integer id")
      .positive("Expected a positive id")
      .safe("Expected a safe integer id")
  );

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  // app-specific extras (optional)
  code: z.string().optional(),
  errors: z
    .array(
      z.object({ path: z.string(), code: z.string(), message: z.string() })
    )
    .optional(),
});
export type Problem = z.infer<typeof zProblem>;

export type ProblemIssue = NonNullable<Problem["errors"]>[number];

/** Flatten Zod issues into the wire shape used by `errors` on a Problem. */
export function zodIssues(error: ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

/** Strip undefined (stable wire format) */
export function clean<T extends Record<string, unknown>>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const k in obj) {
    if (Object.prototype.hasOwnProperty.call(obj, k) && obj[k] !== undefined) {
      out[k] = obj[k];
    }
  }
  return out;
}

/** Output guard: validate payload before sending */
export function respond<T extends z.ZodTypeAny>(
  res: Response,
  schema: T,
  payload: z.input<T>,
  status = 200
) {
  const out = schema.parse(payload);
  return res.status(status).json(out);
}
