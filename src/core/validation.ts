/**
 * Validation Utility
 *
 * Runs a zod schema and converts failures into ValidationError.
 */

import { z } from "zod";
import { ValidationError } from "./app-error";
import { logger } from "../utils/logger";

/**
 * Render zod issues as "path: message"
 */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate data against a schema
 *
 * @param context - Name of what is being validated, for error reporting
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 *
 * @example
 * ```typescript
 * const options = validateInput(conversionOptionsSchema, raw, "conversion options");
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    logger.warn(`Validation failed: ${context}`, { issues });
    throw new ValidationError(`Invalid ${context}: ${issues.join(", ")}`, issues, result.error);
  }

  return result.data;
}

