/**
 * Contextual validation for record props.
 *
 * Wraps Zod parsing so a failure names the entity kind and operation
 * that produced it.
 *
 * @example
 * ```typescript
 * const props = validateProps(schema, input, {
 *   kind: "Post",
 *   operation: "create",
 * });
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

// ============================================================
// Types
// ============================================================

export type ValidationContext = Readonly<{
  kind: string;
  operation: "create" | "update";
  /** Record ID (for updates) */
  id?: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function buildLocationString(context: ValidationContext): string {
  if (context.id) {
    return `${context.kind}/${context.id}`;
  }
  return `new ${context.kind}`;
}

/**
 * Wraps a Zod error with the kind and operation that raised it.
 */
export function wrapZodError(
  error: ZodError,
  context: ValidationContext,
): ValidationError {
  const issues = zodIssuesToValidationIssues(error);
  const location = buildLocationString(context);

  return new ValidationError(
    `Invalid props for ${location}: ${error.message}`,
    {
      kind: context.kind,
      operation: context.operation,
      ...(context.id !== undefined && { id: context.id }),
      issues,
    },
    { cause: error },
  );
}

/**
 * Validates props against a record schema.
 *
 * @throws ValidationError with full context if validation fails
 */
export function validateProps<T>(
  schema: ZodType<T>,
  props: unknown,
  context: ValidationContext,
): T {
  const result = schema.safeParse(props);

  if (result.success) {
    return result.data;
  }

  throw wrapZodError(result.error, context);
}
