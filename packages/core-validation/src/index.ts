import type { ZodIssue, ZodTypeAny } from 'zod';

export class ValidationError extends Error {
  public readonly issues: ZodIssue[];
  public readonly context?: string;

  constructor(message: string, issues: ZodIssue[], context?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
    this.issues = issues;
    this.context = context;
  }
}

/**
 * Builds an error from a failed parse. Lets callers raise their own error types.
 */
export type ValidationErrorFactory = (message: string, issues: ZodIssue[], context?: string) => Error;

/**
 * Render zod issues as `path: message` pairs joined by `; `.
 */
export function formatIssues(issues: readonly ZodIssue[], context?: string): string {
  const issueSummary = issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
  const message = context ? `${context}: ${issueSummary}` : issueSummary;
  return message || 'Validation failed';
}

const defaultErrorFactory: ValidationErrorFactory = (message, issues, context) =>
  new ValidationError(message, issues, context);

export function safeParseOrThrow<Schema extends ZodTypeAny>(
  schema: Schema,
  data: unknown,
  context?: string,
  createError: ValidationErrorFactory = defaultErrorFactory
): ReturnType<Schema['parse']> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw createError(formatIssues(result.error.issues, context), result.error.issues, context);
  }

  return result.data;
}
