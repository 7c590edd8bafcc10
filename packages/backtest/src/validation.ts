/**
 * Schema validation helpers
 *
 * Every zod failure in this package surfaces as an InvalidParameterError that
 * names the offending parameter.
 */

import type { z } from 'zod';
import { InvalidParameterError } from '@tradelab/core';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function issueParameter(issue: z.ZodIssue): string | undefined {
  if (issue.code === 'unrecognized_keys') {
    return issue.keys[0];
  }
  const head = issue.path[0];
  return head === undefined ? undefined : String(head);
}

/**
 * Convert the first zod issue into an InvalidParameterError
 */
export function toInvalidParameterError(
  error: z.ZodError,
  subject: string,
  input: unknown,
  context: Record<string, unknown> = {}
): InvalidParameterError {
  const issue = error.issues[0];
  if (!issue) {
    return new InvalidParameterError(`${subject}: ${error.message}`, undefined, context);
  }

  const parameter = issueParameter(issue);
  const value = parameter !== undefined && isRecord(input) ? input[parameter] : undefined;
  const label = parameter !== undefined ? `'${parameter}' ` : '';

  return new InvalidParameterError(`${subject}: ${label}${issue.message}`, parameter, {
    ...context,
    ...(value !== undefined ? { value } : {}),
  });
}

/**
 * Parse input with a schema, throwing InvalidParameterError on failure
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  subject: string,
  context: Record<string, unknown> = {}
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw toInvalidParameterError(parsed.error, subject, input, context);
  }
  return parsed.data;
}
