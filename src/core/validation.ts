// Input validation and sanitization utilities

import { z } from 'zod';
import { MessageError, ValidationError } from './errors.js';

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  departmentName: 100,
  description: 1000
};

const DEPARTMENT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Validates and trims a logical department name
 */
export function validateDepartmentName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Department name is required', 'name');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Department name cannot be empty', 'name');
  }

  if (trimmed.length > MAX_LENGTHS.departmentName) {
    throw new ValidationError(
      `Department name exceeds maximum length of ${MAX_LENGTHS.departmentName}`,
      'name'
    );
  }

  if (!DEPARTMENT_NAME_PATTERN.test(trimmed)) {
    throw new ValidationError(
      `Invalid department name "${trimmed}". Use letters, digits, "_" and "-"`,
      'name'
    );
  }

  return trimmed;
}

/**
 * Renders zod issues as "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parses an inbound payload, raising MessageError when it does not match
 */
export function parseMessage<S extends z.ZodTypeAny>(schema: S, messageType: string, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MessageError(
      `Malformed ${messageType} message: ${formatIssues(result.error)}`,
      messageType
    );
  }
  return result.data;
}
