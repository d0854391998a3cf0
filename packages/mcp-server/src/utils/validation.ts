/**
 * Input validation utilities for MCP tool parameters
 * Validates required parameters, types and key formats
 * Returns structured validation errors
 */

import type { ErrorResponse } from '@docfill/core';

/**
 * Validation error details
 */
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Validate that a required parameter is present and not empty
 */
export function validateRequired(
  value: unknown,
  fieldName: string
): ValidationError | null {
  if (value === undefined || value === null) {
    return {
      field: fieldName,
      message: `${fieldName} is required`,
    };
  }

  if (typeof value === 'string' && value.trim() === '') {
    return {
      field: fieldName,
      message: `${fieldName} cannot be empty`,
      value,
    };
  }

  return null;
}

/**
 * Validate that a value is a string
 */
export function validateString(
  value: unknown,
  fieldName: string,
  required: boolean = true
): ValidationError | null {
  if (!required && (value === undefined || value === null)) {
    return null;
  }

  const requiredError = validateRequired(value, fieldName);
  if (requiredError) return requiredError;

  if (typeof value !== 'string') {
    return {
      field: fieldName,
      message: `${fieldName} must be a string`,
      value,
    };
  }

  return null;
}

/**
 * Validate that a value is an object whose values are all strings
 */
export function validateStringMap(
  value: unknown,
  fieldName: string,
  required: boolean = false
): ValidationError | null {
  if (!required && (value === undefined || value === null)) {
    return null;
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {
      field: fieldName,
      message: `${fieldName} must be an object`,
      value,
    };
  }

  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      return {
        field: `${fieldName}.${key}`,
        message: `${fieldName}.${key} must be a string`,
        value: entry,
      };
    }
  }

  return null;
}

/**
 * Validate a store key naming a .docx document
 */
export function validateDocxKey(
  value: unknown,
  fieldName: string,
  required: boolean = true
): ValidationError | null {
  const stringError = validateString(value, fieldName, required);
  if (stringError || typeof value !== 'string') return stringError;

  if (!value.toLowerCase().endsWith('.docx')) {
    return {
      field: fieldName,
      message: `${fieldName} must end with .docx`,
      value,
    };
  }

  if (value.split('/').includes('..')) {
    return {
      field: fieldName,
      message: `${fieldName} cannot contain '..' segments`,
      value,
    };
  }

  return null;
}

/**
 * Narrow a value already checked by validateStringMap
 */
export function toStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) {
    return result;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Collect all validation errors from multiple validators
 */
export function collectValidationErrors(
  validators: Array<() => ValidationError | null>
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const validator of validators) {
    const error = validator();
    if (error) {
      errors.push(error);
    }
  }

  return errors;
}

/**
 * Create a validation error response
 */
export function createValidationErrorResponse(
  errors: ValidationError[]
): ErrorResponse {
  const firstError = errors[0];

  return {
    error: 'VALIDATION_ERROR',
    message: errors.length === 1
      ? firstError.message
      : `${errors.length} validation errors found`,
    context: {
      errors: errors.map(e => ({
        field: e.field,
        message: e.message,
        value: e.value,
      })),
    },
    suggestions: [
      'Check the input parameters match the expected types and formats',
      'Refer to the tool documentation for parameter requirements',
    ],
  };
}
