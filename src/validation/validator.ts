import type { Static, TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { ValidationError } from './schemas.ts'

/**
 * Validation result type
 */
export type ValidationResult<T> = {
  success: true
  data: T
} | {
  success: false
  error: ValidationError
}

/**
 * Validate data against a TypeBox schema
 */
export function validate<T extends TSchema> (
  schema: T,
  data: unknown
): ValidationResult<Static<T>> {
  if (Value.Check(schema, data)) {
    return {
      success: true,
      data
    }
  }

  const errors = Array.from(Value.Errors(schema, data)).map(error => ({
    path: error.path,
    message: error.message,
    expected: typeof error.schema.type === 'string' ? error.schema.type : 'unknown',
    received: error.value
  }))

  return {
    success: false,
    error: createValidationError(`Validation failed with ${errors.length} error(s)`, errors)
  }
}

/**
 * Check if data matches a schema without detailed error information
 */
export function check<T extends TSchema> (
  schema: T,
  data: unknown
): data is Static<T> {
  return Value.Check(schema, data)
}

/**
 * Apply schema defaults to a copy of the data, then validate it.
 */
export function transform<T extends TSchema> (
  schema: T,
  data: unknown
): ValidationResult<Static<T>> {
  const copy = data === undefined ? undefined : Value.Clone(data)
  return validate(schema, Value.Default(schema, copy))
}

/**
 * Create a validation error response
 */
export function createValidationError (
  message: string,
  errors: ValidationError['errors']
): ValidationError {
  return {
    code: 'VALIDATION_ERROR',
    message,
    errors
  }
}

/**
 * Convert TypeBox validation errors to a user-friendly format
 */
export function formatValidationErrors (errors: ValidationError['errors']): string {
  return errors.map(error =>
    `${error.path || '/'}: ${error.message}`
  ).join('; ')
}
