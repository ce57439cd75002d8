/**
 * Input validation utilities
 * Type guards and assertions used when reading descriptor manifests and CLI input
 */

import { ValidationError } from './error-handler.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type Validator<T> = (value: T) => ValidationResult;

function createResult(valid: boolean, errors: string[] = []): ValidationResult {
  return { valid, errors };
}

export function combineResults(...results: ValidationResult[]): ValidationResult {
  const allErrors = results.flatMap((r) => r.errors);
  return createResult(allErrors.length === 0, allErrors);
}

// ══════════════════════════════════════════════════════════════════════════════
// TYPE GUARDS
// ══════════════════════════════════════════════════════════════════════════════

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

// ══════════════════════════════════════════════════════════════════════════════
// VALIDATORS
// ══════════════════════════════════════════════════════════════════════════════

export function notEmpty(fieldName: string): Validator<string> {
  return (value: string) => {
    if (!value || value.trim().length === 0) {
      return createResult(false, [`${fieldName} cannot be empty`]);
    }
    return createResult(true);
  };
}

export function oneOf<T>(fieldName: string, allowed: readonly T[]): Validator<T> {
  return (value: T) => {
    if (!allowed.includes(value)) {
      return createResult(false, [`${fieldName} must be one of: ${allowed.join(', ')}`]);
    }
    return createResult(true);
  };
}

export function validate<T>(value: T, validators: Validator<T>[]): ValidationResult {
  return combineResults(...validators.map((validator) => validator(value)));
}

export function validateOrThrow<T>(value: T, validators: Validator<T>[], context?: string): void {
  const result = validate(value, validators);

  if (!result.valid) {
    throw new ValidationError(
      result.errors.join('; '),
      { value, context },
      'Check input values and try again'
    );
  }
}

// ══════════════════════════════════════════════════════════════════════════════
// ASSERTIONS
// ══════════════════════════════════════════════════════════════════════════════

export function assertString(value: unknown, fieldName: string): asserts value is string {
  if (!isString(value)) {
    throw new ValidationError(
      `${fieldName} must be a string, got ${describeType(value)}`,
      { field: fieldName },
      'Provide a string value'
    );
  }
}

export function assertObject(
  value: unknown,
  fieldName: string
): asserts value is Record<string, unknown> {
  if (!isObject(value)) {
    throw new ValidationError(
      `${fieldName} must be an object, got ${describeType(value)}`,
      { field: fieldName },
      'Provide an object value'
    );
  }
}

export function assertArray(value: unknown, fieldName: string): asserts value is unknown[] {
  if (!isArray(value)) {
    throw new ValidationError(
      `${fieldName} must be an array, got ${describeType(value)}`,
      { field: fieldName },
      'Provide an array value'
    );
  }
}

/**
 * Read an optional string property; absent and null both yield undefined
 */
export function optionalString(
  source: Record<string, unknown>,
  key: string,
  fieldName: string
): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  assertString(value, `${fieldName}.${key}`);
  return value;
}

/**
 * Read an optional array property; absent and null both yield an empty array
 */
export function optionalArray(
  source: Record<string, unknown>,
  key: string,
  fieldName: string
): unknown[] {
  const value = source[key];
  if (value === undefined || value === null) {
    return [];
  }
  assertArray(value, `${fieldName}.${key}`);
  return value;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
