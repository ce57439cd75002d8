/**
 * Validation Utilities Tests
 */

import {
  isString,
  isBoolean,
  isObject,
  isArray,
  notEmpty,
  oneOf,
  validate,
  validateOrThrow,
  assertObject,
  optionalArray,
  optionalString,
} from '../src/shared/validation.js';
import { ValidationError, getErrorMessage } from '../src/shared/error-handler.js';

console.log('🧪 Running Validation Utilities Tests...\n');

let passed = 0;
let failed = 0;

function assert(condition: boolean, message: string) {
  if (condition) {
    console.log(`✅ ${message}`);
    passed++;
  } else {
    console.error(`❌ ${message}`);
    failed++;
  }
}

function thrownMessage(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ValidationError ? error.message : `unexpected: ${getErrorMessage(error)}`;
  }
  return undefined;
}

// Type guards
assert(isString('x') && !isString(1), 'isString');
assert(isBoolean(false) && !isBoolean('false'), 'isBoolean');
assert(isObject({}) && !isObject([]) && !isObject(null), 'isObject rejects arrays and null');
assert(isArray([]) && !isArray({}), 'isArray');

// Validators
const variants = ['text', 'filled', 'outlined'] as const;
assert(validate('text', [oneOf<string>('variant', variants)]).valid, 'oneOf accepts a listed value');
assert(
  validate('flat', [oneOf<string>('variant', variants)]).errors[0] === 'variant must be one of: text, filled, outlined',
  'oneOf lists allowed values'
);
assert(!validate('   ', [notEmpty('class')]).valid, 'notEmpty rejects whitespace');
assert(
  thrownMessage(() => validateOrThrow<string>('', [notEmpty('name'), oneOf<string>('name', ['a'])])) ===
    'name cannot be empty; name must be one of: a',
  'validateOrThrow joins all errors'
);

// Assertions and optional readers
assert(
  thrownMessage(() => {
    assertObject([], 'entry');
  }) === 'entry must be an object, got array',
  'assertObject names the received type'
);

const source: Record<string, unknown> = { summary: 'Hi', nothing: null, links: 'Button', count: 3 };
assert(optionalString(source, 'summary', 'entry') === 'Hi', 'optionalString reads strings');
assert(optionalString(source, 'nothing', 'entry') === undefined, 'optionalString treats null as absent');
assert(
  thrownMessage(() => optionalString(source, 'count', 'entry')) === 'entry.count must be a string, got number',
  'optionalString reports the field path'
);
assert(optionalArray(source, 'missing', 'entry').length === 0, 'optionalArray defaults to empty');
assert(
  thrownMessage(() => optionalArray(source, 'links', 'entry')) === 'entry.links must be an array, got string',
  'optionalArray reports the field path'
);

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
