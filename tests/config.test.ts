/**
 * Tests for configuration resolution
 * Run: npx tsx tests/config.test.ts
 */

import { strict as assert } from 'assert';
import * as path from 'path';
import { DEFAULT_CATALOG_FILE, resolveConfig } from '../src/config.js';
import { ConfigurationError, getErrorMessage } from '../src/shared/error-handler.js';

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void) {
  try {
    fn();
    console.log(`  ✅ ${name}`);
    passed++;
  } catch (error) {
    console.log(`  ❌ ${name}`);
    console.error(`     ${getErrorMessage(error)}`);
    failed++;
  }
}

const cwd = path.resolve('/work/project');

console.log('\n🧪 Configuration\n');

test('defaults', () => {
  assert.deepEqual(resolveConfig({}, {}, cwd), {
    catalogPath: path.join(cwd, DEFAULT_CATALOG_FILE),
    logLevel: 'info',
    logJson: false,
  });
});

test('environment over defaults', () => {
  const config = resolveConfig(
    {},
    { UIDOCS_CATALOG: 'docs/types.json', UIDOCS_LOG_LEVEL: 'Debug', UIDOCS_LOG_JSON: 'true' },
    cwd
  );
  assert.deepEqual(config, {
    catalogPath: path.join(cwd, 'docs', 'types.json'),
    logLevel: 'debug',
    logJson: true,
  });
});

test('options over environment', () => {
  const config = resolveConfig(
    { catalog: '/abs/catalog.json', logLevel: 'warn', logJson: false },
    { UIDOCS_CATALOG: 'docs/types.json', UIDOCS_LOG_LEVEL: 'debug', UIDOCS_LOG_JSON: 'true' },
    cwd
  );
  assert.deepEqual(config, {
    catalogPath: path.resolve('/abs/catalog.json'),
    logLevel: 'warn',
    logJson: false,
  });
});

test('invalid log level is a configuration error', () => {
  assert.throws(
    () => resolveConfig({}, { UIDOCS_LOG_LEVEL: 'loud' }, cwd),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === 'Invalid log level: loud. Use error | warn | info | debug.' &&
      error.details?.logLevel === 'loud'
  );
});

console.log(`\n${passed} passed, ${failed} failed\n`);
if (failed > 0) process.exit(1);
