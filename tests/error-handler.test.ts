/**
 * Tests for error handling utilities
 */

import {
  UiDocsError,
  ValidationError,
  FileSystemError,
  ConfigurationError,
  getErrorMessage,
  isNodeError,
  formatErrorMessage,
  wrapError,
  tryAsync,
} from '../src/shared/error-handler.js';

function test(name: string, fn: () => void | Promise<void>) {
  return async () => {
    try {
      await fn();
      console.log(`✅ ${name}`);
      return true;
    } catch (error) {
      console.log(`❌ ${name}`);
      console.error(`   ${getErrorMessage(error)}`);
      return false;
    }
  };
}

function assert(condition: boolean, message: string) {
  if (!condition) {
    throw new Error(message);
  }
}

function nodeError(message: string, code: string, path?: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code, path });
}

async function runTests() {
  console.log('🧪 Running Error Handler Tests...\n');

  const tests = [
    test('UiDocsError creates with all properties', () => {
      const err = new UiDocsError('test message', 'TEST_CODE', { key: 'value' }, 'try this');
      assert(err.message === 'test message', 'message mismatch');
      assert(err.code === 'TEST_CODE', 'code mismatch');
      assert(err.details?.key === 'value', 'details mismatch');
      assert(err.suggestion === 'try this', 'suggestion mismatch');
      assert(err.name === 'UiDocsError', 'name mismatch');
    }),

    test('subclasses carry their codes', () => {
      const validation = new ValidationError('invalid input');
      const fileSystem = new FileSystemError('missing');
      const configuration = new ConfigurationError('bad level');
      assert(validation instanceof UiDocsError, 'not a UiDocsError');
      assert(validation.code === 'VALIDATION_ERROR', 'wrong validation code');
      assert(fileSystem.code === 'FILE_SYSTEM_ERROR', 'wrong file system code');
      assert(configuration.code === 'CONFIGURATION_ERROR', 'wrong configuration code');
      assert(configuration.name === 'ConfigurationError', 'wrong name');
    }),

    test('getErrorMessage handles non-Error values', () => {
      assert(getErrorMessage(new Error('boom')) === 'boom', 'Error');
      assert(getErrorMessage('plain') === 'plain', 'string');
      assert(getErrorMessage({ message: 'shaped' }) === 'shaped', 'object with message');
      assert(getErrorMessage(42) === 'Unknown error', 'number');
    }),

    test('isNodeError checks the code property', () => {
      const err = nodeError('gone', 'ENOENT');
      assert(isNodeError(err), 'should be a node error');
      assert(!isNodeError({ code: 'ENOENT' }), 'plain object is not a node error');
      assert(!isNodeError(new Error('plain')), 'plain Error is not a node error');
    }),

    test('formatErrorMessage adds context and suggestion', () => {
      const err = new ValidationError('bad value', undefined, 'fix it');
      assert(
        formatErrorMessage(err, { context: 'Parsing' }) === 'Parsing: bad value\nSuggestion: fix it',
        'formatted message mismatch'
      );
    }),

    test('wrapError maps ENOENT to a file-not-found error', () => {
      const wrapped = wrapError(nodeError('gone', 'ENOENT', '/tmp/x.json'), 'Reading manifest');
      assert(wrapped instanceof FileSystemError, 'should be FileSystemError');
      assert(wrapped.message === 'File not found: /tmp/x.json (Reading manifest)', wrapped.message);
      assert(wrapped.details?.path === '/tmp/x.json', 'path detail');
      assert(wrapped.suggestion?.includes('--catalog') === true, 'catalog suggestion');
    }),

    test('wrapError maps EACCES to permission denied', () => {
      const wrapped = wrapError(nodeError('denied', 'EACCES', '/tmp/x.json'));
      assert(wrapped.message === 'Permission denied: /tmp/x.json', wrapped.message);
    }),

    test('wrapError keeps UiDocsError instances', () => {
      const original = new ValidationError('kept');
      assert(wrapError(original, 'ctx') === original, 'should return same instance');
    }),

    test('wrapError wraps unknown errors', () => {
      const wrapped = wrapError(new Error('weird'), 'Step');
      assert(wrapped.code === 'UNKNOWN_ERROR', 'code');
      assert(wrapped.message === 'Step: weird', wrapped.message);
    }),

    test('tryAsync returns the value or wraps the failure', async () => {
      assert((await tryAsync(async () => 7)) === 7, 'value');
      try {
        await tryAsync(async () => {
          throw new Error('async boom');
        }, 'Loading');
        assert(false, 'should have thrown');
      } catch (error) {
        assert(error instanceof UiDocsError, 'should be wrapped');
        assert(getErrorMessage(error) === 'Loading: async boom', getErrorMessage(error));
      }
    }),
  ];

  let passed = 0;
  let failed = 0;
  for (const run of tests) {
    if (await run()) {
      passed++;
    } else {
      failed++;
    }
  }

  console.log(`\n${passed} passed, ${failed} failed`);
  if (failed > 0) {
    process.exit(1);
  }
}

runTests().catch((error) => {
  console.error(error);
  process.exit(1);
});
