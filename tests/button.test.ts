/**
 * Tests for button class derivation and group registration
 * Run: npx tsx tests/button.test.ts
 */

import { strict as assert } from 'assert';
import { Button, buttonClasses, endIconClasses, startIconClasses } from '../src/components/button.js';
import { ButtonGroup, resolveFullWidth } from '../src/components/button-group.js';
import {
  configureButtonDefaults,
  getButtonDefaults,
  resetButtonDefaults,
} from '../src/components/defaults.js';
import { getErrorMessage } from '../src/shared/error-handler.js';

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
  } finally {
    resetButtonDefaults();
  }
}

// ─── Class strings ───

console.log('\n🧪 Button classes\n');

test('default state', () => {
  assert.equal(
    buttonClasses({}),
    'ui-button-root ui-button ui-button-text ui-button-text-default ui-button-text-size-medium ui-ripple'
  );
});

test('variant, color and size feed the combined classes', () => {
  assert.equal(
    buttonClasses({ variant: 'filled', color: 'primary', size: 'small' }),
    'ui-button-root ui-button ui-button-filled ui-button-filled-primary ui-button-filled-size-small ui-ripple'
  );
});

test('flags and caller classes', () => {
  assert.equal(
    buttonClasses({
      variant: 'outlined',
      color: 'error',
      size: 'large',
      fullWidth: true,
      ripple: false,
      dropShadow: false,
      className: 'my-button ui-button',
    }),
    'ui-button-root ui-button ui-button-outlined ui-button-outlined-error ui-button-outlined-size-large ui-width-full ui-button-disable-elevation my-button'
  );
});

test('state is not mutated', () => {
  const state = Object.freeze({ variant: 'filled' as const, className: 'x' });
  buttonClasses(state);
  assert.deepEqual(state, { variant: 'filled', className: 'x' });
});

test('icon size falls back to button size', () => {
  assert.equal(startIconClasses({ size: 'large' }), 'ui-button-icon-start ui-button-icon-size-large');
  assert.equal(endIconClasses({}), 'ui-button-icon-end ui-button-icon-size-medium');
});

test('icon size and icon classes', () => {
  assert.equal(
    startIconClasses({ size: 'large', iconSize: 'small', iconClassName: 'spin ui-button-icon-start' }),
    'ui-button-icon-start ui-button-icon-size-small spin'
  );
});

test('configured defaults apply to unset props', () => {
  configureButtonDefaults({ variant: 'filled', size: 'small' });
  assert.deepEqual(getButtonDefaults(), { variant: 'filled', color: 'default', size: 'small' });
  assert.equal(
    buttonClasses({ color: 'info' }),
    'ui-button-root ui-button ui-button-filled ui-button-filled-info ui-button-filled-size-small ui-ripple'
  );
});

test('defaults reset', () => {
  assert.deepEqual(getButtonDefaults(), { variant: 'text', color: 'default', size: 'medium' });
});

// ─── Full width ───

console.log('\n🧪 Full width\n');

test('explicit flag wins without a group', () => {
  assert.equal(resolveFullWidth(true), true);
  assert.equal(resolveFullWidth(false), false);
});

test('full-width group stretches members when none stretches itself', () => {
  const group = new ButtonGroup({ fullWidth: true });
  const first = new Button({}, group);
  const second = new Button({}, group);
  assert.equal(first.isFullWidth, true);
  assert.equal(second.isFullWidth, true);
  assert.ok(first.classes.includes('ui-width-full'));
});

test('an individually stretched member stops the group from stretching the others', () => {
  const group = new ButtonGroup({ fullWidth: true });
  const plain = new Button({}, group);
  const wide = new Button({ fullWidth: true }, group);
  assert.equal(plain.isFullWidth, false);
  assert.equal(wide.isFullWidth, true);
});

test('disposing the stretched member is seen on the next read', () => {
  const group = new ButtonGroup({ fullWidth: true });
  const plain = new Button({}, group);
  const wide = new Button({ fullWidth: true }, group);
  assert.equal(plain.isFullWidth, false);
  wide.dispose();
  assert.equal(group.size, 1);
  assert.equal(plain.isFullWidth, true);
});

test('state change of a sibling is seen on the next read', () => {
  const group = new ButtonGroup({ fullWidth: true });
  const plain = new Button({}, group);
  const sibling = new Button({}, group);
  assert.equal(plain.isFullWidth, true);
  sibling.setState({ fullWidth: true });
  assert.equal(plain.isFullWidth, false);
});

test('group that is not full width never stretches', () => {
  const group = new ButtonGroup();
  const button = new Button({}, group);
  assert.equal(button.isFullWidth, false);
  group.fullWidth = true;
  assert.equal(button.isFullWidth, true);
});

// ─── Registration ───

console.log('\n🧪 Group registration\n');

test('register returns an unregister function', () => {
  const group = new ButtonGroup();
  const member = { explicitFullWidth: false };
  const unregister = group.register(member);
  assert.equal(group.has(member), true);
  unregister();
  assert.equal(group.has(member), false);
  assert.equal(group.unregister(member), false);
});

test('dispose is idempotent', () => {
  const group = new ButtonGroup();
  const button = new Button({}, group);
  assert.equal(group.size, 1);
  button.dispose();
  button.dispose();
  assert.equal(group.size, 0);
  assert.equal(button.disposed, true);
});

test('group classes', () => {
  assert.equal(new ButtonGroup().classes, 'ui-button-group-root ui-button-group-horizontal');
  assert.equal(
    new ButtonGroup({ vertical: true, fullWidth: true, className: 'toolbar' }).classes,
    'ui-button-group-root ui-button-group-vertical ui-width-full toolbar'
  );
});

console.log(`\n${passed} passed, ${failed} failed\n`);
if (failed > 0) process.exit(1);
