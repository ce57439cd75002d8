import type { Color, Size, Variant } from './types.js';

export interface ButtonDefaults {
  variant: Variant;
  color: Color;
  size: Size;
}

const INITIAL_BUTTON_DEFAULTS: Readonly<ButtonDefaults> = Object.freeze({
  variant: 'text',
  color: 'default',
  size: 'medium',
});

let buttonDefaults: Readonly<ButtonDefaults> = INITIAL_BUTTON_DEFAULTS;

/**
 * Process-wide defaults used when a button leaves variant, color or size unset
 */
export function getButtonDefaults(): Readonly<ButtonDefaults> {
  return buttonDefaults;
}

export function configureButtonDefaults(overrides: Partial<ButtonDefaults>): Readonly<ButtonDefaults> {
  buttonDefaults = Object.freeze({ ...buttonDefaults, ...overrides });
  return buttonDefaults;
}

export function resetButtonDefaults(): void {
  buttonDefaults = INITIAL_BUTTON_DEFAULTS;
}
