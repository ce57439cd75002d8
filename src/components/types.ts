export const VARIANTS = ['text', 'filled', 'outlined'] as const;
export type Variant = (typeof VARIANTS)[number];

export const COLORS = [
  'default',
  'primary',
  'secondary',
  'tertiary',
  'info',
  'success',
  'warning',
  'error',
  'dark',
  'transparent',
  'inherit',
  'surface',
] as const;
export type Color = (typeof COLORS)[number];

export const SIZES = ['small', 'medium', 'large'] as const;
export type Size = (typeof SIZES)[number];

/**
 * Props a button derives its classes from. Read-only input: class
 * composition never writes back to it.
 */
export interface ButtonState {
  readonly variant?: Variant;
  readonly color?: Color;
  readonly size?: Size;
  /** Expands the button to the full width of its container */
  readonly fullWidth?: boolean;
  readonly ripple?: boolean;
  readonly dropShadow?: boolean;
  /** Caller-supplied classes appended after the computed ones */
  readonly className?: string;
  /** Falls back to `size` when unset */
  readonly iconSize?: Size;
  readonly iconClassName?: string;
}
