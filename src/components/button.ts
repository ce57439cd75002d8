import { CssBuilder } from '../css-builder.js';
import { getButtonDefaults } from './defaults.js';
import { resolveFullWidth, type ButtonGroup, type ButtonGroupMember } from './button-group.js';
import type { ButtonState, Size } from './types.js';

/**
 * Class string for the button element itself
 */
export function buttonClasses(state: ButtonState, fullWidth: boolean = state.fullWidth ?? false): string {
  const defaults = getButtonDefaults();
  const variant = state.variant ?? defaults.variant;
  const color = state.color ?? defaults.color;
  const size = state.size ?? defaults.size;

  return new CssBuilder('ui-button-root ui-button')
    .addClass(`ui-button-${variant}`)
    .addClass(`ui-button-${variant}-${color}`)
    .addClass(`ui-button-${variant}-size-${size}`)
    .addClass('ui-width-full', fullWidth)
    .addClass('ui-ripple', state.ripple ?? true)
    .addClass('ui-button-disable-elevation', state.dropShadow === false)
    .addClass(state.className)
    .build();
}

export function startIconClasses(state: ButtonState): string {
  return iconClasses('ui-button-icon-start', state);
}

export function endIconClasses(state: ButtonState): string {
  return iconClasses('ui-button-icon-end', state);
}

function iconClasses(base: string, state: ButtonState): string {
  const size: Size = state.iconSize ?? state.size ?? getButtonDefaults().size;
  return new CssBuilder(base)
    .addClass(`ui-button-icon-size-${size}`)
    .addClass(state.iconClassName)
    .build();
}

/**
 * A button bound to an optional owning group.
 *
 * The group is passed in explicitly; the button registers with it on
 * construction and unregisters on {@link dispose}. Class getters recompute on
 * every read because the group's membership may change between reads.
 */
export class Button implements ButtonGroupMember {
  private currentState: ButtonState;
  private detach?: () => void;
  private isDisposed = false;

  constructor(
    state: ButtonState = {},
    private readonly group?: ButtonGroup
  ) {
    this.currentState = state;
    this.detach = group?.register(this);
  }

  get state(): ButtonState {
    return this.currentState;
  }

  setState(state: ButtonState): void {
    this.currentState = state;
  }

  get explicitFullWidth(): boolean {
    return this.currentState.fullWidth ?? false;
  }

  get isFullWidth(): boolean {
    return resolveFullWidth(this.explicitFullWidth, this.group);
  }

  get classes(): string {
    return buttonClasses(this.currentState, this.isFullWidth);
  }

  get startIconClasses(): string {
    return startIconClasses(this.currentState);
  }

  get endIconClasses(): string {
    return endIconClasses(this.currentState);
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  dispose(): void {
    this.detach?.();
    this.detach = undefined;
    this.isDisposed = true;
  }
}
