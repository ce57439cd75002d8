import { CssBuilder } from '../css-builder.js';

export interface ButtonGroupMember {
  /** The member's own full-width flag, ignoring any group */
  readonly explicitFullWidth: boolean;
}

export interface ButtonGroupOptions {
  fullWidth?: boolean;
  vertical?: boolean;
  className?: string;
}

/**
 * Owns the registration set of its buttons.
 *
 * Buttons register on creation and unregister on disposal, so the set always
 * reflects the live members. Registration and iteration both happen on the
 * event loop and never interleave.
 */
export class ButtonGroup {
  fullWidth: boolean;
  vertical: boolean;
  className?: string;
  private readonly members = new Set<ButtonGroupMember>();

  constructor(options: ButtonGroupOptions = {}) {
    this.fullWidth = options.fullWidth ?? false;
    this.vertical = options.vertical ?? false;
    this.className = options.className;
  }

  /**
   * Add a member; the returned function removes it again
   */
  register(member: ButtonGroupMember): () => void {
    this.members.add(member);
    return () => this.unregister(member);
  }

  unregister(member: ButtonGroupMember): boolean {
    return this.members.delete(member);
  }

  has(member: ButtonGroupMember): boolean {
    return this.members.has(member);
  }

  get size(): number {
    return this.members.size;
  }

  noMemberIsFullWidth(): boolean {
    for (const member of this.members) {
      if (member.explicitFullWidth) {
        return false;
      }
    }
    return true;
  }

  get classes(): string {
    return new CssBuilder('ui-button-group-root')
      .addClass('ui-button-group-horizontal', !this.vertical)
      .addClass('ui-button-group-vertical', this.vertical)
      .addClass('ui-width-full', this.fullWidth)
      .addClass(this.className)
      .build();
  }
}

/**
 * A member is stretched when it asks to be, or when it sits in a full-width
 * group in which no member asks to be stretched on its own.
 */
export function resolveFullWidth(explicitFullWidth: boolean, group?: ButtonGroup): boolean {
  if (explicitFullWidth) {
    return true;
  }
  return group !== undefined && group.fullWidth && group.noMemberIsFullWidth();
}
