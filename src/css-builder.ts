import { clsx, type ClassValue } from 'clsx';

export interface ClassFragment {
  /** Defaults to true */
  condition?: boolean;
  value: string | null | undefined;
}

/**
 * Compose an ordered list of conditional fragments into one class string.
 *
 * A fragment contributes only when its condition holds and its value is not
 * blank. Values are split on whitespace and each token is emitted once, at the
 * position of its first occurrence.
 */
export function composeClasses(fragments: Iterable<ClassFragment>): string {
  const seen = new Set<string>();

  for (const fragment of fragments) {
    if (fragment.condition === false || !fragment.value) {
      continue;
    }
    for (const token of fragment.value.split(/\s+/)) {
      if (token) {
        seen.add(token);
      }
    }
  }

  // Set iteration order is insertion order
  return Array.from(seen).join(' ');
}

/**
 * Fluent builder over {@link composeClasses}.
 *
 * ```ts
 * new CssBuilder('ui-button-root')
 *   .addClass(`ui-button-${variant}`)
 *   .addClass('ui-ripple', ripple)
 *   .addClass(userClass)
 *   .build();
 * ```
 *
 * Values may also be clsx inputs (object maps, arrays), which are flattened
 * before tokenizing.
 */
export class CssBuilder {
  private readonly fragments: ClassFragment[] = [];

  constructor(base?: ClassValue) {
    if (base !== undefined) {
      this.addClass(base);
    }
  }

  addClass(value: ClassValue, when: boolean = true): this {
    this.fragments.push({ condition: when, value: toClassString(value) });
    return this;
  }

  addClasses(fragments: Iterable<ClassFragment>): this {
    for (const fragment of fragments) {
      this.fragments.push({ condition: fragment.condition ?? true, value: fragment.value });
    }
    return this;
  }

  build(): string {
    return composeClasses(this.fragments);
  }

  toString(): string {
    return this.build();
  }
}

/**
 * Unconditional shorthand: `cx('a b', { c: flag }, undefined, 'a')`
 */
export function cx(...values: ClassValue[]): string {
  return composeClasses(values.map((value) => ({ value: toClassString(value) })));
}

function toClassString(value: ClassValue): string {
  if (typeof value === 'string') {
    return value;
  }
  return clsx(value);
}
