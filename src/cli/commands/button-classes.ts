/**
 * Button Classes CLI Command
 *
 * Print the class strings a button would render with for the given state
 */

import type { Command } from 'commander';
import { renderJson } from '../../cli-formatter.js';
import { Button } from '../../components/button.js';
import { ButtonGroup } from '../../components/button-group.js';
import { COLORS, SIZES, VARIANTS, type ButtonState } from '../../components/types.js';
import { renderKeyValueSection } from '../../shared/cli-sections.js';
import { handleError } from '../../shared/error-handler.js';
import { oneOf, validateOrThrow } from '../../shared/validation.js';
import { createCommandContext } from '../context.js';

export interface ButtonClassesOptions {
  variant?: string;
  color?: string;
  size?: string;
  iconSize?: string;
  fullWidth?: boolean;
  ripple: boolean;
  dropShadow: boolean;
  class?: string;
  iconClass?: string;
  group?: boolean;
  groupFullWidth?: boolean;
  siblingFullWidth?: boolean;
  json?: boolean;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fieldName: string): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  validateOrThrow<string>(value, [oneOf<string>(fieldName, allowed)], fieldName);
  return allowed.find((candidate) => candidate === value);
}

export function buttonStateFromOptions(options: ButtonClassesOptions): ButtonState {
  return {
    variant: pick(options.variant, VARIANTS, 'variant'),
    color: pick(options.color, COLORS, 'color'),
    size: pick(options.size, SIZES, 'size'),
    iconSize: pick(options.iconSize, SIZES, 'icon-size'),
    fullWidth: options.fullWidth ?? false,
    ripple: options.ripple,
    dropShadow: options.dropShadow,
    className: options.class,
    iconClassName: options.iconClass,
  };
}

export function registerButtonClassesCommand(program: Command): void {
  program
    .command('button-classes')
    .description('Compose the class strings of a button from its state')
    .option('--variant <variant>', `One of: ${VARIANTS.join(', ')}`)
    .option('--color <color>', `One of: ${COLORS.join(', ')}`)
    .option('--size <size>', `One of: ${SIZES.join(', ')}`)
    .option('--icon-size <size>', 'Icon size (defaults to --size)')
    .option('--full-width', 'Stretch the button')
    .option('--no-ripple', 'Disable the ripple effect')
    .option('--no-drop-shadow', 'Disable elevation')
    .option('--class <classes>', 'Extra classes for the button')
    .option('--icon-class <classes>', 'Extra classes for the icons')
    .option('--group', 'Place the button in a button group')
    .option('--group-full-width', 'Stretch the group (implies --group)')
    .option('--sibling-full-width', 'Add a stretched sibling to the group (implies --group)')
    .option('--json', 'Print the result as JSON')
    .action((options: ButtonClassesOptions, command: Command) => {
      const context = createCommandContext(command);
      try {
        const state = buttonStateFromOptions(options);
        const inGroup = Boolean(options.group || options.groupFullWidth || options.siblingFullWidth);
        const group = inGroup ? new ButtonGroup({ fullWidth: options.groupFullWidth }) : undefined;
        const sibling = group && options.siblingFullWidth ? new Button({ fullWidth: true }, group) : undefined;
        const button = new Button(state, group);

        const result = {
          root: button.classes,
          startIcon: button.startIconClasses,
          endIcon: button.endIconClasses,
          fullWidth: button.isFullWidth,
        };

        button.dispose();
        sibling?.dispose();

        if (options.json) {
          renderJson(result);
          return;
        }
        renderKeyValueSection('Button classes', [
          { label: 'Root', value: result.root },
          { label: 'Start icon', value: result.startIcon },
          { label: 'End icon', value: result.endIcon },
          { label: 'Full width', value: result.fullWidth ? 'yes' : 'no' },
        ]);
      } catch (error) {
        handleError(error, { logger: context.logger, exitOnError: true });
      }
    });
}
