// src/core/commander-adapter.ts - Reflects commander commands into CommandNode trees

import { Command, Option, type Argument } from 'commander';

import type { CommandNode, OptionDescriptor } from './types/command-registry.js';

/**
 * commander options carry no value type. TypedOption records one so the
 * schema can say integer/number/path instead of guessing text.
 *
 * @example
 * cmd.addOption(new TypedOption('--timeout <seconds>', 'Stage timeout').typeName('integer'));
 */
export class TypedOption extends Option {
  declaredType?: string;

  typeName(name: string): this {
    this.declaredType = name;
    return this;
  }
}

function inferOptionType(option: Option): string {
  if (option instanceof TypedOption && option.declaredType) {
    return option.declaredType;
  }
  if (option.argChoices && option.argChoices.length > 0) {
    return 'choice';
  }
  if (option.variadic) {
    return 'list';
  }
  if (option.negate || option.isBoolean()) {
    return 'boolean';
  }
  return 'text';
}

function describeOption(option: Option): OptionDescriptor {
  return {
    name: option.attributeName(),
    kind: 'option',
    type: inferOptionType(option),
    help: option.description,
    default: option.defaultValue,
    multiple: option.variadic,
    choices: option.argChoices,
  };
}

/**
 * One descriptor per attribute: a --no-x option only stands on its own when
 * there is no positive --x, in which case x defaults to true.
 */
function describeOptions(options: readonly Option[], ignored: ReadonlySet<string>): OptionDescriptor[] {
  const byName = new Map<string, OptionDescriptor>();
  for (const option of options) {
    const name = option.attributeName();
    if (ignored.has(name)) {
      continue;
    }
    if (!option.negate) {
      byName.set(name, describeOption(option));
    } else if (!byName.has(name)) {
      byName.set(name, { ...describeOption(option), default: option.defaultValue ?? true });
    }
  }
  return [...byName.values()];
}

function describeArgument(argument: Argument): OptionDescriptor {
  return {
    name: argument.name(),
    kind: 'argument',
    type: argument.argChoices ? 'choice' : argument.variadic ? 'list' : 'text',
    help: argument.description,
    default: argument.defaultValue,
    multiple: argument.variadic,
    choices: argument.argChoices,
  };
}

/** Attributes commander registers for itself rather than for configuration */
export const IGNORED_OPTION_ATTRIBUTES: ReadonlySet<string> = new Set(['version']);

/**
 * Builds the read-only command tree for a commander command. Commands with
 * subcommands become groups; everything else is a leaf. Options named in
 * `ignored` (by default the one `.version()` adds) are left out.
 */
export function describeCommand(
  command: Command,
  ignored: ReadonlySet<string> = IGNORED_OPTION_ATTRIBUTES
): CommandNode {
  const options = [
    ...describeOptions(command.options, ignored),
    ...command.registeredArguments.map(describeArgument),
  ];
  const help = command.description();
  const shortHelp = command.summary();

  if (command.commands.length === 0) {
    return { kind: 'leaf', help, shortHelp, options };
  }

  const subcommands = new Map<string, CommandNode>();
  for (const subcommand of command.commands) {
    subcommands.set(subcommand.name(), describeCommand(subcommand, ignored));
  }
  return { kind: 'group', help, shortHelp, options, subcommands };
}

export function isCommanderCommand(value: unknown): value is Command {
  if (value instanceof Command) {
    return true;
  }
  // Registries may be built against another copy of commander
  return (
    typeof value === 'object' &&
    value !== null &&
    'commands' in value &&
    Array.isArray(value.commands) &&
    'options' in value &&
    Array.isArray(value.options) &&
    'registeredArguments' in value &&
    Array.isArray(value.registeredArguments)
  );
}
