// src/core/types/command-registry.ts

/**
 * Only 'option' descriptors take part in the configuration file;
 * positional arguments are listed so adapters can report them faithfully.
 */
export type ParameterKind = 'option' | 'argument';

export interface OptionDescriptor {
  readonly name?: string;
  readonly kind: ParameterKind;
  /** Declared type identifier, e.g. text, path, choice, list, integer */
  readonly type?: string;
  readonly help?: string;
  readonly default?: unknown;
  readonly multiple?: boolean;
  /** Allowed values; only read when type is 'choice' */
  readonly choices?: readonly string[];
}

interface CommandBase {
  readonly help?: string;
  readonly shortHelp?: string;
  readonly options: readonly OptionDescriptor[];
}

export interface LeafCommand extends CommandBase {
  readonly kind: 'leaf';
}

export interface GroupCommand extends CommandBase {
  readonly kind: 'group';
  /** Registry-defined order is preserved by Map insertion order */
  readonly subcommands: ReadonlyMap<string, CommandNode>;
}

export type CommandNode = LeafCommand | GroupCommand;

export interface CommandPackage {
  /** Module specifier or dotted identifier the package was registered under */
  readonly id: string;
  readonly cli: CommandNode;
}

export type CommandRegistry = readonly CommandPackage[];
