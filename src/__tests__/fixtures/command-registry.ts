// src/__tests__/fixtures/command-registry.ts

import type {
  CommandNode,
  CommandPackage,
  GroupCommand,
  LeafCommand,
  OptionDescriptor,
} from '../../core/types/command-registry.js';

export function option(name: string, overrides: Partial<OptionDescriptor> = {}): OptionDescriptor {
  return { name, kind: 'option', type: 'text', ...overrides };
}

export function leaf(options: OptionDescriptor[] = [], help?: string, shortHelp?: string): LeafCommand {
  return { kind: 'leaf', help, shortHelp, options };
}

export function group(subcommands: Record<string, CommandNode>, help?: string): GroupCommand {
  return { kind: 'group', help, options: [], subcommands: new Map(Object.entries(subcommands)) };
}

export function pkg(id: string, cli: CommandNode): CommandPackage {
  return { id, cli };
}

/** Leaf `foo` with a single text option `bar` */
export const fooPackage = pkg(
  'commands/foo',
  leaf([option('bar', { type: 'text', help: 'Bar option', default: 'baz' })], 'Foo the project')
);

/** Group `grp` with leaf subcommands `a` and `b` */
export const grpPackage = pkg(
  'commands/grp',
  group({
    a: leaf([option('alpha', { help: 'Alpha value' })], 'Run a'),
    b: leaf([], undefined, 'Run b'),
  })
);
