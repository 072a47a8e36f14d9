// src/__tests__/core/command-extractor.test.ts

import { describe, it, expect } from 'vitest';
import {
  extractCommands,
  extractParameters,
  packageShortName,
} from '../../core/command-extractor.js';
import type { KeyJoiner } from '../../config/config-keys.js';
import { fooPackage, group, grpPackage, leaf, option, pkg } from '../fixtures/command-registry.js';

describe('packageShortName', () => {
  it.each([
    ['./dist/commands/deploy.js', 'deploy'],
    ['commands/foo', 'foo'],
    ['./commands/local/index.js', 'local'],
    ['app.commands.remote', 'remote'],
    ['@acme/cli-commands', 'cli-commands'],
    ['C:\\app\\commands\\sync.mjs', 'sync'],
    ['build', 'build'],
  ])('should derive %s -> %s', (id, expected) => {
    expect(packageShortName(id)).toBe(expected);
  });
});

describe('extractParameters', () => {
  it('should keep declared options in order', () => {
    const command = leaf([option('region'), option('profile'), option('stackName')]);

    expect(extractParameters(command).map((param) => param.name)).toEqual(['region', 'profile', 'stackName']);
  });

  it('should skip options without a name', () => {
    const command = leaf([option(''), { kind: 'option', type: 'text' }, option('region')]);

    expect(extractParameters(command).map((param) => param.name)).toEqual(['region']);
  });

  it('should skip positional arguments', () => {
    const command = leaf([option('template', { kind: 'argument' }), option('region')]);

    expect(extractParameters(command).map((param) => param.name)).toEqual(['region']);
  });

  it('should never include the reserved config redirection options', () => {
    const command = leaf([option('configEnv'), option('region'), option('configFile')]);

    expect(extractParameters(command).map((param) => param.name)).toEqual(['region']);
  });
});

describe('extractCommands', () => {
  it('should return one command named after a leaf package', () => {
    const commands = extractCommands(fooPackage);

    expect(commands).toHaveLength(1);
    expect(commands[0].name).toBe('foo');
    expect(commands[0].description).toBe('Foo the project');
    expect(commands[0].parameters.map((param) => param.name)).toEqual(['bar']);
  });

  it('should return one command per subcommand of a group', () => {
    const commands = extractCommands(grpPackage);

    expect(commands.map((command) => command.name)).toEqual(['grp_a', 'grp_b']);
    expect(commands[0].parameters.map((param) => param.name)).toEqual(['alpha']);
    expect(commands[1].parameters).toEqual([]);
  });

  it('should fall back to short help, then to an empty description', () => {
    const commands = extractCommands(
      pkg('tools', group({ withShort: leaf([], undefined, ' Short help '), bare: leaf() }))
    );

    expect(commands.map((command) => command.description)).toEqual(['Short help', '']);
  });

  it('should prefer help over short help', () => {
    const commands = extractCommands(pkg('deploy', leaf([], '\bFull help\n', 'Short')));

    expect(commands[0].description).toBe('Full help');
  });

  it('should join hyphenated subcommand names into config keys', () => {
    const commands = extractCommands(pkg('local', group({ 'start-api': leaf(), 'start-lambda': leaf() })));

    expect(commands.map((command) => command.name)).toEqual(['local_start_api', 'local_start_lambda']);
  });

  it('should descend into nested groups', () => {
    const commands = extractCommands(
      pkg('pipeline', group({ init: leaf(), stack: group({ create: leaf(), remove: leaf() }) }))
    );

    expect(commands.map((command) => command.name)).toEqual([
      'pipeline_init',
      'pipeline_stack_create',
      'pipeline_stack_remove',
    ]);
  });

  it('should return nothing for an empty group', () => {
    expect(extractCommands(pkg('empty', group({})))).toEqual([]);
  });

  it('should use the given key joiner', () => {
    const dotted: KeyJoiner = { join: (segments) => segments.join('.'), split: (key) => key.split('.') };

    const commands = extractCommands(grpPackage, dotted);

    expect(commands.map((command) => command.name)).toEqual(['grp.a', 'grp.b']);
  });
});
