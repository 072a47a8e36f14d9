// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';

import { generateCommand } from './commands/generate.js';

export async function createProgram(repoPath: string = process.cwd()): Promise<Command> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: { version: string } = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));

  const program = new Command();

  program
    .name('cli-config-schema')
    .version(`cli-config-schema v${pkg.version}`, '-v, --version')
    .description('Generate the JSON Schema of a CLI configuration file from its command tree')
    .allowExcessArguments(false)
    .exitOverride()
    .action(async () => {
      await generateCommand(repoPath);
    });

  return program;
}

export { CommanderError };
