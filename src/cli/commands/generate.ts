// src/cli/commands/generate.ts

import * as path from 'path';

import { ENVIRONMENT_REGEX } from '../../core/constants.js';
import { ProjectConfigLoader } from '../../config/project-config-loader.js';
import { loadRegistry, type ModuleImporter } from '../../core/registry-loader.js';
import { generateSchema } from '../../core/schema-assembler.js';
import { writeSchema, type WriteOutcome } from '../../core/schema-writer.js';
import { Logger } from '../../utils/logger.js';

export interface GenerateCommandOptions {
  /** Replaces dynamic import() when resolving command packages */
  importer?: ModuleImporter;
}

/**
 * Reads .cli-config-schema.yml, loads the command registry it lists and
 * writes the configuration file schema.
 */
export async function generateCommand(
  repoPath: string,
  options: GenerateCommandOptions = {}
): Promise<WriteOutcome> {
  const config = await new ProjectConfigLoader(repoPath).load();
  const registry = await loadRegistry(config.registry, config.baseDir, options.importer);

  const schema = generateSchema(registry, {
    title: config.title,
    detail: config.commandDetail,
    duplicates: config.duplicates,
  });

  const outcome = await writeSchema(schema, config.output);
  const relativeOutput = path.relative(repoPath, config.output);
  const commandCount = Object.keys(schema.patternProperties[ENVIRONMENT_REGEX].properties).length;

  if (outcome === 'unchanged') {
    Logger.success(`${relativeOutput} is already up-to-date (${commandCount} commands)`);
  } else {
    Logger.success(`Generated ${relativeOutput} (${commandCount} commands)`);
  }
  return outcome;
}
