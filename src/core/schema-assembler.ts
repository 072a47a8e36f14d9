// src/core/schema-assembler.ts - Registry -> SchemaDocument

import { configKeyJoiner, type KeyJoiner } from '../config/config-keys.js';
import { DuplicateCommandError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import type { CommandSchema, DetailPolicy } from './command-schema.js';
import { extractCommands } from './command-extractor.js';
import { CONFIG_VERSION, DEFAULT_SCHEMA_TITLE, ENVIRONMENT_REGEX, SCHEMA_DRAFT } from './constants.js';
import type { CommandRegistry } from './types/command-registry.js';
import type { EnvironmentSchema, SchemaDocument } from './types/json-schema.js';

/** What to do when two packages produce the same configuration key */
export type DuplicatePolicy = 'error' | 'overwrite';

export interface GenerateSchemaOptions {
  joiner?: KeyJoiner;
  title?: string;
  detail?: DetailPolicy;
  duplicates?: DuplicatePolicy;
}

/**
 * Builds the configuration file schema for every command in the registry.
 *
 * Commands are collected package by package in registry order, which only
 * decides key order in the output. Each command becomes a property of the
 * environment block, so any environment name may hold any command's settings.
 */
export function generateSchema(registry: CommandRegistry, options: GenerateSchemaOptions = {}): SchemaDocument {
  const joiner = options.joiner ?? configKeyJoiner;
  const detail = options.detail ?? {};
  const duplicates = options.duplicates ?? 'error';

  const commands: CommandSchema[] = [];
  for (const pkg of registry) {
    const extracted = extractCommands(pkg, joiner);
    Logger.debug(`Extracted ${extracted.length} command(s) from ${pkg.id}`);
    commands.push(...extracted);
  }

  const environment: EnvironmentSchema = { title: 'Environment', properties: {} };
  for (const command of commands) {
    for (const [key, fragment] of Object.entries(command.toSchema(joiner, detail))) {
      if (Object.hasOwn(environment.properties, key)) {
        if (duplicates === 'error') {
          throw new DuplicateCommandError(key);
        }
        Logger.warn(`Command "${key}" is defined more than once; keeping the last definition`);
      }
      environment.properties[key] = fragment;
    }
  }

  return {
    $schema: SCHEMA_DRAFT,
    title: options.title ?? DEFAULT_SCHEMA_TITLE,
    type: 'object',
    properties: {
      // Required by the config reader
      version: { title: 'Config version', type: 'number', default: CONFIG_VERSION },
    },
    required: ['version'],
    additionalProperties: false,
    patternProperties: {
      [ENVIRONMENT_REGEX]: environment,
    },
  };
}
