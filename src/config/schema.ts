// src/config/schema.ts - Generator settings read from .cli-config-schema.yml

import { z } from 'zod';

import type { DetailPolicy } from '../core/command-schema.js';
import type { DuplicatePolicy } from '../core/schema-assembler.js';

export const CONFIG_FILE_NAME = '.cli-config-schema.yml';

export const generatorConfigFileSchema = z
  .object({
    registry: z
      .array(z.string().min(1, 'registry entries must not be empty'))
      .min(1, 'registry must list at least one command package')
      .describe('Command package modules, in the order their commands appear in the schema'),
    output: z.string().min(1).optional().describe('Where to write the schema, relative to the config file'),
    title: z.string().min(1).optional().describe('Schema title'),
    commandDetail: z
      .record(z.enum(['full', 'stub']))
      .optional()
      .describe('Top-level command name -> full | stub'),
    duplicates: z.enum(['error', 'overwrite']).optional().describe('Handling of duplicate command keys'),
  })
  .strict();

export type GeneratorConfigFile = z.infer<typeof generatorConfigFileSchema>;

/**
 * Fully resolved generator settings: defaults applied, paths absolute.
 */
export interface GeneratorConfig {
  /** Directory the config file was found in; relative specifiers resolve against it */
  baseDir: string;
  registry: string[];
  output: string;
  title: string;
  commandDetail: DetailPolicy;
  duplicates: DuplicatePolicy;
}
