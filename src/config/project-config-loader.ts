// src/config/project-config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';

import { DEFAULT_SCHEMA_FILE, DEFAULT_SCHEMA_TITLE } from '../core/constants.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import {
  CONFIG_FILE_NAME,
  generatorConfigFileSchema,
  type GeneratorConfig,
  type GeneratorConfigFile,
} from './schema.js';

/**
 * Loads the generator settings from .cli-config-schema.yml in the project root.
 */
export class ProjectConfigLoader {
  constructor(private repoPath: string) {}

  get configPath(): string {
    return path.join(this.repoPath, CONFIG_FILE_NAME);
  }

  async load(): Promise<GeneratorConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`No ${CONFIG_FILE_NAME} found in ${this.repoPath}`);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse ${CONFIG_FILE_NAME}: ${(error as Error).message}`, {
        cause: error,
      });
    }

    const result = generatorConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid ${CONFIG_FILE_NAME}: ${issues}`);
    }

    Logger.debug(`Loaded ${this.configPath}`);
    return this.buildConfigWithDefaults(result.data);
  }

  private buildConfigWithDefaults(raw: GeneratorConfigFile): GeneratorConfig {
    return {
      baseDir: this.repoPath,
      registry: raw.registry,
      output: this.resolvePath(raw.output ?? DEFAULT_SCHEMA_FILE),
      title: raw.title ?? DEFAULT_SCHEMA_TITLE,
      commandDetail: raw.commandDetail ?? {},
      duplicates: raw.duplicates ?? 'error',
    };
  }

  private resolvePath(relativePath: string): string {
    if (path.isAbsolute(relativePath)) {
      return relativePath;
    }
    return path.resolve(this.repoPath, relativePath);
  }
}
