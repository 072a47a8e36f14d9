// src/utils/error-factory.ts

import {
  ConfigurationError,
  DuplicateCommandError,
  MalformedOptionError,
  RegistryResolutionError,
} from './errors.js';

export interface GenerationErrorDetails {
  name: string;
  message: string;
  stack?: string;
  suggestion?: string;
}

export class ErrorFactory {
  static describe(error: unknown): GenerationErrorDetails {
    const details: GenerationErrorDetails = {
      name: error instanceof Error ? error.name : 'Error',
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    };

    const suggestion = this.getSuggestion(error, details.message);
    if (suggestion) {
      details.suggestion = suggestion;
    }

    return details;
  }

  private static getSuggestion(error: unknown, message: string): string | undefined {
    if (error instanceof ConfigurationError) {
      return 'Check .cli-config-schema.yml in the current directory.';
    }

    if (error instanceof RegistryResolutionError) {
      return `Check that "${error.specifier}" is built and exports a "cli" command.`;
    }

    if (error instanceof DuplicateCommandError) {
      return 'Rename one of the commands, or set "duplicates: overwrite" to keep the last one.';
    }

    if (error instanceof MalformedOptionError) {
      return 'Choice options must declare their choices as a list of strings.';
    }

    if (message.includes('ENOENT')) {
      return 'Output directory does not exist. Create it before generating the schema.';
    }

    if (message.includes('EACCES') || message.includes('EPERM')) {
      return 'Check write permissions for the output path.';
    }

    return undefined;
  }
}
