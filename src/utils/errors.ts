// src/utils/errors.ts

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class RegistryResolutionError extends Error {
  constructor(
    public specifier: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${specifier}] ${message}`, options);
    this.name = 'RegistryResolutionError';
  }
}

export class MalformedOptionError extends Error {
  constructor(
    public optionName: string,
    message: string
  ) {
    super(`Option "${optionName}": ${message}`);
    this.name = 'MalformedOptionError';
  }
}

export class DuplicateCommandError extends Error {
  constructor(public commandName: string) {
    super(`Duplicate command name in schema: ${commandName}`);
    this.name = 'DuplicateCommandError';
  }
}
