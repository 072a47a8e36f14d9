// src/core/constants.ts

export const SCHEMA_DRAFT = 'http://json-schema.org/draft-04/schema';
export const DEFAULT_SCHEMA_TITLE = 'CLI configuration schema';
export const DEFAULT_SCHEMA_FILE = 'schema/config.schema.json';

/** Matches any environment name */
export const ENVIRONMENT_REGEX = '^.+$';

export const CONFIG_VERSION = 0.1;

// A config file must not redirect which environment or file it is read from
export const RESERVED_OPTION_NAMES: readonly string[] = ['configEnv', 'configFile'];

/** Declared type names that the configuration file stores as strings */
export const STRING_TYPE_NAMES: readonly string[] = ['text', 'path', 'choice', 'filename', 'directory'];

export const LIST_TYPE_NAME = 'list';
export const CHOICE_TYPE_NAME = 'choice';
