// src/core/index.ts - Public API for applications that build their own registry

export { configKeyJoiner, toConfigKey, CONFIG_KEY_DELIMITER, type KeyJoiner } from '../config/config-keys.js';
export { CommandSchema, ParameterSchema, type DetailLevel, type DetailPolicy } from './command-schema.js';
export { extractCommands, extractParameters, packageShortName } from './command-extractor.js';
export { normalizeParameter } from './parameter-normalizer.js';
export { generateSchema, type DuplicatePolicy, type GenerateSchemaOptions } from './schema-assembler.js';
export { writeSchema, serializeSchema, type WriteOutcome } from './schema-writer.js';
export { TypedOption, describeCommand } from './commander-adapter.js';
export { loadRegistry, type ModuleImporter } from './registry-loader.js';
export type * from './types/command-registry.js';
export type * from './types/json-schema.js';
