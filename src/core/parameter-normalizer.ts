// src/core/parameter-normalizer.ts - Option descriptor -> ParameterSchema

import { cleanText } from '../utils/text.js';
import { MalformedOptionError } from '../utils/errors.js';
import { CHOICE_TYPE_NAME, LIST_TYPE_NAME, STRING_TYPE_NAMES } from './constants.js';
import { ParameterSchema } from './command-schema.js';
import type { OptionDescriptor } from './types/command-registry.js';

/**
 * Maps a declared type name to a JSON Schema type. CLI frameworks have no
 * plain "string" type, only text/path/choice and friends, so those collapse
 * to string; unknown names pass through lower-cased.
 */
export function resolveSchemaType(declaredType: string | undefined): string {
  const typeName = (declaredType ?? '').toLowerCase();
  if (STRING_TYPE_NAMES.includes(typeName)) {
    return 'string';
  }
  if (typeName === LIST_TYPE_NAME) {
    return 'array';
  }
  return typeName || 'string';
}

/**
 * Whether a default value is worth publishing. Empty strings, zero, false,
 * empty lists and empty objects are treated the same as no default.
 */
export function hasMeaningfulDefault(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (value !== null && typeof value === 'object' && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function readChoices(descriptor: OptionDescriptor): string[] {
  const choices: unknown = descriptor.choices;
  if (!Array.isArray(choices) || !choices.every((choice): choice is string => typeof choice === 'string')) {
    throw new MalformedOptionError(descriptor.name ?? '', 'choice options need a list of string choices');
  }
  return [...choices];
}

export function normalizeParameter(descriptor: OptionDescriptor): ParameterSchema {
  const type = resolveSchemaType(descriptor.type);

  let defaultValue: unknown;
  if (hasMeaningfulDefault(descriptor.default)) {
    defaultValue = Array.isArray(descriptor.default) ? [...descriptor.default] : descriptor.default;
  }

  let choices: string[] | undefined;
  if ((descriptor.type ?? '').toLowerCase() === CHOICE_TYPE_NAME) {
    const declared = readChoices(descriptor);
    choices = declared.length > 0 ? declared : undefined;
  }

  return new ParameterSchema({
    name: descriptor.name ?? '',
    type,
    description: cleanText(descriptor.help),
    default: defaultValue,
    items: type === 'array' ? 'string' : undefined,
    choices,
  });
}
