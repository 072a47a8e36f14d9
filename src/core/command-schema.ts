// src/core/command-schema.ts - Normalized command/parameter records and their schema fragments

import { configKeyJoiner, type KeyJoiner } from '../config/config-keys.js';
import { toTitleCase } from '../utils/text.js';
import type { CommandSchemaFragment, ParameterSchemaFragment } from './types/json-schema.js';

/**
 * 'stub' commands are listed in the schema with their description only,
 * for commands whose parameters are not documented yet.
 */
export type DetailLevel = 'full' | 'stub';

/** Top-level command name -> detail level; unlisted commands are 'full' */
export type DetailPolicy = Readonly<Record<string, DetailLevel>>;

export function detailLevelFor(policy: DetailPolicy, topLevelName: string): DetailLevel {
  return Object.hasOwn(policy, topLevelName) ? policy[topLevelName] : 'full';
}

export interface ParameterSchemaInit {
  name: string;
  type: string;
  description?: string;
  default?: unknown;
  items?: string;
  choices?: readonly string[];
}

export class ParameterSchema {
  readonly name: string;
  /** string, number, boolean, array, object, integer, or a declared type passed through */
  readonly type: string;
  readonly description: string;
  readonly default?: unknown;
  readonly items?: string;
  readonly choices?: readonly string[];

  constructor(init: ParameterSchemaInit) {
    this.name = init.name;
    this.type = init.type;
    this.description = init.description ?? '';
    this.default = init.default;
    this.items = init.type === 'array' ? init.items : undefined;
    this.choices = init.choices;
  }

  toSchema(): ParameterSchemaFragment {
    const fragment: ParameterSchemaFragment = {
      title: this.name,
      type: this.type,
      description: this.description,
    };
    if (this.default !== undefined) {
      fragment.default = Array.isArray(this.default) ? [...this.default] : this.default;
    }
    if (this.items) {
      fragment.items = { type: this.items };
    }
    if (this.choices && this.choices.length > 0) {
      fragment.enum = [...this.choices];
    }
    return fragment;
  }
}

export class CommandSchema {
  constructor(
    /** Configuration key for the command, e.g. local_start_api */
    readonly name: string,
    readonly description: string,
    readonly parameters: readonly ParameterSchema[]
  ) {}

  toSchema(
    joiner: KeyJoiner = configKeyJoiner,
    detail: DetailPolicy = {}
  ): Record<string, CommandSchemaFragment> {
    const segments = joiner.split(this.name);
    const formattedName = segments.join(' ');
    const stub = detailLevelFor(detail, segments[0]) === 'stub';

    const bullets = stub
      ? ''
      : this.parameters.map((param) => `* ${param.name}:\n${param.description}`).join('\n');

    const properties: Record<string, ParameterSchemaFragment> = {};
    if (!stub) {
      for (const param of this.parameters) {
        properties[param.name] = param.toSchema();
      }
    }

    return {
      [this.name]: {
        title: `${toTitleCase(formattedName)} command`,
        description: this.description,
        properties: {
          parameters: {
            title: `Parameters for the ${formattedName} command`,
            description: `Available parameters for the ${formattedName} command:\n${bullets}`,
            type: 'object',
            properties,
          },
        },
        required: ['parameters'],
      },
    };
  }
}
