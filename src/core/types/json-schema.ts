// src/core/types/json-schema.ts - Shape of the generated draft-04 document

export interface ParameterSchemaFragment {
  title: string;
  type: string;
  description: string;
  default?: unknown;
  items?: { type: string };
  enum?: string[];
}

export interface CommandSchemaFragment {
  title: string;
  description: string;
  properties: {
    parameters: {
      title: string;
      description: string;
      type: 'object';
      properties: Record<string, ParameterSchemaFragment>;
    };
  };
  required: ['parameters'];
}

export interface EnvironmentSchema {
  title: 'Environment';
  properties: Record<string, CommandSchemaFragment>;
}

export interface SchemaDocument {
  $schema: string;
  title: string;
  type: 'object';
  properties: {
    version: { title: string; type: 'number'; default: number };
  };
  required: string[];
  additionalProperties: false;
  patternProperties: Record<string, EnvironmentSchema>;
}
