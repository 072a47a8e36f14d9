// src/core/schema-writer.ts

import * as fs from 'fs/promises';

import type { SchemaDocument } from './types/json-schema.js';

export type WriteOutcome = 'written' | 'unchanged';

export function serializeSchema(schema: SchemaDocument): string {
  return JSON.stringify(schema, null, 2);
}

/**
 * Writes the schema as UTF-8 JSON with 2-space indentation. The output
 * directory must already exist. A file that already holds the same content
 * is left alone so its timestamp does not churn on every build.
 */
export async function writeSchema(schema: SchemaDocument, outputPath: string): Promise<WriteOutcome> {
  const content = serializeSchema(schema);

  try {
    const existing = await fs.readFile(outputPath, 'utf-8');
    if (existing === content) {
      return 'unchanged';
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  await fs.writeFile(outputPath, content, 'utf-8');
  return 'written';
}
