import {mkdir, writeFile} from 'fs/promises';
import {dirname, extname} from 'path';
import {stringify} from 'yaml';
import {OpenAPIDocument} from "../types";
import ValidationError from '../utils/custom-errors/ValidationError';

export type OutputFormat = 'yaml' | 'json';

export function formatForPath(outputPath: string): OutputFormat {
  return extname(outputPath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

export function serializeDocument(document: OpenAPIDocument, format: OutputFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(document, null, 2)}\n`;
  }
  return stringify(document);
}

/**
 * Writes the document as YAML, or as JSON when the output path ends in `.json`.
 * Missing parent directories are created.
 */
export default async function writeDocument(document: OpenAPIDocument, outputPath: string): Promise<void> {
  const content = serializeDocument(document, formatForPath(outputPath));

  try {
    await mkdir(dirname(outputPath), {recursive: true});
    await writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      'writeDocument',
      `Failed to write OpenAPI document: ${error instanceof Error ? error.message : String(error)}`,
      {outputPath}
    );
  }
}
