/**
 * Registry document parsing (JSON or YAML)
 */

import { parse as parseYaml } from 'yaml';

export type DocumentFormat = 'json' | 'yaml';

const EXTENSIONS: Record<string, DocumentFormat> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

export const DOCUMENT_EXTENSIONS = Object.keys(EXTENSIONS);

export function formatForExtension(extension: string): DocumentFormat | undefined {
  return EXTENSIONS[extension.toLowerCase()];
}

/**
 * Parse a registry document. Throws the parser's own error on malformed input;
 * the shape is validated later by the loader.
 */
export function parseDocument(content: string, format: DocumentFormat): unknown {
  if (format === 'json') {
    return JSON.parse(content);
  }
  return parseYaml(content);
}
