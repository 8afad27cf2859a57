/**
 * Marker sources - where registry documents come from
 */

import { readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { RegistryLoadError, errorMessage } from '@marker-engine/core';
import { DOCUMENT_EXTENSIONS, formatForExtension, parseDocument } from './parse';

export interface MarkerSource {
  /**
   * Load the raw registry document for a schema. Shape validation is left to
   * `loadRegistry`; a missing or unparseable document rejects with
   * RegistryLoadError.
   */
  load(schemaId: string, version?: string): Promise<unknown>;
}

// =============================================================================
// File Source
// =============================================================================

/**
 * Reads `<schemaId>.json|.yaml|.yml` from a directory, or
 * `<schemaId>@<version>.<ext>` when a version is requested.
 */
export class FileMarkerSource implements MarkerSource {
  constructor(private readonly directory: string) {}

  async load(schemaId: string, version?: string): Promise<unknown> {
    const baseName = version ? `${schemaId}@${version}` : schemaId;

    for (const extension of DOCUMENT_EXTENSIONS) {
      const path = join(this.directory, `${baseName}${extension}`);
      const content = await readIfExists(path);
      if (content === undefined) continue;

      const format = formatForExtension(extname(path));
      if (!format) continue;

      try {
        return parseDocument(content, format);
      } catch (cause) {
        throw documentError(schemaId, `Cannot parse ${path}: ${errorMessage(cause)}`);
      }
    }

    throw documentError(
      schemaId,
      `No registry document for ${baseName} in ${this.directory} (tried ${DOCUMENT_EXTENSIONS.join(', ')})`
    );
  }
}

async function readIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// In-Memory Source
// =============================================================================

/**
 * Documents held in memory, keyed by schema id and optionally by version
 */
export class InMemoryMarkerSource implements MarkerSource {
  private documents: Map<string, unknown> = new Map();

  constructor(documents: Record<string, unknown> = {}) {
    for (const [schemaId, document] of Object.entries(documents)) {
      this.documents.set(schemaId, document);
    }
  }

  set(schemaId: string, document: unknown, version?: string): void {
    this.documents.set(version ? `${schemaId}@${version}` : schemaId, document);
  }

  async load(schemaId: string, version?: string): Promise<unknown> {
    const key = version ? `${schemaId}@${version}` : schemaId;
    if (!this.documents.has(key)) {
      throw documentError(schemaId, `No registry document for ${key}`);
    }
    return structuredClone(this.documents.get(key));
  }
}

function documentError(schemaId: string, message: string): RegistryLoadError {
  return new RegistryLoadError(schemaId, [{ code: 'invalid_document', message }]);
}
