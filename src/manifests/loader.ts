/**
 * Manifest sources
 *
 * A source produces one document tree per invocation. Files are JSON or
 * multi-document YAML; directories are read recursively in sorted order.
 */

import { existsSync } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, isAbsolute, join, resolve } from 'node:path';
import { parseAllDocuments } from 'yaml';
import { InputError } from '../reconcile/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface ManifestSource {
  /** Human-readable origin, for messages */
  readonly description: string;
  load(): Promise<unknown>;
}

export const MANIFEST_EXTENSIONS: ReadonlySet<string> = new Set(['.json', '.yaml', '.yml']);

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse YAML or JSON text. A single document yields its value; several
 * documents yield an array. Empty documents are dropped.
 *
 * @throws InputError with code SOURCE_PARSE_ERROR
 */
export function parseManifestText(text: string, origin: string): unknown {
  const documents = parseAllDocuments(text);
  const values: unknown[] = [];
  for (const document of documents) {
    const [first] = document.errors;
    if (first) {
      throw new InputError(`Cannot parse ${origin}: ${first.message}`, 'SOURCE_PARSE_ERROR', undefined, {
        cause: first,
      });
    }
    if (document.contents === null) continue;
    const value: unknown = document.toJS();
    values.push(value);
  }

  return values.length === 1 ? values[0] : values;
}

function parseJson(text: string, origin: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InputError(`Cannot parse ${origin}: ${detail}`, 'SOURCE_PARSE_ERROR', undefined, { cause: error });
  }
}

// =============================================================================
// File Source
// =============================================================================

export interface FileManifestSourceOptions {
  /** Base for relative paths (default: process.cwd()) */
  basePath?: string;
}

/**
 * Manifests read from files and directories
 */
export class FileManifestSource implements ManifestSource {
  private readonly paths: string[];

  constructor(paths: readonly string[], options: FileManifestSourceOptions = {}) {
    const base = options.basePath ?? process.cwd();
    this.paths = paths.map((path) => (isAbsolute(path) ? path : resolve(base, path)));
  }

  get description(): string {
    return this.paths.join(', ');
  }

  /**
   * @throws InputError with code SOURCE_NOT_FOUND or SOURCE_PARSE_ERROR
   */
  async load(): Promise<unknown> {
    const trees: unknown[] = [];
    for (const path of this.paths) {
      trees.push(await this.loadPath(path));
    }
    return trees.length === 1 ? trees[0] : trees;
  }

  private async loadPath(path: string): Promise<unknown> {
    if (!existsSync(path)) {
      throw new InputError(`Manifest path not found: ${path}`, 'SOURCE_NOT_FOUND', 'Check the path and try again');
    }

    if ((await stat(path)).isDirectory()) {
      const files = await collectFiles(path);
      const trees: unknown[] = [];
      for (const file of files) {
        trees.push(await loadFile(file));
      }
      return trees;
    }

    return loadFile(path);
  }
}

async function collectFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectFiles(path)));
    } else if (entry.isFile() && MANIFEST_EXTENSIONS.has(extname(entry.name))) {
      files.push(path);
    }
  }

  return files;
}

async function loadFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InputError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      'SOURCE_NOT_FOUND',
      undefined,
      { cause: error }
    );
  }
  return extname(path) === '.json' ? parseJson(text, path) : parseManifestText(text, path);
}

// =============================================================================
// Inline Source
// =============================================================================

/**
 * Manifests given as text on the command line
 */
export class InlineManifestSource implements ManifestSource {
  constructor(
    private readonly text: string,
    readonly description = '--exec'
  ) {}

  async load(): Promise<unknown> {
    return parseManifestText(this.text, this.description);
  }
}
