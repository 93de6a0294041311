/**
 * JSON and YAML emitters for manifests
 */

import { stringify as stringifyYaml } from 'yaml';
import type { JsonValue, Manifest } from '../reconcile/types.js';

export type OutputFormat = 'json' | 'yaml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml'];

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'json';

export class UnknownOutputFormatError extends Error {
  constructor(public readonly format: string) {
    super(`Unknown output format "${format}" (expected one of: ${OUTPUT_FORMATS.join(', ')})`);
    this.name = 'UnknownOutputFormatError';
  }
}

/**
 * @throws UnknownOutputFormatError
 */
export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined) return DEFAULT_OUTPUT_FORMAT;
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new UnknownOutputFormatError(value);
  }
  return format;
}

/**
 * Pretty JSON with a 4-space indent
 */
export function emitJson(value: JsonValue): string {
  return `${JSON.stringify(value, null, 4)}\n`;
}

/**
 * One YAML document per value, separated by `---`
 */
export function emitYamlDocuments(values: readonly JsonValue[]): string {
  return values.map((value) => `---\n${stringifyYaml(value)}`).join('');
}

/**
 * Render a manifest set: JSON as a single v1 List, YAML as a document stream
 */
export function emitManifests(manifests: readonly Manifest[], format: OutputFormat): string {
  if (format === 'yaml') {
    return emitYamlDocuments(manifests);
  }
  return emitJson({ apiVersion: 'v1', kind: 'List', items: [...manifests] });
}
