/**
 * Unit Tests: Manifest sources, emitters and local validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { FileManifestSource, InlineManifestSource, parseManifestText } from '../../src/manifests/loader.js';
import {
  UnknownOutputFormatError,
  emitJson,
  emitManifests,
  emitYamlDocuments,
  parseOutputFormat,
} from '../../src/manifests/emit.js';
import {
  getValidationSummary,
  isValidLabelValue,
  isValidSubdomain,
  validateManifests,
} from '../../src/manifests/validator.js';
import { InputError } from '../../src/reconcile/errors.js';
import { normalizeManifests } from '../../src/reconcile/normalize.js';
import { createMockConfigMap, createMockNamespace } from '../helpers/manifests.js';

// =============================================================================
// Parsing
// =============================================================================

describe('parseManifestText', () => {
  it('returns a single document as-is', () => {
    expect(parseManifestText('apiVersion: v1\nkind: Namespace\nmetadata:\n  name: web\n', 'inline')).toEqual(
      createMockNamespace('web')
    );
  });

  it('returns several documents as an array and drops empty ones', () => {
    const text = [
      '---',
      'apiVersion: v1',
      'kind: Namespace',
      'metadata: {name: a}',
      '---',
      '# nothing here',
      '---',
      'apiVersion: v1',
      'kind: Namespace',
      'metadata: {name: b}',
      '',
    ].join('\n');
    expect(parseManifestText(text, 'inline')).toEqual([createMockNamespace('a'), createMockNamespace('b')]);
  });

  it('accepts JSON text', () => {
    expect(parseManifestText('{"apiVersion": "v1", "kind": "Namespace", "metadata": {"name": "web"}}', 'inline')).toEqual(
      createMockNamespace('web')
    );
  });

  it('reports syntax errors with the origin', () => {
    try {
      parseManifestText('kind: [unclosed', 'inline');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InputError);
      if (error instanceof InputError) {
        expect(error.code).toBe('SOURCE_PARSE_ERROR');
        expect(error.message.startsWith('Cannot parse inline: ')).toBe(true);
      }
    }
  });
});

describe('InlineManifestSource', () => {
  it('parses its text on load', async () => {
    const source = new InlineManifestSource('{"apiVersion": "v1", "kind": "Namespace", "metadata": {"name": "web"}}');
    expect(source.description).toBe('--exec');
    await expect(source.load()).resolves.toEqual(createMockNamespace('web'));
  });
});

describe('FileManifestSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kubeconverge-manifests-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON file', async () => {
    writeFileSync(join(dir, 'ns.json'), JSON.stringify(createMockNamespace('web')));
    const source = new FileManifestSource(['ns.json'], { basePath: dir });

    await expect(source.load()).resolves.toEqual(createMockNamespace('web'));
    expect(source.description).toBe(join(dir, 'ns.json'));
  });

  it('reads a directory recursively in name order, skipping other files', async () => {
    mkdirSync(join(dir, 'b-apps'));
    writeFileSync(join(dir, 'b-apps', 'settings.yaml'), 'apiVersion: v1\nkind: ConfigMap\nmetadata: {name: s, namespace: web}\n');
    writeFileSync(join(dir, 'a-namespace.yml'), 'apiVersion: v1\nkind: Namespace\nmetadata: {name: web}\n');
    writeFileSync(join(dir, 'README.md'), '# not a manifest\n');

    const tree = await new FileManifestSource([dir]).load();
    const names = normalizeManifests(tree).map((manifest) => `${manifest.kind}`);

    expect(names).toEqual(['Namespace', 'ConfigMap']);
  });

  it('returns one tree per path for several paths', async () => {
    writeFileSync(join(dir, 'a.json'), JSON.stringify(createMockNamespace('a')));
    writeFileSync(join(dir, 'b.json'), JSON.stringify(createMockNamespace('b')));

    await expect(new FileManifestSource(['a.json', 'b.json'], { basePath: dir }).load()).resolves.toEqual([
      createMockNamespace('a'),
      createMockNamespace('b'),
    ]);
  });

  it('rejects a missing path', async () => {
    const source = new FileManifestSource(['missing.yaml'], { basePath: dir });
    await expect(source.load()).rejects.toThrow(`Manifest path not found: ${join(dir, 'missing.yaml')}`);
  });

  it('rejects malformed JSON with the file name', async () => {
    writeFileSync(join(dir, 'broken.json'), '{"kind": ');
    await expect(new FileManifestSource(['broken.json'], { basePath: dir }).load()).rejects.toMatchObject({
      code: 'SOURCE_PARSE_ERROR',
    });
  });
});

// =============================================================================
// Emitters
// =============================================================================

describe('emitters', () => {
  const manifests = normalizeManifests([createMockNamespace('web'), createMockConfigMap('settings', 'web', { mode: 'fast' })]);

  it('parses the output format', () => {
    expect(parseOutputFormat(undefined)).toBe('json');
    expect(parseOutputFormat('yaml')).toBe('yaml');
    expect(() => parseOutputFormat('toml')).toThrow(UnknownOutputFormatError);
    expect(() => parseOutputFormat('toml')).toThrow('Unknown output format "toml" (expected one of: json, yaml)');
  });

  it('indents JSON by four spaces', () => {
    expect(emitJson({ a: [1] })).toBe('{\n    "a": [\n        1\n    ]\n}\n');
  });

  it('wraps JSON output in a v1 List', () => {
    expect(JSON.parse(emitManifests(manifests, 'json'))).toEqual({ apiVersion: 'v1', kind: 'List', items: manifests });
  });

  it('writes one YAML document per manifest', () => {
    expect(emitYamlDocuments([{ a: 1 }, { b: 'x' }])).toBe('---\na: 1\n---\nb: x\n');
  });

  it('round-trips a YAML stream through the parser', () => {
    const rendered = emitManifests(manifests, 'yaml');
    expect(parseManifestText(rendered, 'rendered')).toEqual(manifests);
    expect(parseYaml(rendered.split('---\n')[1])).toEqual(createMockNamespace('web'));
  });
});

// =============================================================================
// Validation
// =============================================================================

describe('validateManifests', () => {
  it('accepts a consistent set', () => {
    const result = validateManifests(
      normalizeManifests([createMockNamespace('web'), createMockConfigMap('settings', 'web', {})])
    );
    expect(result.valid).toBe(true);
    expect(getValidationSummary(result)).toBe('No issues found');
  });

  it('reports invalid names and label values as errors', () => {
    const manifest = {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: { name: 'Bad_Name', namespace: 'default', labels: { tier: 'has space', replicas: 3 } },
    };
    const result = validateManifests(normalizeManifests(manifest));

    expect(result.valid).toBe(false);
    expect(result.errors.map((issue) => issue.code)).toEqual(['INVALID_NAME', 'INVALID_LABEL_VALUE', 'INVALID_LABEL_VALUE']);
    expect(result.errors[2].message).toBe('Label "replicas" has an invalid value 3');
    expect(result.errors[0].path).toBe('ConfigMap/default/Bad_Name');
  });

  it('reports a missing apiVersion', () => {
    const result = validateManifests(normalizeManifests({ kind: 'Namespace', metadata: { name: 'web' } }));
    expect(result.errors.map((issue) => issue.code)).toEqual(['MISSING_API_VERSION']);
  });

  it('warns about undeclared namespaces and namespaced cluster-scoped kinds', () => {
    const result = validateManifests(
      normalizeManifests([
        createMockConfigMap('settings', 'web', {}),
        { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'other', namespace: 'web' } },
      ])
    );

    expect(result.valid).toBe(true);
    expect(result.warnings.map((issue) => issue.code)).toEqual(['NAMESPACE_NOT_DECLARED', 'NAMESPACE_ON_CLUSTER_SCOPED']);
    expect(getValidationSummary(result)).toBe('0 error(s), 2 warning(s)');
  });

  it('checks names and label values', () => {
    expect(isValidSubdomain('web.example-1')).toBe(true);
    expect(isValidSubdomain('-web')).toBe(false);
    expect(isValidSubdomain('a'.repeat(254))).toBe(false);
    expect(isValidLabelValue('')).toBe(true);
    expect(isValidLabelValue('v1.2_beta')).toBe(true);
    expect(isValidLabelValue('a'.repeat(64))).toBe(false);
  });
});
