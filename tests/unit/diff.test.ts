/**
 * Unit Tests: Three-way diff
 *
 * Covers the per-field rules between desired manifest, live object and the
 * baseline recorded at the previous apply.
 */

import { describe, it, expect } from 'vitest';
import {
  BASELINE_ANNOTATION,
  MANAGED_BY_LABEL,
  applyOperations,
  baselineOperations,
  diffResource,
  isSubset,
  readBaseline,
  stripBaseline,
  withBaseline,
} from '../../src/reconcile/diff.js';
import { resolveIdentity } from '../../src/reconcile/identity.js';
import { setPath } from '../../src/reconcile/json.js';
import type { JsonObject, LiveObject } from '../../src/reconcile/types.js';
import { createMockConfigMap, createMockDeployment } from '../helpers/manifests.js';

// =============================================================================
// Fixtures
// =============================================================================

/**
 * Live object as the engine would have left it after applying `applied`
 */
function createMockLive(applied: JsonObject, resourceVersion = '5'): LiveObject {
  const live = setPath(withBaseline(applied), ['metadata', 'resourceVersion'], resourceVersion);
  return setPath(live, ['metadata', 'uid'], 'uid-1');
}

const fast = createMockConfigMap('settings', 'web', { mode: 'fast' });
const slow = createMockConfigMap('settings', 'web', { mode: 'slow' });
const identity = resolveIdentity(fast);

// =============================================================================
// Baseline helpers
// =============================================================================

describe('baseline annotation', () => {
  it('records the manifest and the managed-by label', () => {
    const annotated = withBaseline(fast);
    expect(readBaseline(annotated)).toEqual(fast);
    expect(annotated.metadata).toEqual({
      name: 'settings',
      namespace: 'web',
      annotations: { [BASELINE_ANNOTATION]: JSON.stringify(fast) },
      labels: { [MANAGED_BY_LABEL]: 'kubeconverge' },
    });
  });

  it('does not nest a previous baseline inside the new one', () => {
    const twice = withBaseline(withBaseline(fast));
    const baseline = readBaseline(twice);
    expect(baseline?.metadata).toEqual({
      name: 'settings',
      namespace: 'web',
      labels: { [MANAGED_BY_LABEL]: 'kubeconverge' },
    });
  });

  it('drops an annotations map left empty by stripping', () => {
    const onlyBaseline = setPath(fast, ['metadata', 'annotations', BASELINE_ANNOTATION], '{}');
    expect(stripBaseline(onlyBaseline)).toEqual(fast);
  });

  it('keeps other annotations when stripping', () => {
    const annotated = setPath(withBaseline(fast), ['metadata', 'annotations', 'team'], 'core');
    expect(stripBaseline(annotated).metadata).toEqual({
      name: 'settings',
      namespace: 'web',
      annotations: { team: 'core' },
      labels: { [MANAGED_BY_LABEL]: 'kubeconverge' },
    });
  });

  it('ignores an unparseable baseline', () => {
    const broken = setPath(fast, ['metadata', 'annotations', BASELINE_ANNOTATION], 'not json');
    expect(readBaseline(broken)).toBeUndefined();
  });

  it('builds the operations that refresh the baseline', () => {
    expect(baselineOperations(slow)).toEqual([
      { op: 'set', path: ['metadata', 'annotations', BASELINE_ANNOTATION], value: JSON.stringify(slow) },
      { op: 'set', path: ['metadata', 'labels', MANAGED_BY_LABEL], value: 'kubeconverge' },
    ]);
  });
});

// =============================================================================
// isSubset
// =============================================================================

describe('isSubset', () => {
  it('lets live carry extra object members', () => {
    expect(isSubset({ a: 1 }, { a: 1, b: 2 })).toBe(true);
    expect(isSubset({ a: 1, b: 2 }, { a: 1 })).toBe(false);
  });

  it('compares arrays element-wise with equal length', () => {
    expect(isSubset([{ name: 'x' }], [{ name: 'x', pullPolicy: 'Always' }])).toBe(true);
    expect(isSubset([1], [1, 2])).toBe(false);
  });

  it('compares scalars by value and type', () => {
    expect(isSubset('1', 1)).toBe(false);
    expect(isSubset(null, null)).toBe(true);
    expect(isSubset(1, undefined)).toBe(false);
  });
});

// =============================================================================
// diffResource
// =============================================================================

describe('diffResource', () => {
  it('creates objects missing from the cluster', () => {
    expect(diffResource(identity, fast, undefined)).toEqual({ type: 'create', identity, manifest: fast });
  });

  it('deletes live-only objects only when pruning', () => {
    const live = createMockLive(fast);
    expect(diffResource(identity, undefined, live, { prune: true })).toEqual({ type: 'delete', identity });
    expect(diffResource(identity, undefined, live)).toBeUndefined();
    expect(diffResource(identity, undefined, undefined, { prune: true })).toBeUndefined();
  });

  it('is a no-op right after an apply', () => {
    expect(diffResource(identity, fast, createMockLive(fast))).toEqual({ type: 'noop', identity, manifest: fast });
  });

  it('ignores server defaults inside desired structures', () => {
    const deployment = createMockDeployment('proxy', 'squid', 'proxy:v1');
    const live = setPath(
      createMockLive(deployment),
      ['spec', 'template', 'spec', 'containers'],
      [{ name: 'proxy', image: 'proxy:v1', imagePullPolicy: 'IfNotPresent' }]
    );
    expect(diffResource(resolveIdentity(deployment), deployment, live)?.type).toBe('noop');
  });

  it('ignores status and server metadata', () => {
    const desired = setPath(fast, ['status', 'phase'], 'Active');
    const live = setPath(createMockLive(fast), ['metadata', 'generation'], 3);
    expect(diffResource(identity, desired, live)?.type).toBe('noop');
  });

  it('leaves fields alone that are in neither desired nor baseline', () => {
    const live = setPath(createMockLive(fast), ['data', 'other'], 'kept');
    expect(diffResource(identity, fast, live)?.type).toBe('noop');
  });

  it('patches a field whose live value still matches the baseline', () => {
    expect(diffResource(identity, slow, createMockLive(fast))).toEqual({
      type: 'patch',
      identity,
      manifest: slow,
      operations: [{ op: 'set', path: ['data', 'mode'], value: 'slow', previous: 'fast' }],
      baseChanged: false,
      resourceVersion: '5',
    });
  });

  it('sets fields on an object that has no baseline', () => {
    const unmanaged = { ...fast, metadata: { name: 'settings', namespace: 'web', resourceVersion: '2' } };
    const diff = diffResource(identity, slow, unmanaged);
    expect(diff?.type).toBe('patch');
    if (diff?.type === 'patch') {
      expect(diff.operations).toEqual([{ op: 'set', path: ['data', 'mode'], value: 'slow', previous: 'fast' }]);
    }
  });

  it('sets a whole new sub-object at its top-most missing path', () => {
    const withLabels = setPath(fast, ['metadata', 'labels'], { tier: 'backend' });
    const diff = diffResource(identity, withLabels, { ...fast, metadata: { name: 'settings', namespace: 'web' } });
    expect(diff?.type === 'patch' && diff.operations).toEqual([
      { op: 'set', path: ['metadata', 'labels'], value: { tier: 'backend' } },
    ]);
  });

  it('reports a conflict for a field changed outside the baseline', () => {
    const drifted = setPath(createMockLive(fast), ['data', 'mode'], 'manual');
    expect(diffResource(identity, slow, drifted)).toEqual({
      type: 'conflict',
      identity,
      manifest: slow,
      reason: 'changed outside of kubeconverge: data.mode',
      fields: ['data.mode'],
    });
  });

  it('reports a conflict when desired equals the baseline but live drifted', () => {
    const drifted = setPath(createMockLive(fast), ['data', 'mode'], 'manual');
    expect(diffResource(identity, fast, drifted)?.type).toBe('conflict');
  });

  it('overrides a drifted field when forced', () => {
    const drifted = setPath(createMockLive(fast), ['data', 'mode'], 'manual');
    const diff = diffResource(identity, slow, drifted, { force: true });
    expect(diff).toMatchObject({
      type: 'patch',
      baseChanged: true,
      operations: [{ op: 'set', path: ['data', 'mode'], value: 'slow', previous: 'manual' }],
    });
  });

  it('removes a field dropped from the manifest', () => {
    const before = createMockConfigMap('settings', 'web', { mode: 'fast', extra: 'x' });
    const diff = diffResource(identity, fast, createMockLive(before));
    expect(diff?.type === 'patch' && diff.operations).toEqual([
      { op: 'remove', path: ['data', 'extra'], previous: 'x' },
    ]);
  });

  it('reports a conflict when a dropped field changed outside the baseline', () => {
    const before = createMockConfigMap('settings', 'web', { mode: 'fast', extra: 'x' });
    const drifted = setPath(createMockLive(before), ['data', 'extra'], 'y');
    const diff = diffResource(identity, fast, drifted);
    expect(diff?.type === 'conflict' && diff.fields).toEqual(['data.extra']);
  });

  it('does nothing for a dropped field already gone from the cluster', () => {
    const before = createMockConfigMap('settings', 'web', { mode: 'fast', extra: 'x' });
    const live = setPath(createMockLive(before), ['data'], { mode: 'fast' });
    expect(diffResource(identity, fast, live)?.type).toBe('noop');
  });

  it('replaces arrays whole', () => {
    const v1 = createMockDeployment('proxy', 'squid', 'proxy:v1');
    const v2 = createMockDeployment('proxy', 'squid', 'proxy:v2');
    const diff = diffResource(resolveIdentity(v2), v2, createMockLive(v1));
    expect(diff?.type === 'patch' && diff.operations).toEqual([
      {
        op: 'set',
        path: ['spec', 'template', 'spec', 'containers'],
        value: [{ name: 'proxy', image: 'proxy:v2' }],
        previous: [{ name: 'proxy', image: 'proxy:v1' }],
      },
    ]);
  });

  it('lists every conflicting field in the reason', () => {
    const before = createMockConfigMap('settings', 'web', { a: '1', b: '2' });
    const after = createMockConfigMap('settings', 'web', { a: '10', b: '20' });
    const live = setPath(setPath(createMockLive(before), ['data', 'a'], 'x'), ['data', 'b'], 'y');
    const diff = diffResource(identity, after, live);
    expect(diff?.type === 'conflict' && diff.reason).toBe('changed outside of kubeconverge: data.a, data.b');
  });
});

describe('applyOperations', () => {
  it('applies sets and removes without touching the input', () => {
    const target = { data: { a: '1', b: '2' } };
    const result = applyOperations(target, [
      { op: 'set', path: ['data', 'a'], value: '10' },
      { op: 'remove', path: ['data', 'b'], previous: '2' },
    ]);
    expect(result).toEqual({ data: { a: '10' } });
    expect(target).toEqual({ data: { a: '1', b: '2' } });
  });
});
