/**
 * Unit Tests: Kind priority and apply planning
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_TIER, PriorityResolver, basePriority } from '../../src/reconcile/priority.js';
import { actionableSteps, describePlan, hasUnresolvedConflicts, isPlanEmpty, planApply } from '../../src/reconcile/plan.js';
import { UnresolvableOrderingError } from '../../src/reconcile/errors.js';
import { formatIdentity, resolveIdentity } from '../../src/reconcile/identity.js';
import type { DiffResult, JsonObject } from '../../src/reconcile/types.js';
import { createMockConfigMap, createMockDeployment, createMockNamespace } from '../helpers/manifests.js';

// =============================================================================
// Fixtures
// =============================================================================

function createDiff(manifest: JsonObject): DiffResult {
  return { type: 'create', identity: resolveIdentity(manifest), manifest };
}

function deleteDiff(manifest: JsonObject): DiffResult {
  return { type: 'delete', identity: resolveIdentity(manifest) };
}

const crd: JsonObject = {
  apiVersion: 'apiextensions.k8s.io/v1',
  kind: 'CustomResourceDefinition',
  metadata: { name: 'caches.example.com' },
  spec: { group: 'example.com', names: { kind: 'Cache', plural: 'caches' } },
};

const cache: JsonObject = {
  apiVersion: 'example.com/v1',
  kind: 'Cache',
  metadata: { name: 'hot', namespace: 'web' },
  spec: { size: 3 },
};

// =============================================================================
// Priority
// =============================================================================

describe('basePriority', () => {
  it('orders namespaces, definitions and pod dependencies first', () => {
    expect(basePriority('Namespace')).toBe(0);
    expect(basePriority('CustomResourceDefinition')).toBe(1);
    expect(basePriority('ConfigMap')).toBe(2);
    expect(basePriority('Service')).toBe(2);
    expect(basePriority('Deployment')).toBe(DEFAULT_TIER);
  });
});

describe('PriorityResolver', () => {
  it('lifts a kind above the kinds it depends on', () => {
    const resolver = new PriorityResolver({ Ingress: ['Deployment'], Deployment: ['Cache'] });
    expect(resolver.priorityOf('Cache')).toBe(3);
    expect(resolver.priorityOf('Deployment')).toBe(4);
    expect(resolver.priorityOf('Ingress')).toBe(5);
  });

  it('never lowers a kind below its table tier', () => {
    const resolver = new PriorityResolver({ Deployment: ['Namespace'] });
    expect(resolver.priorityOf('Deployment')).toBe(3);
  });

  it('rejects dependency cycles when constructed', () => {
    expect(() => new PriorityResolver({ A: ['B'], B: ['A'] })).toThrow(UnresolvableOrderingError);
    expect(() => new PriorityResolver({ A: ['B'], B: ['A'] })).toThrow('Kind dependencies form a cycle: A -> B -> A');
  });
});

// =============================================================================
// planApply
// =============================================================================

describe('planApply', () => {
  it('orders a namespace before the objects inside it', () => {
    const plan = planApply([
      createDiff(createMockDeployment('proxy', 'squid', 'proxy:v1')),
      createDiff(createMockNamespace('squid')),
    ]);

    expect(plan.tiers.map((tier) => tier.map((step) => formatIdentity(step.identity)))).toEqual([
      ['Namespace/squid'],
      ['Deployment/squid/proxy'],
    ]);
    expect(plan.steps[1].dependsOn).toEqual([{ apiVersion: 'v1', kind: 'Namespace', name: 'squid' }]);
  });

  it('keeps input order within a tier', () => {
    const plan = planApply([
      createDiff(createMockConfigMap('b', 'web', {})),
      createDiff(createMockConfigMap('a', 'web', {})),
    ]);
    expect(plan.steps.map((step) => step.identity.name)).toEqual(['b', 'a']);
    expect(plan.tiers).toHaveLength(1);
  });

  it('places custom resources after the definition of their kind', () => {
    const plan = planApply([createDiff(cache), createDiff(crd)]);
    const cacheStep = plan.steps.find((step) => step.identity.kind === 'Cache');

    expect(cacheStep?.tier).toBe(3);
    expect(cacheStep?.dependsOn).toEqual([resolveIdentity(crd)]);
    expect(plan.steps[0].identity.kind).toBe('CustomResourceDefinition');
  });

  it('ignores a definition for another group', () => {
    const otherGroup = { ...crd, spec: { group: 'other.io', names: { kind: 'Cache' } } };
    const plan = planApply([createDiff(cache), createDiff(otherGroup)]);
    expect(plan.steps.find((step) => step.identity.kind === 'Cache')?.dependsOn).toEqual([]);
  });

  it('applies declared kind dependencies', () => {
    const plan = planApply(
      [createDiff(createMockDeployment('web', 'web', 'nginx')), createDiff(cache)],
      { kindDependencies: { Deployment: ['Cache'] } }
    );
    expect(plan.steps.map((step) => [step.identity.kind, step.tier])).toEqual([
      ['Cache', 3],
      ['Deployment', 4],
    ]);
  });

  it('places dependents of a custom kind above its lifted instances', () => {
    const plan = planApply(
      [createDiff(createMockDeployment('web', 'web', 'nginx')), createDiff(cache), createDiff(crd)],
      { kindDependencies: { CustomResourceDefinition: ['Service'], Deployment: ['Cache'] } }
    );
    expect(plan.steps.map((step) => [step.identity.kind, step.tier])).toEqual([
      ['CustomResourceDefinition', 3],
      ['Cache', 4],
      ['Deployment', 5],
    ]);
    expect(plan.tiers).toHaveLength(3);
  });

  it('rejects a namespace declared to follow a kind that lives in it', () => {
    expect(() =>
      planApply([createDiff(createMockNamespace('web')), createDiff(cache)], {
        kindDependencies: { Namespace: ['Cache'] },
      })
    ).toThrow(UnresolvableOrderingError);
  });

  it('runs deletes last in reverse priority', () => {
    const plan = planApply([
      deleteDiff(createMockNamespace('old')),
      deleteDiff(createMockConfigMap('settings', 'old', {})),
      deleteDiff(createMockDeployment('web', 'old', 'nginx')),
      createDiff(createMockConfigMap('fresh', 'web', {})),
    ]);

    expect(plan.steps.map((step) => [formatIdentity(step.identity), step.tier])).toEqual([
      ['ConfigMap/web/fresh', 2],
      ['Deployment/old/web', 3],
      ['ConfigMap/old/settings', 4],
      ['Namespace/old', 6],
    ]);
  });

  it('summarizes steps by diff type', () => {
    const plan = planApply([
      createDiff(createMockNamespace('web')),
      { type: 'noop', identity: resolveIdentity(createMockConfigMap('a', 'web', {})) },
      {
        type: 'conflict',
        identity: resolveIdentity(createMockConfigMap('b', 'web', {})),
        reason: 'changed outside of kubeconverge: data.x',
        fields: ['data.x'],
      },
    ]);

    expect(plan.summary).toEqual({ create: 1, patch: 0, delete: 0, noop: 1, conflict: 1, unreadable: 0 });
    expect(plan.conflicts).toHaveLength(1);
    expect(hasUnresolvedConflicts(plan)).toBe(true);
    expect(actionableSteps(plan)).toHaveLength(2);
  });

  it('is empty when every step is a no-op', () => {
    const plan = planApply([{ type: 'noop', identity: resolveIdentity(createMockNamespace('web')) }]);
    expect(isPlanEmpty(plan)).toBe(true);
    expect(describePlan(plan)).toEqual([]);
  });

  it('describes actionable steps one per line', () => {
    const manifest = createMockConfigMap('settings', 'web', { mode: 'slow' });
    const plan = planApply([
      createDiff(createMockNamespace('web')),
      {
        type: 'patch',
        identity: resolveIdentity(manifest),
        manifest,
        operations: [{ op: 'set', path: ['data', 'mode'], value: 'slow' }],
        baseChanged: true,
      },
    ]);

    expect(describePlan(plan)).toEqual([
      '[tier 0] create Namespace/web',
      '[tier 2] patch ConfigMap/web/settings (1 field, forced)',
    ]);
  });

  it('rejects cyclic kind dependencies', () => {
    expect(() => planApply([], { kindDependencies: { A: ['A'] } })).toThrow(UnresolvableOrderingError);
  });
});
