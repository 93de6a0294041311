/**
 * Apply Planner
 *
 * Orders diff results into execution tiers. The plan is a pure function of
 * its inputs; nothing here talks to the cluster.
 */

import { apiGroupOf, formatIdentity } from './identity.js';
import { getString } from './json.js';
import { UnresolvableOrderingError } from './errors.js';
import { PriorityResolver, type KindDependencies } from './priority.js';
import type {
  ApplyPlan,
  ConflictDiff,
  DiffResult,
  Manifest,
  PlanStep,
  PlanSummary,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface PlanOptions {
  /** Declared ordering between kinds: kind -> kinds it must follow */
  kindDependencies?: KindDependencies;
}

interface CustomKindSource {
  group: string;
  kind: string;
  /** Position of the defining step among the apply steps */
  index: number;
}

// =============================================================================
// Planning
// =============================================================================

function manifestOf(diff: DiffResult): Manifest | undefined {
  return diff.type === 'delete' ? undefined : diff.manifest;
}

/**
 * Build the ordered plan for a set of diff results
 *
 * @throws UnresolvableOrderingError when declared kind dependencies form a cycle,
 *   alone or through the namespaces and definitions steps follow
 */
export function planApply(diffs: readonly DiffResult[], options: PlanOptions = {}): ApplyPlan {
  const resolver = new PriorityResolver(options.kindDependencies);

  const applies: Array<{ diff: DiffResult; order: number }> = [];
  const deletes: Array<{ diff: DiffResult; order: number; priority: number }> = [];
  diffs.forEach((diff, order) => {
    if (diff.type === 'delete') {
      deletes.push({ diff, order, priority: resolver.priorityOf(diff.identity.kind) });
    } else {
      applies.push({ diff, order });
    }
  });

  const namespaceSteps = new Map<string, number>();
  const customKinds: CustomKindSource[] = [];

  applies.forEach(({ diff }, index) => {
    const { identity } = diff;

    if (identity.kind === 'Namespace') {
      namespaceSteps.set(identity.name, index);
    }

    if (identity.kind === 'CustomResourceDefinition') {
      const manifest = manifestOf(diff);
      const group = getString(manifest, ['spec', 'group']);
      const kind = getString(manifest, ['spec', 'names', 'kind']);
      if (group !== undefined && kind !== undefined) {
        customKinds.push({ group, kind, index });
      }
    }
  });

  // Indexes of the steps each apply step must follow
  const prerequisites = applies.map(({ diff }) => {
    const { identity } = diff;
    const links: number[] = [];

    const namespaceStep = identity.namespace ? namespaceSteps.get(identity.namespace) : undefined;
    if (namespaceStep !== undefined) links.push(namespaceStep);

    const group = apiGroupOf(identity.apiVersion);
    const definition = customKinds.find((source) => source.group === group && source.kind === identity.kind);
    if (definition) links.push(definition.index);

    return links;
  });

  const applyTiers = resolveTiers(
    applies.map(({ diff }) => diff.identity.kind),
    prerequisites,
    resolver
  );

  const steps: PlanStep[] = applies.map(({ diff, order }, index) => ({
    diff,
    identity: diff.identity,
    tier: applyTiers[index],
    order,
    dependsOn: prerequisites[index].map((link) => applies[link].diff.identity),
  }));

  const lastTier = steps.reduce((max, step) => Math.max(max, step.tier), -1);
  const highestDeletePriority = deletes.reduce((max, entry) => Math.max(max, entry.priority), 0);

  for (const { diff, order, priority } of deletes) {
    steps.push({
      diff,
      identity: diff.identity,
      tier: lastTier + 1 + (highestDeletePriority - priority),
      order,
      dependsOn: [],
    });
  }

  steps.sort((a, b) => a.tier - b.tier || a.order - b.order);

  const tiers: PlanStep[][] = [];
  for (const step of steps) {
    const current = tiers[tiers.length - 1];
    if (current !== undefined && current[0].tier === step.tier) {
      current.push(step);
    } else {
      tiers.push([step]);
    }
  }

  const conflicts = steps
    .map((step) => step.diff)
    .filter((diff): diff is ConflictDiff => diff.type === 'conflict');

  return { steps, tiers, conflicts, summary: summarizeSteps(steps) };
}

/**
 * Tiers of the apply steps
 *
 * A step starts at its kind's priority and is lifted above the steps it
 * follows (its namespace, its custom resource definition) and above every
 * step of a kind it is declared to depend on. Lifts repeat until no tier
 * moves, so a kind depending on a lifted custom kind lands above it.
 *
 * @throws UnresolvableOrderingError when the lifts never settle
 */
function resolveTiers(
  kinds: readonly string[],
  prerequisites: readonly number[][],
  resolver: PriorityResolver
): number[] {
  const tiers = kinds.map((kind) => resolver.priorityOf(kind));

  for (let round = 0; ; round++) {
    const kindTiers = new Map<string, number>();
    kinds.forEach((kind, index) => {
      kindTiers.set(kind, Math.max(kindTiers.get(kind) ?? -1, tiers[index]));
    });

    const rising: string[] = [];
    kinds.forEach((kind, index) => {
      let tier = tiers[index];
      for (const link of prerequisites[index]) {
        tier = Math.max(tier, tiers[link] + 1);
      }
      for (const dependency of resolver.dependenciesOf(kind)) {
        const dependencyTier = kindTiers.get(dependency);
        if (dependencyTier !== undefined) tier = Math.max(tier, dependencyTier + 1);
      }
      if (tier > tiers[index]) {
        tiers[index] = tier;
        rising.push(kind);
      }
    });

    if (rising.length === 0) return tiers;
    if (round >= kinds.length) {
      throw new UnresolvableOrderingError([...new Set(rising)]);
    }
  }
}

function summarizeSteps(steps: readonly PlanStep[]): PlanSummary {
  const summary: PlanSummary = { create: 0, patch: 0, delete: 0, noop: 0, conflict: 0, unreadable: 0 };
  for (const step of steps) {
    summary[step.diff.type]++;
  }
  return summary;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Steps that change something (no-ops excluded)
 */
export function actionableSteps(plan: ApplyPlan): PlanStep[] {
  return plan.steps.filter((step) => step.diff.type !== 'noop');
}

export function hasUnresolvedConflicts(plan: ApplyPlan): boolean {
  return plan.conflicts.length > 0;
}

export function isPlanEmpty(plan: ApplyPlan): boolean {
  return actionableSteps(plan).length === 0;
}

/**
 * One line per actionable step
 */
export function describePlan(plan: ApplyPlan): string[] {
  return actionableSteps(plan).map((step) => {
    const target = formatIdentity(step.identity);
    const diff = step.diff;
    switch (diff.type) {
      case 'create':
        return `[tier ${step.tier}] create ${target}`;
      case 'patch':
        return `[tier ${step.tier}] patch ${target} (${diff.operations.length} field${diff.operations.length === 1 ? '' : 's'}${diff.baseChanged ? ', forced' : ''})`;
      case 'delete':
        return `[tier ${step.tier}] delete ${target}`;
      case 'conflict':
        return `[tier ${step.tier}] conflict ${target}: ${diff.reason}`;
      case 'unreadable':
        return `[tier ${step.tier}] unreadable ${target}: ${diff.reason}`;
      case 'noop':
        return `[tier ${step.tier}] unchanged ${target}`;
    }
  });
}
