/**
 * Kind priority table
 *
 * Lower tiers are applied first. Deletes run after every other tier,
 * in reverse priority.
 */

import { UnresolvableOrderingError } from './errors.js';

// =============================================================================
// Priority Table
// =============================================================================

export interface PriorityTier {
  tier: number;
  description: string;
  kinds: readonly string[];
}

export const PRIORITY_TABLE: readonly PriorityTier[] = [
  { tier: 0, description: 'namespaces', kinds: ['Namespace'] },
  { tier: 1, description: 'custom resource definitions', kinds: ['CustomResourceDefinition'] },
  {
    tier: 2,
    description: 'pod dependencies',
    kinds: ['ServiceAccount', 'Secret', 'ConfigMap', 'PersistentVolumeClaim', 'Service'],
  },
];

/**
 * Tier of every kind not listed in the table
 */
export const DEFAULT_TIER = 3;

/**
 * Kind name to the kinds it must follow
 */
export type KindDependencies = Readonly<Record<string, readonly string[]>>;

// =============================================================================
// Lookup
// =============================================================================

/**
 * Base tier of a kind from the table alone
 */
export function basePriority(kind: string): number {
  const entry = PRIORITY_TABLE.find((tier) => tier.kinds.includes(kind));
  return entry?.tier ?? DEFAULT_TIER;
}

/**
 * Resolves kind tiers, lifting a kind above the tiers of the kinds it depends on
 */
export class PriorityResolver {
  private readonly resolved = new Map<string, number>();

  constructor(private readonly dependencies: KindDependencies = {}) {
    this.validate();
  }

  priorityOf(kind: string): number {
    return this.resolve(kind, []);
  }

  /** Kinds declared as prerequisites of a kind */
  dependenciesOf(kind: string): readonly string[] {
    return Object.hasOwn(this.dependencies, kind) ? this.dependencies[kind] : [];
  }

  private resolve(kind: string, stack: string[]): number {
    const cached = this.resolved.get(kind);
    if (cached !== undefined) return cached;

    if (stack.includes(kind)) {
      throw new UnresolvableOrderingError([...stack.slice(stack.indexOf(kind)), kind]);
    }

    let tier = basePriority(kind);
    for (const dependency of this.dependenciesOf(kind)) {
      tier = Math.max(tier, this.resolve(dependency, [...stack, kind]) + 1);
    }

    this.resolved.set(kind, tier);
    return tier;
  }

  private validate(): void {
    for (const kind of Object.keys(this.dependencies)) {
      this.resolve(kind, []);
    }
  }
}
