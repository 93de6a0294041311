/**
 * Core types for the reconciliation engine
 */

// =============================================================================
// JSON Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

// =============================================================================
// Objects
// =============================================================================

/**
 * Identity of a cluster object. Absent namespace means cluster-scoped.
 */
export interface ResourceIdentity {
  readonly apiVersion: string;
  readonly kind: string;
  readonly namespace?: string;
  readonly name: string;
}

/**
 * One desired resource, frozen after normalization
 */
export type Manifest = JsonObject;

/**
 * An object as read back from the cluster, including server-assigned fields
 */
export type LiveObject = JsonObject;

/**
 * Path of object keys from the document root
 */
export type FieldPath = readonly string[];

// =============================================================================
// Diff Results
// =============================================================================

export type FieldOperation =
  | { op: 'set'; path: FieldPath; value: JsonValue; previous?: JsonValue }
  | { op: 'remove'; path: FieldPath; previous: JsonValue };

export interface CreateDiff {
  type: 'create';
  identity: ResourceIdentity;
  manifest: Manifest;
}

export interface NoopDiff {
  type: 'noop';
  identity: ResourceIdentity;
  manifest?: Manifest;
}

export interface PatchDiff {
  type: 'patch';
  identity: ResourceIdentity;
  manifest: Manifest;
  operations: FieldOperation[];
  /** Set when a forced operation overrode a field changed out-of-band */
  baseChanged: boolean;
  /** resourceVersion of the live object the diff was computed against */
  resourceVersion?: string;
}

export interface DeleteDiff {
  type: 'delete';
  identity: ResourceIdentity;
}

export interface ConflictDiff {
  type: 'conflict';
  identity: ResourceIdentity;
  manifest?: Manifest;
  reason: string;
  /** Dotted paths of the conflicting fields */
  fields: string[];
}

/**
 * Desired object whose live state could not be read while planning.
 * The executor reads it again before acting.
 */
export interface UnreadableDiff {
  type: 'unreadable';
  identity: ResourceIdentity;
  manifest: Manifest;
  reason: string;
}

export type DiffResult = CreateDiff | NoopDiff | PatchDiff | DeleteDiff | ConflictDiff | UnreadableDiff;

export type DiffType = DiffResult['type'];

// =============================================================================
// Plan
// =============================================================================

export interface PlanStep {
  diff: DiffResult;
  identity: ResourceIdentity;
  /** Execution tier; lower tiers run first */
  tier: number;
  /** Position in the input order */
  order: number;
  /** Steps that must succeed before this one is attempted */
  dependsOn: ResourceIdentity[];
}

export interface PlanSummary {
  create: number;
  patch: number;
  delete: number;
  noop: number;
  conflict: number;
  unreadable: number;
}

export interface ApplyPlan {
  /** Every step, sorted by tier then input order */
  steps: PlanStep[];
  /** Steps grouped by tier, ascending */
  tiers: PlanStep[][];
  conflicts: ConflictDiff[];
  summary: PlanSummary;
}

// =============================================================================
// Execution
// =============================================================================

export type ReadinessResult =
  | { status: 'ready' }
  | { status: 'timed-out'; lastReason: string }
  | { status: 'failed'; reason: string }
  | { status: 'cancelled'; lastReason: string };

export type StepOutcome =
  | { outcome: 'created' }
  | { outcome: 'patched'; baseChanged: boolean }
  | { outcome: 'deleted' }
  | { outcome: 'noop' }
  | { outcome: 'conflict'; reason: string; fields: string[] }
  | { outcome: 'failed'; reason: string }
  | { outcome: 'skipped-dependency'; dependency: string }
  | { outcome: 'cancelled' };

export type OutcomeKind = StepOutcome['outcome'];

export type ExecutionEntry = StepOutcome & {
  identity: ResourceIdentity;
  tier: number;
  /** Number of transport attempts made */
  attempts: number;
  readiness?: ReadinessResult;
};

export type ExecutionSummary = Record<OutcomeKind, number>;

export interface ExecutionReport {
  entries: ExecutionEntry[];
  summary: ExecutionSummary;
  success: boolean;
  startedAt: string;
  completedAt: string;
}
