/**
 * Per-kind readiness predicates for live objects
 *
 * Kinds without a predicate are ready as soon as they exist.
 */

import { getArray, getNumber, getString, isJsonObject } from './json.js';
import type { LiveObject } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type Readiness =
  | { state: 'ready' }
  | { state: 'pending'; reason: string }
  | { state: 'failed'; reason: string };

type ReadinessPredicate = (live: LiveObject) => Readiness;

const READY: Readiness = { state: 'ready' };

function pending(reason: string): Readiness {
  return { state: 'pending', reason };
}

function failed(reason: string): Readiness {
  return { state: 'failed', reason };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Status of a condition by type, e.g. conditionStatus(live, 'Ready') === 'True'
 */
export function conditionStatus(live: LiveObject, type: string): { status?: string; reason?: string; message?: string } | undefined {
  const conditions = getArray(live, ['status', 'conditions']) ?? [];
  const condition = conditions.find((entry) => isJsonObject(entry) && entry.type === type);
  if (!isJsonObject(condition)) return undefined;
  return {
    status: getString(condition, ['status']),
    reason: getString(condition, ['reason']),
    message: getString(condition, ['message']),
  };
}

function generationObserved(live: LiveObject): Readiness | undefined {
  const generation = getNumber(live, ['metadata', 'generation']);
  const observed = getNumber(live, ['status', 'observedGeneration']);
  if (generation !== undefined && (observed === undefined || observed < generation)) {
    return pending(`waiting for generation ${generation} to be observed`);
  }
  return undefined;
}

function count(live: LiveObject, field: string): number {
  return getNumber(live, ['status', field]) ?? 0;
}

// =============================================================================
// Predicates
// =============================================================================

function deploymentReadiness(live: LiveObject): Readiness {
  const progressing = conditionStatus(live, 'Progressing');
  if (progressing?.reason === 'ProgressDeadlineExceeded') {
    return failed(progressing.message ?? 'progress deadline exceeded');
  }

  const notObserved = generationObserved(live);
  if (notObserved) return notObserved;

  const desired = getNumber(live, ['spec', 'replicas']) ?? 1;
  const updated = count(live, 'updatedReplicas');
  const total = count(live, 'replicas');
  const available = count(live, 'availableReplicas');

  if (updated < desired) {
    return pending(`${updated} of ${desired} updated replicas are available`);
  }
  if (total > updated) {
    return pending(`${total - updated} old replicas are pending termination`);
  }
  if (available < updated) {
    return pending(`${available} of ${updated} updated replicas are available`);
  }
  return READY;
}

function statefulSetReadiness(live: LiveObject): Readiness {
  const notObserved = generationObserved(live);
  if (notObserved) return notObserved;

  const desired = getNumber(live, ['spec', 'replicas']) ?? 1;
  const ready = count(live, 'readyReplicas');
  const updated = count(live, 'updatedReplicas');

  if (getString(live, ['spec', 'updateStrategy', 'type']) !== 'OnDelete' && updated < desired) {
    return pending(`${updated} of ${desired} replicas are updated`);
  }
  if (ready < desired) {
    return pending(`${ready} of ${desired} replicas are ready`);
  }
  return READY;
}

function daemonSetReadiness(live: LiveObject): Readiness {
  const notObserved = generationObserved(live);
  if (notObserved) return notObserved;

  const desired = count(live, 'desiredNumberScheduled');
  const updated = count(live, 'updatedNumberScheduled');
  const available = count(live, 'numberAvailable');

  if (updated < desired) {
    return pending(`${updated} of ${desired} scheduled pods are updated`);
  }
  if (available < desired) {
    return pending(`${available} of ${desired} scheduled pods are available`);
  }
  return READY;
}

function replicaSetReadiness(live: LiveObject): Readiness {
  const notObserved = generationObserved(live);
  if (notObserved) return notObserved;

  const desired = getNumber(live, ['spec', 'replicas']) ?? 1;
  const ready = count(live, 'readyReplicas');
  return ready < desired ? pending(`${ready} of ${desired} replicas are ready`) : READY;
}

function jobReadiness(live: LiveObject): Readiness {
  const failedCondition = conditionStatus(live, 'Failed');
  if (failedCondition?.status === 'True') {
    return failed(failedCondition.message ?? failedCondition.reason ?? 'job failed');
  }

  const backoffLimit = getNumber(live, ['spec', 'backoffLimit']) ?? 6;
  const failures = count(live, 'failed');
  if (failures > 0 && failures >= backoffLimit) {
    return failed(`backoff limit reached after ${failures} failed pods`);
  }

  if (conditionStatus(live, 'Complete')?.status === 'True') return READY;

  const completions = getNumber(live, ['spec', 'completions']) ?? 1;
  const succeeded = count(live, 'succeeded');
  return succeeded >= completions ? READY : pending(`${succeeded} of ${completions} completions`);
}

function podReadiness(live: LiveObject): Readiness {
  const phase = getString(live, ['status', 'phase']);
  if (phase === 'Succeeded') return READY;
  if (phase === 'Failed') {
    return failed(getString(live, ['status', 'message']) ?? getString(live, ['status', 'reason']) ?? 'pod failed');
  }
  if (conditionStatus(live, 'Ready')?.status === 'True') return READY;
  return pending(`pod is ${phase ?? 'Pending'}`);
}

function persistentVolumeClaimReadiness(live: LiveObject): Readiness {
  const phase = getString(live, ['status', 'phase']);
  if (phase === 'Bound') return READY;
  if (phase === 'Lost') return failed('claim lost its volume');
  return pending(`claim is ${phase ?? 'Pending'}`);
}

function namespaceReadiness(live: LiveObject): Readiness {
  const phase = getString(live, ['status', 'phase']);
  return phase === 'Active' ? READY : pending(`namespace is ${phase ?? 'not active'}`);
}

function customResourceDefinitionReadiness(live: LiveObject): Readiness {
  return conditionStatus(live, 'Established')?.status === 'True'
    ? READY
    : pending('definition is not established');
}

function serviceReadiness(live: LiveObject): Readiness {
  if (getString(live, ['spec', 'type']) !== 'LoadBalancer') return READY;
  const ingress = getArray(live, ['status', 'loadBalancer', 'ingress']) ?? [];
  return ingress.length > 0 ? READY : pending('load balancer ingress not assigned');
}

const PREDICATES: Readonly<Record<string, ReadinessPredicate>> = {
  Deployment: deploymentReadiness,
  StatefulSet: statefulSetReadiness,
  DaemonSet: daemonSetReadiness,
  ReplicaSet: replicaSetReadiness,
  Job: jobReadiness,
  Pod: podReadiness,
  PersistentVolumeClaim: persistentVolumeClaimReadiness,
  Namespace: namespaceReadiness,
  CustomResourceDefinition: customResourceDefinitionReadiness,
  Service: serviceReadiness,
};

/**
 * Evaluate readiness of a live object of the given kind
 */
export function evaluateReadiness(kind: string, live: LiveObject): Readiness {
  const predicate = Object.hasOwn(PREDICATES, kind) ? PREDICATES[kind] : undefined;
  return predicate ? predicate(live) : READY;
}

export function hasReadinessPredicate(kind: string): boolean {
  return Object.hasOwn(PREDICATES, kind);
}
