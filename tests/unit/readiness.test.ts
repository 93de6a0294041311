/**
 * Unit Tests: Readiness predicates and the wait monitor
 */

import { describe, it, expect } from 'vitest';
import { TransportError } from '../../src/api/transport.js';
import { LiveStateFetcher } from '../../src/reconcile/live.js';
import { evaluateReadiness, hasReadinessPredicate } from '../../src/reconcile/readiness.js';
import { WaitMonitor } from '../../src/reconcile/wait.js';
import { resolveIdentity } from '../../src/reconcile/identity.js';
import { isJsonObject } from '../../src/reconcile/json.js';
import type { JsonObject } from '../../src/reconcile/types.js';
import { FakeCluster, createSilentLogger } from '../helpers/fake-cluster.js';
import { createMockConfigMap, createMockDeployment } from '../helpers/manifests.js';

function withStatus(object: JsonObject, status: JsonObject, generation?: number): JsonObject {
  const metadata = isJsonObject(object.metadata) ? object.metadata : {};
  return {
    ...object,
    metadata: generation === undefined ? metadata : { ...metadata, generation },
    status,
  };
}

// =============================================================================
// Predicates
// =============================================================================

describe('evaluateReadiness', () => {
  const deployment = createMockDeployment('web', 'web', 'nginx');

  it('waits for the deployment generation to be observed', () => {
    const live = withStatus(deployment, { observedGeneration: 1 }, 2);
    expect(evaluateReadiness('Deployment', live)).toEqual({
      state: 'pending',
      reason: 'waiting for generation 2 to be observed',
    });
  });

  it('reports a rolled-out deployment ready', () => {
    const live = withStatus(
      deployment,
      { observedGeneration: 2, replicas: 1, updatedReplicas: 1, availableReplicas: 1 },
      2
    );
    expect(evaluateReadiness('Deployment', live)).toEqual({ state: 'ready' });
  });

  it('waits for old replicas to terminate', () => {
    const live = withStatus(deployment, { replicas: 2, updatedReplicas: 1, availableReplicas: 1 });
    expect(evaluateReadiness('Deployment', live)).toEqual({
      state: 'pending',
      reason: '1 old replicas are pending termination',
    });
  });

  it('fails a deployment past its progress deadline', () => {
    const live = withStatus(deployment, {
      conditions: [{ type: 'Progressing', status: 'False', reason: 'ProgressDeadlineExceeded', message: 'timed out' }],
    });
    expect(evaluateReadiness('Deployment', live)).toEqual({ state: 'failed', reason: 'timed out' });
  });

  it('follows pod phase and the Ready condition', () => {
    const pod = { apiVersion: 'v1', kind: 'Pod', metadata: { name: 'p' } };
    expect(evaluateReadiness('Pod', withStatus(pod, { phase: 'Pending' }))).toEqual({
      state: 'pending',
      reason: 'pod is Pending',
    });
    expect(
      evaluateReadiness('Pod', withStatus(pod, { phase: 'Running', conditions: [{ type: 'Ready', status: 'True' }] }))
    ).toEqual({ state: 'ready' });
    expect(evaluateReadiness('Pod', withStatus(pod, { phase: 'Failed', reason: 'Evicted' }))).toEqual({
      state: 'failed',
      reason: 'Evicted',
    });
  });

  it('completes a job by condition or by count', () => {
    const job = { apiVersion: 'batch/v1', kind: 'Job', metadata: { name: 'j' }, spec: { completions: 2 } };
    expect(evaluateReadiness('Job', withStatus(job, { succeeded: 1 }))).toEqual({
      state: 'pending',
      reason: '1 of 2 completions',
    });
    expect(evaluateReadiness('Job', withStatus(job, { succeeded: 2 }))).toEqual({ state: 'ready' });
    expect(
      evaluateReadiness('Job', withStatus(job, { conditions: [{ type: 'Complete', status: 'True' }] }))
    ).toEqual({ state: 'ready' });
  });

  it('checks claims, namespaces and definitions by status', () => {
    const object = { metadata: { name: 'x' } };
    expect(evaluateReadiness('PersistentVolumeClaim', withStatus(object, { phase: 'Bound' }))).toEqual({ state: 'ready' });
    expect(evaluateReadiness('PersistentVolumeClaim', withStatus(object, { phase: 'Lost' }))).toEqual({
      state: 'failed',
      reason: 'claim lost its volume',
    });
    expect(evaluateReadiness('Namespace', withStatus(object, { phase: 'Terminating' }))).toEqual({
      state: 'pending',
      reason: 'namespace is Terminating',
    });
    expect(
      evaluateReadiness(
        'CustomResourceDefinition',
        withStatus(object, { conditions: [{ type: 'Established', status: 'True' }] })
      )
    ).toEqual({ state: 'ready' });
  });

  it('waits for load balancer ingress only on LoadBalancer services', () => {
    const service = { apiVersion: 'v1', kind: 'Service', metadata: { name: 's' }, spec: { type: 'ClusterIP' } };
    expect(evaluateReadiness('Service', service)).toEqual({ state: 'ready' });
    const balancer = { ...service, spec: { type: 'LoadBalancer' } };
    expect(evaluateReadiness('Service', balancer)).toEqual({
      state: 'pending',
      reason: 'load balancer ingress not assigned',
    });
  });

  it('treats kinds without a predicate as ready', () => {
    expect(hasReadinessPredicate('ConfigMap')).toBe(false);
    expect(evaluateReadiness('ConfigMap', createMockConfigMap('a', 'web', {}))).toEqual({ state: 'ready' });
  });
});

// =============================================================================
// WaitMonitor
// =============================================================================

describe('WaitMonitor', () => {
  const logger = createSilentLogger();
  const deployment = createMockDeployment('web', 'web', 'nginx');
  const identity = resolveIdentity(deployment);

  function createMonitor(cluster: FakeCluster, onSleep: () => void = () => undefined) {
    const clock: { now: number; sleeps: number[] } = { now: 0, sleeps: [] };
    const monitor = new WaitMonitor(new LiveStateFetcher(cluster, logger), {
      intervalMs: 1000,
      logger,
      now: () => clock.now,
      sleep: async (ms) => {
        clock.sleeps.push(ms);
        clock.now += ms;
        onSleep();
      },
    });
    return { monitor, clock };
  }

  it('polls until the object is ready', async () => {
    const cluster = new FakeCluster();
    cluster.seed(deployment);
    const { monitor, clock } = createMonitor(cluster, () => {
      cluster.mutate(identity, (object) =>
        withStatus(object, { replicas: 1, updatedReplicas: 1, availableReplicas: 1 })
      );
    });

    await expect(monitor.waitReady(identity, 10_000)).resolves.toEqual({ status: 'ready' });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('never sleeps past the deadline', async () => {
    const cluster = new FakeCluster();
    const { monitor, clock } = createMonitor(cluster);

    await expect(monitor.waitReady(identity, 2500)).resolves.toEqual({
      status: 'timed-out',
      lastReason: 'object not found',
    });
    expect(clock.sleeps).toEqual([1000, 1000, 500]);
  });

  it('makes no request once the signal is aborted', async () => {
    const cluster = new FakeCluster();
    const abort = new AbortController();
    abort.abort();
    const monitor = new WaitMonitor(new LiveStateFetcher(cluster, logger), { logger, signal: abort.signal });

    await expect(monitor.waitReady(identity, 10_000)).resolves.toEqual({
      status: 'cancelled',
      lastReason: 'not yet observed',
    });
    expect(cluster.count('get')).toBe(0);
  });

  it('keeps polling through transient errors', async () => {
    const cluster = new FakeCluster();
    cluster.seed(withStatus(deployment, { replicas: 1, updatedReplicas: 1, availableReplicas: 1 }));
    cluster.failNext('get', new TransportError('get Deployment/web/web: unavailable', 'ServerError'));
    const { monitor } = createMonitor(cluster);

    await expect(monitor.waitReady(identity, 10_000)).resolves.toEqual({ status: 'ready' });
    expect(cluster.count('get')).toBe(2);
  });

  it('stops on a permanent error', async () => {
    const cluster = new FakeCluster();
    cluster.failNext('get', new TransportError('get Deployment/web/web: forbidden', 'Forbidden'));
    const { monitor } = createMonitor(cluster);

    await expect(monitor.waitReady(identity, 10_000)).resolves.toEqual({
      status: 'failed',
      reason: 'get Deployment/web/web: forbidden',
    });
  });

  it('waits for several objects independently', async () => {
    const cluster = new FakeCluster();
    const settings = createMockConfigMap('settings', 'web', {});
    cluster.seed(settings);
    const { monitor } = createMonitor(cluster);

    const results = await monitor.waitAll([resolveIdentity(settings), identity], 3000);

    expect(results.get('v1/ConfigMap/web/settings')).toEqual({ status: 'ready' });
    expect(results.get('apps/v1/Deployment/web/web')).toEqual({ status: 'timed-out', lastReason: 'object not found' });
  });
});
