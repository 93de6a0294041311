/**
 * Kubernetes transport
 *
 * Speaks the REST API directly with JSON bodies, using
 * @kubernetes/client-node for kubeconfig loading and authentication:
 * - Resource paths come from API discovery, cached per group version
 * - Patches are JSON merge patches carrying the expected resourceVersion
 * - Error statuses are mapped to TransportError reasons
 * - Requests and responses are logged with secret redaction
 */

import { KubeConfig } from '@kubernetes/client-node';
import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import { ConfigError } from '../config/cluster.js';
import { formatIdentity } from '../reconcile/identity.js';
import { getString, isJsonObject, toJsonObject } from '../reconcile/json.js';
import type { FieldOperation, JsonObject, LiveObject, Manifest, ResourceIdentity } from '../reconcile/types.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import { parseRetryAfter } from './retry.js';
import {
  NOT_FOUND,
  TransportError,
  buildMergePatch,
  reasonFromStatus,
  type ListSelector,
  type NotFound,
  type PatchOptions,
  type Transport,
  type TransportOperation,
} from './transport.js';
import type { ClusterConnection } from './types.js';

const fetch = nodeFetch.default;

const SERVER_ENTRY_NAME = 'kubeconverge';

const MERGE_PATCH_CONTENT_TYPE = 'application/merge-patch+json';

// =============================================================================
// KubeConfig
// =============================================================================

/**
 * Build a KubeConfig from resolved connection settings.
 * An explicit server address (e.g. a `kubectl proxy` endpoint) takes
 * precedence over kubeconfig files and needs no credentials. Plain
 * `http://` addresses are allowed; TLS settings only apply to `https://`.
 *
 * @throws ConfigError when the server address is invalid or the requested
 * context does not exist
 */
export function buildKubeConfig(connection: ClusterConnection): KubeConfig {
  const kc = new KubeConfig();

  if (connection.server) {
    let protocol: string;
    try {
      protocol = new URL(connection.server).protocol;
    } catch {
      throw new ConfigError(`Invalid server address: ${connection.server}`, 'server');
    }
    kc.loadFromOptions({
      clusters: [{ name: SERVER_ENTRY_NAME, server: connection.server, skipTLSVerify: protocol === 'http:' }],
      users: [{ name: SERVER_ENTRY_NAME }],
      contexts: [{ name: SERVER_ENTRY_NAME, cluster: SERVER_ENTRY_NAME, user: SERVER_ENTRY_NAME }],
      currentContext: SERVER_ENTRY_NAME,
    });
    return kc;
  }

  if (connection.kubeconfig) {
    kc.loadFromFile(connection.kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  if (connection.context) {
    if (kc.getContextObject(connection.context) === null) {
      throw new ConfigError(`Context "${connection.context}" not found in kubeconfig`, 'context');
    }
    kc.setCurrentContext(connection.context);
  }

  return kc;
}

/**
 * Namespace set on the current kubeconfig context, if any
 */
export function contextNamespace(kc: KubeConfig): string | undefined {
  const namespace = kc.getContextObject(kc.getCurrentContext())?.namespace;
  return namespace ? namespace : undefined;
}

// =============================================================================
// Error Mapping
// =============================================================================

function statusBody(text: string): JsonObject | undefined {
  try {
    return toJsonObject(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/**
 * Map an unsuccessful response to a TransportError.
 * The Status body supplies the message and reason where the server sent one.
 */
export function responseError(
  status: number,
  text: string,
  retryAfter: string | null,
  operation: TransportOperation,
  target: string
): TransportError {
  const body = statusBody(text);
  const serverMessage = getString(body, ['message']);
  const reason = reasonFromStatus(status, operation, getString(body, ['reason']));
  return new TransportError(`${operation} ${target}: ${serverMessage ?? `HTTP ${status}`}`, reason, {
    status,
    retryAfter: status === 429 ? parseRetryAfter(retryAfter) : undefined,
  });
}

/**
 * Map anything thrown while sending a request to a TransportError
 */
export function toTransportError(error: unknown, operation: TransportOperation, target: string): TransportError {
  if (error instanceof TransportError) return error;

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TransportError(`${operation} ${target}: ${error.message}`, 'Timeout', { cause: error });
    }
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code !== undefined && /^(ECONN|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|EPIPE|EHOSTUNREACH)/.test(code)) {
      return new TransportError(`${operation} ${target}: ${error.message}`, 'Network', { cause: error });
    }
    if (/socket hang up|network|fetch failed/i.test(error.message)) {
      return new TransportError(`${operation} ${target}: ${error.message}`, 'Network', { cause: error });
    }
    return new TransportError(`${operation} ${target}: ${error.message}`, 'Unknown', { cause: error });
  }

  return new TransportError(`${operation} ${target}: ${String(error)}`, 'Unknown', { cause: error });
}

// =============================================================================
// Paths
// =============================================================================

interface ResourceInfo {
  plural: string;
  namespaced: boolean;
}

/**
 * Base path of a group version: `/api/v1` for the core group,
 * `/apis/<group>/<version>` otherwise
 */
export function groupVersionPath(apiVersion: string): string {
  return apiVersion.includes('/') ? `/apis/${apiVersion}` : `/api/${apiVersion}`;
}

/**
 * Kinds served by a group version, read from its APIResourceList.
 * Subresources (`deployments/status`) are skipped.
 */
export function parseResourceList(body: unknown): Map<string, ResourceInfo> {
  const kinds = new Map<string, ResourceInfo>();
  const resources = toJsonObject(body)?.resources;
  if (!Array.isArray(resources)) return kinds;

  for (const resource of resources) {
    if (!isJsonObject(resource)) continue;
    const name = getString(resource, ['name']);
    const kind = getString(resource, ['kind']);
    if (name === undefined || kind === undefined || name.includes('/')) continue;
    kinds.set(kind, { plural: name, namespaced: resource.namespaced === true });
  }
  return kinds;
}

function resourcePath(apiVersion: string, info: ResourceInfo, namespace?: string, name?: string): string {
  let path = groupVersionPath(apiVersion);
  if (info.namespaced && namespace) {
    path += `/namespaces/${encodeURIComponent(namespace)}`;
  }
  path += `/${info.plural}`;
  if (name !== undefined) {
    path += `/${encodeURIComponent(name)}`;
  }
  return path;
}

/**
 * Request bodies as logged; Secret payloads are left out entirely
 */
export function loggedBody(identity: ResourceIdentity, body: JsonObject): JsonObject | undefined {
  return identity.kind === 'Secret' ? undefined : body;
}

function toLiveObject(value: unknown, target: string): LiveObject {
  const live = toJsonObject(value);
  if (live === undefined) {
    throw new TransportError(`Unexpected response for ${target}`, 'Unknown');
  }
  return live;
}

// =============================================================================
// Transport
// =============================================================================

export interface KubernetesTransportOptions {
  /** Pre-built configuration (tests) */
  kubeConfig?: KubeConfig;
  logger?: ApiLogger;
}

interface RequestSpec {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  path: string;
  query?: Record<string, string | undefined>;
  body?: JsonObject;
  contentType?: string;
}

export class KubernetesTransport implements Transport {
  readonly kubeConfig: KubeConfig;
  private readonly server: string;
  private readonly log: ApiLogger;
  private readonly discovery = new Map<string, Promise<Map<string, ResourceInfo>>>();

  constructor(
    private readonly connection: ClusterConnection,
    options: KubernetesTransportOptions = {}
  ) {
    this.kubeConfig = options.kubeConfig ?? buildKubeConfig(connection);
    const server = this.kubeConfig.getCurrentCluster()?.server;
    if (!server) {
      throw new ConfigError('No cluster server configured for the current context', 'context');
    }
    this.server = server.replace(/\/+$/, '');
    this.log = (options.logger ?? defaultLogger).child({ component: 'transport' });
  }

  /**
   * Namespace of the kubeconfig context in use
   */
  contextNamespace(): string | undefined {
    return contextNamespace(this.kubeConfig);
  }

  private report(error: TransportError, operation: TransportOperation, target: string, start: number): TransportError {
    if (error.reason === 'NotFound' && operation === 'get') {
      this.log.debug(`API get: ${target} not found`);
    } else if (error.status !== undefined) {
      this.log.response(error.status, target, Date.now() - start);
    } else {
      this.log.warn(`API ${operation} failed: ${target}`, { reason: error.reason, error: error.message });
    }
    return error;
  }

  private async request(operation: TransportOperation, target: string, spec: RequestSpec): Promise<unknown> {
    const url = new URL(`${this.server}${spec.path}`);
    for (const [key, value] of Object.entries(spec.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const start = Date.now();
    let response: Response;
    try {
      const base = await this.kubeConfig.applyToFetchOptions({});
      const headers = new nodeFetch.Headers(base.headers);
      headers.set('Accept', 'application/json');
      if (spec.body !== undefined) {
        headers.set('Content-Type', spec.contentType ?? 'application/json');
      }
      const init: RequestInit = {
        method: spec.method,
        headers,
        body: spec.body === undefined ? undefined : JSON.stringify(spec.body),
        agent: url.protocol === 'https:' ? base.agent : undefined,
      };
      response = await fetch(url.toString(), init);
    } catch (error) {
      throw this.report(toTransportError(error, operation, target), operation, target, start);
    }

    const text = await response.text();
    if (!response.ok) {
      const error = responseError(response.status, text, response.headers.get('retry-after'), operation, target);
      throw this.report(error, operation, target, start);
    }

    this.log.debug(`API ${operation} ok: ${target}`, { durationMs: Date.now() - start });
    if (text === '') return undefined;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransportError(`${operation} ${target}: response is not JSON`, 'Unknown', { cause: error });
    }
  }

  private async resources(apiVersion: string): Promise<Map<string, ResourceInfo>> {
    let loading = this.discovery.get(apiVersion);
    if (loading === undefined) {
      loading = this.request('get', apiVersion, { method: 'GET', path: groupVersionPath(apiVersion) }).then(
        parseResourceList
      );
      this.discovery.set(apiVersion, loading);
    }
    try {
      return await loading;
    } catch (error) {
      this.discovery.delete(apiVersion);
      throw error;
    }
  }

  /**
   * Find how a kind is served. A kind the server does not know yet (a
   * custom resource whose definition is still being established) is
   * NotFound, and transient for create so the call is retried.
   */
  private async resolve(
    selector: { apiVersion: string; kind: string },
    operation: TransportOperation,
    target: string
  ): Promise<ResourceInfo> {
    const notServed = (): TransportError =>
      new TransportError(`${operation} ${target}: ${selector.kind} is not served by ${selector.apiVersion}`, 'NotFound', {
        status: 404,
        transient: operation === 'create',
      });

    let kinds: Map<string, ResourceInfo>;
    try {
      kinds = await this.resources(selector.apiVersion);
    } catch (error) {
      if (error instanceof TransportError && error.reason === 'NotFound') throw notServed();
      throw error;
    }

    const info = kinds.get(selector.kind);
    if (info === undefined) {
      this.discovery.delete(selector.apiVersion);
      throw notServed();
    }
    return info;
  }

  async get(identity: ResourceIdentity): Promise<LiveObject | NotFound> {
    const target = formatIdentity(identity);
    try {
      const info = await this.resolve(identity, 'get', target);
      const live = await this.request('get', target, {
        method: 'GET',
        path: resourcePath(identity.apiVersion, info, identity.namespace, identity.name),
      });
      return toLiveObject(live, target);
    } catch (error) {
      if (error instanceof TransportError && error.reason === 'NotFound') {
        return NOT_FOUND;
      }
      throw error;
    }
  }

  async create(manifest: Manifest): Promise<LiveObject> {
    const identity = identityOfManifest(manifest);
    const target = formatIdentity(identity);
    const info = await this.resolve(identity, 'create', target);
    this.log.request('POST', target, loggedBody(identity, manifest));
    const created = await this.request('create', target, {
      method: 'POST',
      path: resourcePath(identity.apiVersion, info, identity.namespace),
      query: { fieldManager: this.connection.fieldManager },
      body: manifest,
    });
    return toLiveObject(created, target);
  }

  async patch(
    identity: ResourceIdentity,
    operations: readonly FieldOperation[],
    options: PatchOptions = {}
  ): Promise<LiveObject> {
    const target = formatIdentity(identity);
    const patch = buildMergePatch(operations);
    if (options.resourceVersion !== undefined) {
      const metadata = isJsonObject(patch.metadata) ? patch.metadata : {};
      patch.metadata = { ...metadata, resourceVersion: options.resourceVersion };
    }

    const info = await this.resolve(identity, 'patch', target);
    this.log.request('PATCH', target, loggedBody(identity, patch));
    const patched = await this.request('patch', target, {
      method: 'PATCH',
      path: resourcePath(identity.apiVersion, info, identity.namespace, identity.name),
      query: { fieldManager: this.connection.fieldManager },
      body: patch,
      contentType: MERGE_PATCH_CONTENT_TYPE,
    });
    return toLiveObject(patched, target);
  }

  async delete(identity: ResourceIdentity): Promise<void> {
    const target = formatIdentity(identity);
    const info = await this.resolve(identity, 'delete', target);
    this.log.request('DELETE', target);
    await this.request('delete', target, {
      method: 'DELETE',
      path: resourcePath(identity.apiVersion, info, identity.namespace, identity.name),
      body: { apiVersion: 'v1', kind: 'DeleteOptions', propagationPolicy: 'Background' },
    });
  }

  /**
   * List objects of a kind. A kind the server does not serve has no objects.
   */
  async list(selector: ListSelector): Promise<LiveObject[]> {
    const target = `${selector.kind}${selector.namespace ? ` in ${selector.namespace}` : ''}`;
    let info: ResourceInfo;
    try {
      info = await this.resolve(selector, 'list', target);
    } catch (error) {
      if (error instanceof TransportError && error.reason === 'NotFound') return [];
      throw error;
    }

    const result = toJsonObject(
      await this.request('list', target, {
        method: 'GET',
        path: resourcePath(selector.apiVersion, info, selector.namespace),
        query: { labelSelector: selector.labelSelector },
      })
    );
    const items = result?.items;
    return Array.isArray(items) ? items.map((item) => toLiveObject(item, target)) : [];
  }
}

function identityOfManifest(manifest: Manifest): ResourceIdentity {
  const namespace = getString(manifest, ['metadata', 'namespace']);
  const base = {
    apiVersion: getString(manifest, ['apiVersion']) ?? '',
    kind: getString(manifest, ['kind']) ?? '',
    name: getString(manifest, ['metadata', 'name']) ?? '',
  };
  return namespace ? { ...base, namespace } : base;
}
