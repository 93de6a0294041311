/**
 * Text rendering of diffs and execution reports
 *
 * Pure string builders; coloring is left to the CLI output helpers.
 */

import { applyOperations } from './diff.js';
import { formatIdentity } from './identity.js';
import { isJsonObject } from './json.js';
import type { DiffResult, ExecutionEntry, ExecutionReport, JsonValue, LiveObject } from './types.js';

// =============================================================================
// Structural Walk
// =============================================================================

export type WalkSide = 'removed' | 'added' | 'context';

export interface WalkLine {
  side: WalkSide;
  depth: number;
  /** `key:` or `index:` for intermediate nodes, JSON for leaves */
  text: string;
}

function leaf(side: WalkSide, depth: number, value: JsonValue): WalkLine {
  return { side, depth, text: JSON.stringify(value) };
}

function label(side: WalkSide, depth: number, key: string | number): WalkLine {
  return { side, depth, text: `${key}:` };
}

/**
 * Walk two JSON values side by side, emitting only the parts that differ
 * plus the keys leading to them. Object keys are visited in sorted order.
 *
 * @example
 * diffWalk({ x: 'foo' }, { x: 'bar' })
 * // [context 0 "x:", removed 1 "\"foo\"", added 1 "\"bar\""]
 */
export function diffWalk(a: JsonValue, b: JsonValue, depth = 0): WalkLine[] {
  const lines: WalkLine[] = [];

  if (Array.isArray(a) && Array.isArray(b)) {
    const shared = Math.min(a.length, b.length);
    for (let index = 0; index < shared; index++) {
      const nested = diffWalk(a[index], b[index], depth + 1);
      if (nested.length > 0) {
        lines.push(label('context', depth, index), ...nested);
      }
    }
    for (let index = shared; index < a.length; index++) {
      lines.push(label('removed', depth, index), leaf('removed', depth + 1, a[index]));
    }
    for (let index = shared; index < b.length; index++) {
      lines.push(label('added', depth, index), leaf('added', depth + 1, b[index]));
    }
    return lines;
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
    for (const key of keys) {
      const inA = Object.hasOwn(a, key);
      const inB = Object.hasOwn(b, key);
      if (!inA) {
        lines.push(label('added', depth, key), leaf('added', depth + 1, b[key]));
      } else if (!inB) {
        lines.push(label('removed', depth, key), leaf('removed', depth + 1, a[key]));
      } else {
        const nested = diffWalk(a[key], b[key], depth + 1);
        if (nested.length > 0) {
          lines.push(label('context', depth, key), ...nested);
        }
      }
    }
    return lines;
  }

  if (JSON.stringify(a) !== JSON.stringify(b)) {
    lines.push(leaf('removed', depth, a), leaf('added', depth, b));
  }
  return lines;
}

const SIDE_PREFIX: Readonly<Record<WalkSide, string>> = {
  removed: '- ',
  added: '+ ',
  context: '  ',
};

/**
 * `- `, `+ ` or two spaces, then two spaces per depth level
 */
export function formatWalkLine(line: WalkLine): string {
  return `${SIDE_PREFIX[line.side]}${'  '.repeat(line.depth)}${line.text}`;
}

// =============================================================================
// Diff Results
// =============================================================================

/**
 * Walk lines showing what a diff result would change on the cluster
 *
 * @param live - live object the diff was computed against, if any
 */
export function renderDiffResult(diff: DiffResult, live?: LiveObject): WalkLine[] {
  switch (diff.type) {
    case 'create':
      return diffWalk({}, diff.manifest);
    case 'patch': {
      const before = live ?? {};
      return diffWalk(before, applyOperations(before, diff.operations));
    }
    case 'delete':
      return live ? diffWalk(live, {}) : [];
    case 'noop':
    case 'conflict':
    case 'unreadable':
      return [];
  }
}

// =============================================================================
// Reports
// =============================================================================

function outcomeDetail(entry: ExecutionEntry): string {
  switch (entry.outcome) {
    case 'patched':
      return entry.baseChanged ? 'patched (forced)' : 'patched';
    case 'conflict':
      return `conflict: ${entry.reason}`;
    case 'failed':
      return `failed: ${entry.reason}`;
    case 'skipped-dependency':
      return `skipped: ${entry.dependency} did not succeed`;
    default:
      return entry.outcome;
  }
}

function readinessDetail(entry: ExecutionEntry): string {
  const readiness = entry.readiness;
  if (readiness === undefined) return '';
  switch (readiness.status) {
    case 'ready':
      return ', ready';
    case 'timed-out':
      return `, timed out waiting (${readiness.lastReason})`;
    case 'failed':
      return `, not ready: ${readiness.reason}`;
    case 'cancelled':
      return `, wait cancelled (${readiness.lastReason})`;
  }
}

/**
 * One line per execution entry, e.g. `Deployment/web/frontend: patched, ready`
 */
export function describeEntry(entry: ExecutionEntry): string {
  return `${formatIdentity(entry.identity)}: ${outcomeDetail(entry)}${readinessDetail(entry)}`;
}

/**
 * Summary of a report's non-zero counts, e.g. `1 created, 2 unchanged`
 */
export function summarizeReport(report: ExecutionReport): string {
  const { summary } = report;
  const parts: Array<[number, string]> = [
    [summary.created, 'created'],
    [summary.patched, 'patched'],
    [summary.deleted, 'deleted'],
    [summary.noop, 'unchanged'],
    [summary.conflict, 'in conflict'],
    [summary.failed, 'failed'],
    [summary['skipped-dependency'], 'skipped'],
    [summary.cancelled, 'cancelled'],
  ];
  const text = parts
    .filter(([count]) => count > 0)
    .map(([count, word]) => `${count} ${word}`)
    .join(', ');
  return text === '' ? 'nothing to do' : text;
}
