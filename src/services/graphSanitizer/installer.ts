/**
 * Graph sanitizer installation
 *
 * Puts the sanitizing decorators in front of the graph ingestion component and
 * the Cypher executor while the service is being wired. Sanitization is an
 * enhancement: a missing or unusable target is logged and skipped, and this
 * function never throws.
 */

import type { GraphIngestion, GraphQueryExecutor } from '../../types/graph.js';
import { SanitizingGraphIngestion, SanitizingQueryExecutor } from './sanitizingDecorators.js';
import { DEFAULT_LABEL_POLICY, type LabelPolicy } from './labelPolicy.js';

export type SanitizerInstallStatus = 'installed' | 'already-installed' | 'absent' | 'failed';

/**
 * Builds the ingestion component on top of the query executor once that has been
 * decorated (or null when the executor slot was absent).
 */
export type GraphIngestionFactory<TAdd, TQuery> = (
  queryExecutor: GraphQueryExecutor<TQuery> | null
) => GraphIngestion<TAdd> | null | undefined;

export interface GraphSanitizerTargets<TAdd, TQuery> {
  ingestion?: GraphIngestion<TAdd> | GraphIngestionFactory<TAdd, TQuery> | null;
  queryExecutor?: GraphQueryExecutor<TQuery> | null;
}

export interface GraphSanitizerOptions {
  policy?: LabelPolicy;
}

export interface InstalledGraphSanitizers<TAdd, TQuery> {
  /** Decorated target, the bare target if decoration failed, or null when absent */
  ingestion: GraphIngestion<TAdd> | null;
  queryExecutor: GraphQueryExecutor<TQuery> | null;
  status: {
    ingestion: SanitizerInstallStatus;
    queryExecutor: SanitizerInstallStatus;
  };
}

interface SlotInstallation<T> {
  value: T | null;
  status: SanitizerInstallStatus;
}

function installSlot<T extends object>(
  label: string,
  resolveTarget: () => T | null | undefined,
  method: string,
  isDecorated: (candidate: T) => boolean,
  decorate: (candidate: T) => T
): SlotInstallation<T> {
  let target: T | null | undefined;
  try {
    target = resolveTarget();
  } catch (error) {
    console.error(`❌ [GraphSanitizer] Failed to build ${label}:`, error);
    return { value: null, status: 'failed' };
  }

  if (target === null || target === undefined) {
    console.warn(`⚠️ [GraphSanitizer] ${label} not available, skipping sanitizer`);
    return { value: null, status: 'absent' };
  }

  try {
    if (typeof Reflect.get(target, method) !== 'function') {
      // Same treatment as a missing target: the collaborator's shape is not the one we wrap
      console.warn(`⚠️ [GraphSanitizer] ${label} has no ${method}() method, skipping sanitizer`);
      return { value: null, status: 'absent' };
    }

    if (isDecorated(target)) {
      console.info(`[GraphSanitizer] ${label} already sanitized`);
      return { value: target, status: 'already-installed' };
    }

    const decorated = decorate(target);
    console.info(`✅ [GraphSanitizer] Installed relationship-type sanitizer on ${label}.${method}()`);
    return { value: decorated, status: 'installed' };
  } catch (error) {
    console.error(`❌ [GraphSanitizer] Failed to install sanitizer on ${label}:`, error);
    return { value: target, status: 'failed' };
  }
}

export function installGraphSanitizers<TAdd = unknown, TQuery = unknown>(
  targets: GraphSanitizerTargets<TAdd, TQuery>,
  options: GraphSanitizerOptions = {}
): InstalledGraphSanitizers<TAdd, TQuery> {
  const policy = options.policy ?? DEFAULT_LABEL_POLICY;

  console.info('[GraphSanitizer] Installing Neo4j 5.x relationship-type sanitizers...');

  // Executor first, so an ingestion factory builds on the decorated executor
  const queryExecutor = installSlot<GraphQueryExecutor<TQuery>>(
    'graph query executor',
    () => targets.queryExecutor,
    'query',
    (candidate) => candidate instanceof SanitizingQueryExecutor,
    (candidate) => new SanitizingQueryExecutor(candidate)
  );

  const ingestionTarget = targets.ingestion;
  const ingestion = installSlot<GraphIngestion<TAdd>>(
    'graph ingestion',
    () => (typeof ingestionTarget === 'function' ? ingestionTarget(queryExecutor.value) : ingestionTarget),
    'add',
    (candidate) => candidate instanceof SanitizingGraphIngestion,
    (candidate) => new SanitizingGraphIngestion(candidate, policy)
  );

  console.info(
    `[GraphSanitizer] Sanitizers: ingestion=${ingestion.status}, queryExecutor=${queryExecutor.status}`
  );

  return {
    ingestion: ingestion.value,
    queryExecutor: queryExecutor.value,
    status: {
      ingestion: ingestion.status,
      queryExecutor: queryExecutor.status,
    },
  };
}
