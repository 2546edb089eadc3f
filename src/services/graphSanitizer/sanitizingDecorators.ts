import type {
  GraphFilters,
  GraphIngestion,
  GraphPayload,
  GraphQueryExecutor,
  QueryParams,
} from '../../types/graph.js';
import { sanitizeGraphPayload } from './graphPayload.js';
import { sanitizeCypherQuery } from './cypherQuery.js';
import { DEFAULT_LABEL_POLICY, type LabelPolicy } from './labelPolicy.js';

/**
 * Sanitizes relationship types in the payload, then delegates.
 * Filters and the inner result are passed through unchanged.
 */
export class SanitizingGraphIngestion<TResult = unknown> implements GraphIngestion<TResult> {
  constructor(
    private readonly inner: GraphIngestion<TResult>,
    private readonly policy: LabelPolicy = DEFAULT_LABEL_POLICY
  ) {}

  add(data: GraphPayload, filters?: GraphFilters | null): TResult {
    return this.inner.add(sanitizeGraphPayload(data, this.policy), filters);
  }
}

/**
 * Rewrites relationship types in the Cypher statement, then delegates.
 * Parameters and the inner result are passed through unchanged.
 */
export class SanitizingQueryExecutor<TResult = unknown> implements GraphQueryExecutor<TResult> {
  constructor(private readonly inner: GraphQueryExecutor<TResult>) {}

  query(query: string, params?: QueryParams | null): TResult {
    return this.inner.query(sanitizeCypherQuery(query), params);
  }
}
