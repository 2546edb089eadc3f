/**
 * Graph layer contracts
 *
 * The sanitizer decorators, the Neo4j executor and the graph memory all meet
 * at these two call shapes.
 */

/** Nested entities/relations destined for the graph store. Shape is producer-defined. */
export type GraphPayload = unknown;

export interface GraphFilters {
  user_id: string;
  agent_id?: string;
  run_id?: string;
}

export type QueryParams = Record<string, unknown>;

/** Persists a Graph Payload scoped by filters */
export interface GraphIngestion<TResult = unknown> {
  add(data: GraphPayload, filters?: GraphFilters | null): TResult;
}

/** Sends a Cypher statement to the database */
export interface GraphQueryExecutor<TResult = unknown> {
  query(query: string, params?: QueryParams | null): TResult;
}

export interface RelationTriple {
  source: string;
  relationship: string;
  destination: string;
}

export type GraphRecord = Record<string, unknown>;
