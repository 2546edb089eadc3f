// src/services/memory/memoryService.ts
import type {
  AddMemoryInput,
  MemoryEngine,
  MemoryMessage,
  MemoryScope,
  SearchMemoryInput,
} from '../../types/memory.js';
import type { GraphFilters, GraphIngestion, RelationTriple } from '../../types/graph.js';
import type { RelationExtractor } from '../graph/relationExtractor.js';
import type { Mem0Scope, VectorMemoryClient } from './mem0Client.js';

/** Read side of the graph store */
export interface GraphStore {
  search(query: string, filters: GraphFilters, limit?: number): Promise<RelationTriple[]>;
  getAll(filters: GraphFilters, limit?: number): Promise<RelationTriple[]>;
  deleteAll(filters: GraphFilters): Promise<void>;
  reset(): Promise<void>;
}

export interface MemoryGraph {
  /** Write side, expected to be wrapped by the relationship-type sanitizer */
  ingestion: GraphIngestion<Promise<RelationTriple[]>>;
  store: GraphStore;
  extractor: RelationExtractor;
}

function toMem0Scope(scope: MemoryScope): Mem0Scope {
  const result: Mem0Scope = {};
  if (scope.user_id) result.userId = scope.user_id;
  if (scope.agent_id) result.agentId = scope.agent_id;
  if (scope.run_id) result.runId = scope.run_id;
  return result;
}

function toGraphFilters(scope: MemoryScope): GraphFilters | null {
  if (!scope.user_id) {
    return null;
  }
  const filters: GraphFilters = { user_id: scope.user_id };
  if (scope.agent_id) filters.agent_id = scope.agent_id;
  if (scope.run_id) filters.run_id = scope.run_id;
  return filters;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function withRelations(result: unknown, relations: RelationTriple[]): Record<string, unknown> {
  return isRecord(result) ? { ...result, relations } : { results: result, relations };
}

/** Drop scored search hits below the threshold; unscored hits are kept */
function applyThreshold(result: unknown, threshold: number | undefined): unknown {
  if (threshold === undefined || !isRecord(result) || !Array.isArray(result.results)) {
    return result;
  }
  const minimum: number = threshold;
  const results: unknown[] = result.results;
  return {
    ...result,
    results: results.filter((item) => !isRecord(item) || typeof item.score !== 'number' || item.score >= minimum),
  };
}

/**
 * MemoryEngine over mem0 vector memory plus an optional entity graph.
 *
 * The graph is keyed by user_id; requests without one only touch vector memory.
 * Graph failures are logged and never fail the request.
 */
export class MemoryService implements MemoryEngine {
  constructor(
    private readonly vector: VectorMemoryClient,
    private readonly graph: MemoryGraph | null = null
  ) {}

  get graphEnabled(): boolean {
    return this.graph !== null;
  }

  async add(input: AddMemoryInput): Promise<unknown> {
    const metadata = input.memory_type
      ? { ...input.metadata, memory_type: input.memory_type }
      : input.metadata;
    if (input.prompt) {
      console.warn('[MemoryService] Custom extraction prompts are not supported per request, ignoring prompt');
    }

    const filters = toGraphFilters(input);
    const [result, relations] = await Promise.all([
      this.vector.add(input.messages, { ...toMem0Scope(input), ...(metadata ? { metadata } : {}) }),
      filters ? this.addToGraph(input.messages, filters) : Promise.resolve(null),
    ]);

    return relations ? withRelations(result, relations) : result;
  }

  async getAll(scope: MemoryScope): Promise<unknown> {
    const filters = toGraphFilters(scope);
    const [result, relations] = await Promise.all([
      this.vector.getAll(toMem0Scope(scope)),
      filters ? this.readGraph('getAll', (store) => store.getAll(filters)) : Promise.resolve(null),
    ]);
    return relations ? withRelations(result, relations) : result;
  }

  async get(memoryId: string): Promise<unknown> {
    return this.vector.get(memoryId);
  }

  async search(input: SearchMemoryInput): Promise<unknown> {
    const filters = toGraphFilters(input);
    const [result, relations] = await Promise.all([
      this.vector.search(input.query, {
        ...toMem0Scope(input),
        limit: input.limit,
        ...(input.filters ? { filters: input.filters } : {}),
      }),
      filters
        ? this.readGraph('search', (store) => store.search(input.query, filters, input.limit))
        : Promise.resolve(null),
    ]);

    const scored = applyThreshold(result, input.threshold);
    return relations ? withRelations(scored, relations) : scored;
  }

  async update(memoryId: string, text: string): Promise<unknown> {
    return this.vector.update(memoryId, text);
  }

  async history(memoryId: string): Promise<unknown> {
    return this.vector.history(memoryId);
  }

  async delete(memoryId: string): Promise<void> {
    await this.vector.delete(memoryId);
  }

  async deleteAll(scope: MemoryScope): Promise<void> {
    await this.vector.deleteAll(toMem0Scope(scope));
    const filters = toGraphFilters(scope);
    if (this.graph && filters) {
      await this.graph.store.deleteAll(filters);
    }
  }

  async reset(): Promise<void> {
    await this.vector.reset();
    if (this.graph) {
      await this.graph.store.reset();
    }
  }

  private async addToGraph(messages: MemoryMessage[], filters: GraphFilters): Promise<RelationTriple[] | null> {
    if (!this.graph) {
      return null;
    }
    try {
      const payload = await this.graph.extractor.extract(messages, filters);
      return await this.graph.ingestion.add(payload, filters);
    } catch (error) {
      console.error('❌ [MemoryService] Error adding to graph memory:', error);
      return [];
    }
  }

  private async readGraph(
    operation: string,
    read: (store: GraphStore) => Promise<RelationTriple[]>
  ): Promise<RelationTriple[] | null> {
    if (!this.graph) {
      return null;
    }
    try {
      return await read(this.graph.store);
    } catch (error) {
      console.error(`❌ [MemoryService] Error in graph ${operation}:`, error);
      return [];
    }
  }
}
