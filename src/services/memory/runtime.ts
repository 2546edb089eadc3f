/**
 * Memory runtime wiring
 *
 * Builds the MemoryEngine from the service config: mem0 vector memory, and when
 * the graph store is enabled, the Neo4j executor and graph memory behind the
 * relationship-type sanitizers.
 */

import type { ServiceConfig } from '../../config/serviceConfig.js';
import { buildMem0Config } from '../../config/serviceConfig.js';
import type { GraphQueryExecutor, GraphRecord, RelationTriple } from '../../types/graph.js';
import { createLabelPolicy, installGraphSanitizers } from '../graphSanitizer/index.js';
import { GraphMemory } from '../graph/graphMemory.js';
import { Neo4jGraph } from '../graph/neo4jGraph.js';
import { OpenAIRelationExtractor } from '../graph/relationExtractor.js';
import { createMem0Client, type VectorMemoryClient } from './mem0Client.js';
import { MemoryService, type MemoryGraph } from './memoryService.js';

export interface MemoryRuntime {
  engine: MemoryService;
  close(): Promise<void>;
}

/** Cypher executor that owns a database connection */
export type GraphConnection = GraphQueryExecutor<Promise<GraphRecord[]>> &
  Pick<Neo4jGraph, 'verifyConnectivity' | 'close'>;

export interface MemoryRuntimeDeps {
  createVectorMemory?: (config: Record<string, unknown>) => Promise<VectorMemoryClient>;
  createGraph?: (config: ServiceConfig['graph']) => GraphConnection;
}

export function wireGraph(neo4jGraph: GraphConnection, config: ServiceConfig): MemoryGraph {
  const sanitizers = installGraphSanitizers<Promise<RelationTriple[]>, Promise<GraphRecord[]>>(
    {
      queryExecutor: neo4jGraph,
      ingestion: (executor) => new GraphMemory(executor ?? neo4jGraph),
    },
    { policy: createLabelPolicy(config.graph.labelHeuristic) }
  );

  const store = new GraphMemory(sanitizers.queryExecutor ?? neo4jGraph);
  return {
    ingestion: sanitizers.ingestion ?? store,
    store,
    extractor: new OpenAIRelationExtractor({
      apiKey: config.llm.apiKey,
      baseURL: config.llm.baseURL,
      model: config.llm.model,
    }),
  };
}

export async function buildMemoryRuntime(
  config: ServiceConfig,
  deps: MemoryRuntimeDeps = {}
): Promise<MemoryRuntime> {
  const createVectorMemory = deps.createVectorMemory ?? createMem0Client;
  const vector = await createVectorMemory(buildMem0Config(config));

  if (!config.graph.enabled) {
    console.log('[MemoryRuntime] Graph store disabled');
    return { engine: new MemoryService(vector), close: async () => {} };
  }

  const neo4jGraph: GraphConnection = deps.createGraph?.(config.graph) ?? new Neo4jGraph(config.graph);
  const connectivity = await neo4jGraph.verifyConnectivity();
  if (connectivity.success) {
    console.log(`✅ [MemoryRuntime] Connected to Neo4j at ${config.graph.url}`);
  } else {
    // The driver reconnects on demand; graph calls fail soft until Neo4j is reachable
    console.warn(`⚠️ [MemoryRuntime] Neo4j not reachable at ${config.graph.url}: ${connectivity.error}`);
  }

  return {
    engine: new MemoryService(vector, wireGraph(neo4jGraph, config)),
    close: () => neo4jGraph.close(),
  };
}
