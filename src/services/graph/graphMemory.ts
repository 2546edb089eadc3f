// src/services/graph/graphMemory.ts
import { z } from 'zod';
import type {
  GraphFilters,
  GraphIngestion,
  GraphPayload,
  GraphQueryExecutor,
  GraphRecord,
  QueryParams,
  RelationTriple,
} from '../../types/graph.js';

/** Default number of relations returned */
const DEFAULT_LIMIT = 100;

const ENTITY_LABEL = 'Entity';

// Relationship types are spliced into the statement text (Cypher cannot parameterize them),
// quoted with backticks so a leading digit is legal. Separators the query sanitizer
// rewrites are allowed; a backtick or anything that could end the clause is not.
const SPLICEABLE_RELATIONSHIP_TYPE = /^[\p{L}\p{N}_:/\\ -]+$/u;
const HAS_WORD_CHARACTER = /[\p{L}\p{N}]/u;

const RelationSchema = z.object({
  source: z.string().trim().min(1),
  relationship: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  source_type: z.string().optional(),
  destination_type: z.string().optional(),
});

const EntitySchema = z.object({
  name: z.string().trim().min(1),
  type: z.string().optional(),
});

const GraphWriteSchema = z.object({
  entities: z.array(z.unknown()).optional().default([]),
  relations: z.array(z.unknown()).optional().default([]),
});

type Relation = z.infer<typeof RelationSchema>;

interface ScopeClause {
  /** Property map body, e.g. `user_id: $user_id, agent_id: $agent_id` */
  properties: string;
  params: QueryParams;
}

function buildScope(filters: GraphFilters | null | undefined): ScopeClause {
  if (!filters?.user_id) {
    throw new Error('user_id is required for graph operations');
  }

  const params: QueryParams = { user_id: filters.user_id };
  const properties = ['user_id: $user_id'];
  if (filters.agent_id) {
    params.agent_id = filters.agent_id;
    properties.push('agent_id: $agent_id');
  }
  if (filters.run_id) {
    params.run_id = filters.run_id;
    properties.push('run_id: $run_id');
  }
  return { properties: properties.join(', '), params };
}

function toLimit(limit: number): number {
  return Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : DEFAULT_LIMIT;
}

function toTriple(row: GraphRecord): RelationTriple {
  return {
    source: String(row.source ?? ''),
    relationship: String(row.relationship ?? ''),
    destination: String(row.destination ?? ''),
  };
}

function searchTerms(query: string): string[] {
  const words = query.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  return [...new Set(words.filter((word) => word.length >= 2))];
}

/**
 * Entity/relationship memory stored as Cypher over any query executor.
 *
 * Nodes are scoped by user_id (plus agent_id/run_id when given). `add()` expects
 * relationship types that are already sanitized or that the executor will
 * sanitize; types that cannot be spliced into a statement safely are skipped.
 */
export class GraphMemory implements GraphIngestion<Promise<RelationTriple[]>> {
  constructor(private readonly executor: GraphQueryExecutor<Promise<GraphRecord[]>>) {}

  async add(data: GraphPayload, filters?: GraphFilters | null): Promise<RelationTriple[]> {
    const scope = buildScope(filters);
    const parsed = GraphWriteSchema.safeParse(data);
    if (!parsed.success) {
      console.warn('[GraphMemory] Ignoring graph payload without entities/relations:', parsed.error.issues);
      return [];
    }

    const entityTypes = new Map<string, string>();
    for (const candidate of parsed.data.entities) {
      const entity = EntitySchema.safeParse(candidate);
      if (entity.success && entity.data.type) {
        entityTypes.set(entity.data.name, entity.data.type);
      }
    }

    const written: RelationTriple[] = [];
    for (const candidate of parsed.data.relations) {
      const relation = RelationSchema.safeParse(candidate);
      if (!relation.success) {
        console.warn('[GraphMemory] Skipping malformed relation:', candidate);
        continue;
      }
      if (!SPLICEABLE_RELATIONSHIP_TYPE.test(relation.data.relationship) || !HAS_WORD_CHARACTER.test(relation.data.relationship)) {
        console.warn(`[GraphMemory] Skipping relation with unusable type: '${relation.data.relationship}'`);
        continue;
      }

      try {
        const rows = await this.executor.query(this.buildMergeStatement(relation.data, scope), {
          ...scope.params,
          source_name: relation.data.source,
          source_type: relation.data.source_type ?? entityTypes.get(relation.data.source) ?? null,
          destination_name: relation.data.destination,
          destination_type: relation.data.destination_type ?? entityTypes.get(relation.data.destination) ?? null,
        });
        written.push(...rows.map(toTriple));
      } catch (error) {
        // A rejected statement skips only its own relation
        console.error(
          `❌ [GraphMemory] Failed to write relation '${relation.data.source}' -[${relation.data.relationship}]-> '${relation.data.destination}':`,
          error
        );
      }
    }

    console.log(`🕸️ [GraphMemory] Wrote ${written.length} relations for user ${scope.params.user_id}`);
    return written;
  }

  async search(query: string, filters: GraphFilters, limit: number = DEFAULT_LIMIT): Promise<RelationTriple[]> {
    const scope = buildScope(filters);
    const terms = searchTerms(query);
    if (terms.length === 0) {
      return [];
    }

    const rows = await this.executor.query(
      `MATCH (source:${ENTITY_LABEL} {${scope.properties}})-[r]->(destination:${ENTITY_LABEL} {${scope.properties}})
WHERE any(term IN $terms WHERE toLower(source.name) CONTAINS term OR toLower(destination.name) CONTAINS term)
RETURN source.name AS source, type(r) AS relationship, destination.name AS destination
LIMIT ${toLimit(limit)}`,
      { ...scope.params, terms }
    );
    return rows.map(toTriple);
  }

  async getAll(filters: GraphFilters, limit: number = DEFAULT_LIMIT): Promise<RelationTriple[]> {
    const scope = buildScope(filters);
    const rows = await this.executor.query(
      `MATCH (source:${ENTITY_LABEL} {${scope.properties}})-[r]->(destination:${ENTITY_LABEL} {${scope.properties}})
RETURN source.name AS source, type(r) AS relationship, destination.name AS destination
LIMIT ${toLimit(limit)}`,
      scope.params
    );
    return rows.map(toTriple);
  }

  async deleteAll(filters: GraphFilters): Promise<void> {
    const scope = buildScope(filters);
    await this.executor.query(`MATCH (n:${ENTITY_LABEL} {${scope.properties}}) DETACH DELETE n`, scope.params);
  }

  async reset(): Promise<void> {
    await this.executor.query(`MATCH (n:${ENTITY_LABEL}) DETACH DELETE n`, {});
  }

  private buildMergeStatement(relation: Relation, scope: ScopeClause): string {
    return `MERGE (source:${ENTITY_LABEL} {name: $source_name, ${scope.properties}})
ON CREATE SET source.created = timestamp(), source.type = $source_type
MERGE (destination:${ENTITY_LABEL} {name: $destination_name, ${scope.properties}})
ON CREATE SET destination.created = timestamp(), destination.type = $destination_type
MERGE (source)-[r:\`${relation.relationship}\`]->(destination)
ON CREATE SET r.created = timestamp()
RETURN source.name AS source, type(r) AS relationship, destination.name AS destination`;
  }
}
