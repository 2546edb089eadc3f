// src/services/graph/neo4jGraph.ts
import neo4j, { type Driver } from 'neo4j-driver';
import type { GraphQueryExecutor, GraphRecord, QueryParams } from '../../types/graph.js';

export interface Neo4jConnectionConfig {
  url: string;
  username: string;
  password: string;
  database?: string;
}

/**
 * Thin Cypher executor over the official driver.
 * Records come back as plain objects keyed by the RETURN aliases.
 */
export class Neo4jGraph implements GraphQueryExecutor<Promise<GraphRecord[]>> {
  private readonly driver: Driver;
  private readonly database?: string;

  constructor(config: Neo4jConnectionConfig) {
    this.driver = neo4j.driver(config.url, neo4j.auth.basic(config.username, config.password), {
      disableLosslessIntegers: true,
    });
    this.database = config.database;
  }

  async query(query: string, params?: QueryParams | null): Promise<GraphRecord[]> {
    const session = this.driver.session(this.database ? { database: this.database } : undefined);
    try {
      const result = await session.run(query, params ?? {});
      return result.records.map((record) => {
        const row: GraphRecord = {};
        for (const key of record.keys) {
          row[String(key)] = record.get(key);
        }
        return row;
      });
    } finally {
      await session.close();
    }
  }

  async verifyConnectivity(): Promise<{ success: boolean; error?: string }> {
    try {
      await this.driver.verifyConnectivity();
      return { success: true };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return { success: false, error: message };
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
