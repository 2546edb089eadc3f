// src/services/graph/__tests__/neo4jGraph.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';

const driverMock = vi.hoisted(() => {
  const run = vi.fn();
  const sessionClose = vi.fn(async () => {});
  const session = vi.fn(() => ({ run, close: sessionClose }));
  const verifyConnectivity = vi.fn(async () => ({}));
  const close = vi.fn(async () => {});
  const driver = vi.fn(() => ({ session, verifyConnectivity, close }));
  const basic = vi.fn((username: string, password: string) => ({ scheme: 'basic', username, password }));
  return { run, sessionClose, session, verifyConnectivity, close, driver, basic };
});

vi.mock('neo4j-driver', () => ({
  default: { driver: driverMock.driver, auth: { basic: driverMock.basic } },
}));

import { Neo4jGraph } from '../neo4jGraph.js';

function record(row: Record<string, unknown>) {
  return { keys: Object.keys(row), get: (key: string) => row[key] };
}

describe('Neo4jGraph', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should create the driver with basic auth and plain integers', () => {
    new Neo4jGraph({ url: 'bolt://localhost:7687', username: 'neo4j', password: 'test-secret' });

    expect(driverMock.driver).toHaveBeenCalledWith(
      'bolt://localhost:7687',
      { scheme: 'basic', username: 'neo4j', password: 'test-secret' },
      { disableLosslessIntegers: true }
    );
  });

  it('should map records to plain objects and close the session', async () => {
    driverMock.run.mockResolvedValueOnce({
      records: [record({ source: 'alice', relationship: 'likes', destination: 'tea' })],
    });
    const graph = new Neo4jGraph({ url: 'bolt://localhost:7687', username: 'neo4j', password: 'test-secret', database: 'memory' });

    const rows = await graph.query('MATCH (n) RETURN n', { user_id: 'alice' });

    expect(rows).toEqual([{ source: 'alice', relationship: 'likes', destination: 'tea' }]);
    expect(driverMock.session).toHaveBeenCalledWith({ database: 'memory' });
    expect(driverMock.run).toHaveBeenCalledWith('MATCH (n) RETURN n', { user_id: 'alice' });
    expect(driverMock.sessionClose).toHaveBeenCalledTimes(1);
  });

  it('should close the session when the query fails', async () => {
    driverMock.run.mockRejectedValueOnce(new Error('syntax error'));
    const graph = new Neo4jGraph({ url: 'bolt://localhost:7687', username: 'neo4j', password: 'test-secret' });

    await expect(graph.query('MATCH (n', null)).rejects.toThrow('syntax error');
    expect(driverMock.run).toHaveBeenCalledWith('MATCH (n', {});
    expect(driverMock.sessionClose).toHaveBeenCalledTimes(1);
  });

  it('should report connectivity without throwing', async () => {
    const graph = new Neo4jGraph({ url: 'bolt://localhost:7687', username: 'neo4j', password: 'test-secret' });
    driverMock.verifyConnectivity.mockRejectedValueOnce(new Error('connection refused'));

    await expect(graph.verifyConnectivity()).resolves.toEqual({ success: false, error: 'connection refused' });
    await expect(graph.verifyConnectivity()).resolves.toEqual({ success: true });
  });
});
