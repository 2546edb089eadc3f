// src/services/graphSanitizer/__tests__/graphPayload.test.ts

import { describe, it, expect, vi } from 'vitest';
import { sanitizeGraphPayload } from '../graphPayload.js';
import { createLabelPolicy } from '../labelPolicy.js';

vi.spyOn(console, 'debug').mockImplementation(() => {});

describe('sanitizeGraphPayload', () => {
  describe('designator keys', () => {
    it('should sanitize a relationship value', () => {
      expect(sanitizeGraphPayload({ relationship: 'a:b:c' })).toEqual({ relationship: 'a_b_c' });
    });

    it('should sanitize every designator key, even with a single colon', () => {
      const result = sanitizeGraphPayload({
        relationship: 'works:at',
        relation: 'lives in',
        rel_type: 'born-in',
        type: 'knows/likes',
        relationship_type: 'x:y',
      });

      expect(result).toEqual({
        relationship: 'works_at',
        relation: 'lives_in',
        rel_type: 'born_in',
        type: 'knows_likes',
        relationship_type: 'x_y',
      });
    });

    it('should walk non-string values under a designator key', () => {
      const result = sanitizeGraphPayload({ relation: { relationship: 'a:b', note: 'plain' } });
      expect(result).toEqual({ relation: { relationship: 'a_b', note: 'plain' } });
    });

    it('should handle the nested entity list shape', () => {
      const result = sanitizeGraphPayload({ entities: [{ relationship_type: 'lives:in:city' }] });
      expect(result).toEqual({ entities: [{ relationship_type: 'lives_in_city' }] });
    });
  });

  describe('free-standing strings', () => {
    it('should sanitize strings with more than one colon', () => {
      expect(sanitizeGraphPayload({ note: 'x:y:z' })).toEqual({ note: 'x_y_z' });
    });

    it('should leave strings with a single colon unchanged', () => {
      expect(sanitizeGraphPayload({ note: 'a:b' })).toEqual({ note: 'a:b' });
    });

    it('should sanitize a bare top-level string by the same rule', () => {
      expect(sanitizeGraphPayload('p:q:r')).toBe('p_q_r');
      expect(sanitizeGraphPayload('p:q')).toBe('p:q');
    });

    // Documented limitation of the multi-colon heuristic: colon-heavy data is rewritten too
    it('should rewrite timestamps with two colons under the default policy', () => {
      expect(sanitizeGraphPayload({ at: '12:30:00' })).toEqual({ at: '12_30_00' });
    });

    it('should follow an injected policy', () => {
      const anyColon = createLabelPolicy('any-colon');
      const off = createLabelPolicy('off');

      expect(sanitizeGraphPayload({ note: 'works:at' }, anyColon)).toEqual({ note: 'works_at' });
      expect(sanitizeGraphPayload({ note: 'x:y:z' }, off)).toEqual({ note: 'x:y:z' });
      expect(sanitizeGraphPayload({ relationship: 'x:y:z' }, off)).toEqual({ relationship: 'x_y_z' });
    });
  });

  describe('structural fidelity', () => {
    it('should keep keys, key order, lengths and scalars', () => {
      const when = new Date('2024-01-02T00:00:00Z');
      const input = {
        zeta: 1,
        alpha: [true, null, 3.5, 'a:b', { type: 'is:a' }],
        mid: { count: 0, when, missing: undefined },
        type: 42,
      };

      const result = sanitizeGraphPayload(input);

      expect(result).toEqual({
        zeta: 1,
        alpha: [true, null, 3.5, 'a:b', { type: 'is_a' }],
        mid: { count: 0, when, missing: undefined },
        type: 42,
      });
      expect(Object.keys(result as object)).toEqual(['zeta', 'alpha', 'mid', 'type']);
      expect((result as { mid: { when: Date } }).mid.when).toBe(when);
    });

    it('should not mutate the input', () => {
      const input = { relations: [{ relationship: 'a:b:c', source: 'x' }] };
      const snapshot = JSON.parse(JSON.stringify(input));

      const result = sanitizeGraphPayload(input);

      expect(input).toEqual(snapshot);
      expect(result).not.toBe(input);
      expect((result as typeof input).relations).not.toBe(input.relations);
    });

    it('should return non-container values as is', () => {
      expect(sanitizeGraphPayload(7)).toBe(7);
      expect(sanitizeGraphPayload(null)).toBeNull();
      expect(sanitizeGraphPayload(undefined)).toBeUndefined();
      const map = new Map([['relationship', 'a:b']]);
      expect(sanitizeGraphPayload(map)).toBe(map);
    });

    it('should keep an own __proto__ key as data', () => {
      const input = JSON.parse('{"__proto__": {"relationship": "a:b"}, "name": "n"}');

      const result = sanitizeGraphPayload(input) as Record<string, unknown>;

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
      expect(Object.keys(result)).toEqual(['__proto__', 'name']);
      expect(Object.getOwnPropertyDescriptor(result, '__proto__')?.value).toEqual({ relationship: 'a_b' });
    });
  });

  describe('deep and cyclic input', () => {
    it('should handle nesting far deeper than the call stack allows', () => {
      let input: unknown = { relationship: 'deep:est' };
      for (let i = 0; i < 100_000; i++) {
        input = [input];
      }

      let node = sanitizeGraphPayload(input);
      let depth = 0;
      while (Array.isArray(node)) {
        node = node[0];
        depth++;
      }

      expect(depth).toBe(100_000);
      expect(node).toEqual({ relationship: 'deep_est' });
    });

    it('should terminate on cyclic input and mirror the cycle', () => {
      const input: Record<string, unknown> = { relationship: 'a:b' };
      input.self = input;

      const result = sanitizeGraphPayload(input) as Record<string, unknown>;

      expect(result.relationship).toBe('a_b');
      expect(result.self).toBe(result);
      expect(input.relationship).toBe('a:b');
    });

    it('should map a shared sub-object to one output object', () => {
      const shared = { relationship: 'x:y' };
      const result = sanitizeGraphPayload({ first: shared, second: shared }) as Record<string, unknown>;

      expect(result.first).toEqual({ relationship: 'x_y' });
      expect(result.second).toBe(result.first);
    });
  });
});
