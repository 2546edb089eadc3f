import type { GraphPayload } from '../../types/graph.js';
import { sanitizeRelationshipType } from './relationshipType.js';
import { DEFAULT_LABEL_POLICY, type LabelPolicy } from './labelPolicy.js';

type PlainObject = Record<string, unknown>;

interface PendingValue {
  value: unknown;
  assign: (sanitized: unknown) => void;
}

// defineProperty keeps an own "__proto__" key (possible in parsed JSON) as data
function setEntry(target: PlainObject, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Rewrite relationship types anywhere inside a graph payload.
 *
 * Strings under a designator key are sanitized as literal labels. Other strings
 * are sanitized only when `policy.isRelationshipLabel` flags them. Objects and
 * arrays are rebuilt (keys and order preserved); every other value is returned
 * as is. The input is never mutated.
 *
 * Traversal uses an explicit stack, so deeply nested input cannot overflow the
 * call stack. An object reached twice maps to the same output object, which also
 * makes cyclic input terminate.
 */
export function sanitizeGraphPayload(
  data: GraphPayload,
  policy: LabelPolicy = DEFAULT_LABEL_POLICY
): GraphPayload {
  const rebuilt = new Map<object, PlainObject | unknown[]>();
  let result: unknown = data;
  const stack: PendingValue[] = [{ value: data, assign: (sanitized) => { result = sanitized; } }];

  let pending = stack.pop();
  while (pending) {
    const { value, assign } = pending;

    if (typeof value === 'string') {
      assign(policy.isRelationshipLabel(value) ? sanitizeRelationshipType(value) : value);
    } else if (Array.isArray(value)) {
      const existing = rebuilt.get(value);
      if (existing) {
        assign(existing);
      } else {
        const items: unknown[] = new Array<unknown>(value.length);
        rebuilt.set(value, items);
        assign(items);
        value.forEach((item: unknown, index) => {
          stack.push({ value: item, assign: (sanitized) => { items[index] = sanitized; } });
        });
      }
    } else if (isPlainObject(value)) {
      const existing = rebuilt.get(value);
      if (existing) {
        assign(existing);
      } else {
        const entries: PlainObject = {};
        rebuilt.set(value, entries);
        assign(entries);
        for (const [key, entry] of Object.entries(value)) {
          if (policy.designatorKeys.has(key) && typeof entry === 'string') {
            setEntry(entries, key, sanitizeRelationshipType(entry));
          } else {
            // Reserve the slot now so key order survives the deferred assignment
            setEntry(entries, key, entry);
            stack.push({ value: entry, assign: (sanitized) => setEntry(entries, key, sanitized) });
          }
        }
      }
    } else {
      assign(value);
    }

    pending = stack.pop();
  }

  return result;
}
