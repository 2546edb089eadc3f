/**
 * Label policies
 *
 * Decide which payload values are relationship types. Values under a designator
 * key are always treated as labels; free-standing strings are judged by
 * `isRelationshipLabel`, which is a heuristic and therefore configurable.
 */

/** Keys whose string value is a literal relationship type by convention */
export const RELATIONSHIP_DESIGNATOR_KEYS: ReadonlySet<string> = new Set([
  'relationship',
  'relation',
  'rel_type',
  'type',
  'relationship_type',
]);

export const LABEL_HEURISTICS = ['multi-colon', 'any-colon', 'off'] as const;

export type LabelHeuristic = (typeof LABEL_HEURISTICS)[number];

export interface LabelPolicy {
  designatorKeys: ReadonlySet<string>;
  isRelationshipLabel: (value: string) => boolean;
}

function countColons(value: string): number {
  let count = 0;
  for (const character of value) {
    if (character === ':') count++;
  }
  return count;
}

const HEURISTIC_PREDICATES: Record<LabelHeuristic, (value: string) => boolean> = {
  // Known false positives: "12:30:00", "http://host:8080". Known false negatives: "works:at".
  'multi-colon': (value) => countColons(value) > 1,
  'any-colon': (value) => countColons(value) > 0,
  'off': () => false,
};

export function createLabelPolicy(heuristic: LabelHeuristic = 'multi-colon'): LabelPolicy {
  return {
    designatorKeys: RELATIONSHIP_DESIGNATOR_KEYS,
    isRelationshipLabel: HEURISTIC_PREDICATES[heuristic],
  };
}

export const DEFAULT_LABEL_POLICY: LabelPolicy = createLabelPolicy('multi-colon');
