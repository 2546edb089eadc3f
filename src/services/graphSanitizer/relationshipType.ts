/**
 * Relationship type sanitizer
 *
 * Neo4j 5.x rejects relationship types that contain colons. LLM-extracted
 * relations regularly produce labels such as "lives:in:city", so every label is
 * normalized to a plain underscore-separated identifier before it reaches the graph.
 */

// Applied in order, before underscore runs are collapsed
const REPLACED_CHARACTERS = [':', '/', '\\', ' ', '-'] as const;

/**
 * Normalize a relationship type so it contains no `:`, `/`, `\`, spaces or
 * hyphens, no `__`, and no leading or trailing underscore.
 *
 * Empty input is returned unchanged. Idempotent.
 */
export function sanitizeRelationshipType(relationshipType: string): string {
  if (!relationshipType) {
    return relationshipType;
  }

  let sanitized = relationshipType;
  for (const character of REPLACED_CHARACTERS) {
    sanitized = sanitized.split(character).join('_');
  }

  while (sanitized.includes('__')) {
    sanitized = sanitized.replace(/__+/g, '_');
  }

  sanitized = sanitized.replace(/^_+|_+$/g, '');

  if (sanitized !== relationshipType) {
    console.debug(`[GraphSanitizer] Sanitized relationship type: '${relationshipType}' -> '${sanitized}'`);
  }

  return sanitized;
}
