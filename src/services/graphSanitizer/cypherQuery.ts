/**
 * Cypher relationship-type rewriter
 *
 * Pattern based, not a Cypher parser. Only `-[var:TYPE]->` and `-[:TYPE]->`
 * clauses are recognized. Reverse (`<-[...]-`) and undirected (`-[...]-`) edges
 * and `TYPE_A|TYPE_B` alternatives pass through untouched, and a property map
 * inside the brackets is read as part of TYPE.
 */

import { sanitizeRelationshipType } from './relationshipType.js';

const DIRECTED_RELATIONSHIP_PATTERN = /-\[([A-Za-z_][A-Za-z0-9_]*)?:([^\]]+)\]->/g;

export function sanitizeCypherQuery(query: string): string {
  const sanitized = query.replace(
    DIRECTED_RELATIONSHIP_PATTERN,
    (_match: string, variable: string | undefined, relationshipType: string) =>
      `-[${variable ?? ''}:${sanitizeRelationshipType(relationshipType)}]->`
  );

  if (sanitized !== query) {
    console.debug('[GraphSanitizer] Sanitized Cypher query');
  }

  return sanitized;
}
