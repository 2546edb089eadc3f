export { sanitizeRelationshipType } from './relationshipType.js';
export { sanitizeGraphPayload } from './graphPayload.js';
export { sanitizeCypherQuery } from './cypherQuery.js';
export {
  RELATIONSHIP_DESIGNATOR_KEYS,
  LABEL_HEURISTICS,
  DEFAULT_LABEL_POLICY,
  createLabelPolicy,
  type LabelHeuristic,
  type LabelPolicy,
} from './labelPolicy.js';
export { SanitizingGraphIngestion, SanitizingQueryExecutor } from './sanitizingDecorators.js';
export {
  installGraphSanitizers,
  type GraphIngestionFactory,
  type GraphSanitizerOptions,
  type GraphSanitizerTargets,
  type InstalledGraphSanitizers,
  type SanitizerInstallStatus,
} from './installer.js';
