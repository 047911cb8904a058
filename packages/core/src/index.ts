export * from './errors.js'
export * from './model/types.js'
export {
  parseSnapshot,
  formatIssues,
  PolicyDocumentJsonSchema,
  PrincipalJsonSchema,
  StatementJsonSchema,
  UserRecordSchema,
  GroupRecordSchema,
  RoleRecordSchema,
  PolicyRecordSchema,
  SnapshotMetadataSchema,
} from './model/schema.js'
export type {
  Snapshot,
  SnapshotInput,
  SnapshotMetadata,
  UserRecord,
  GroupRecord,
  RoleRecord,
  PolicyRecord,
  PolicyDocumentJson,
  StatementJson,
  PrincipalJson,
} from './model/schema.js'
export { inlinePolicyId, toPolicyDocument, trustPolicyId } from './model/policy-document.js'
export type { PolicyDocumentOptions } from './model/policy-document.js'
export {
  accountOf,
  groupMemberships,
  isGroup,
  isRole,
  isUser,
  qualifiedName,
  trustPolicyOf,
} from './model/identity.js'
export {
  matchesPattern,
  patternCovers,
  patternsOverlap,
  isValidActionPattern,
  isValidResourcePattern,
  wildcardToRegex,
} from './policy/wildcard.js'
export { evaluate, explain, matches, overlaps } from './policy/evaluator.js'
export type { Decision, Evaluation, EvaluationAmbiguity, StatementRef } from './policy/evaluator.js'
export { ASSUME_ROLE_ACTION, evaluateTrust, principalMatches } from './graph/trust.js'
export { buildGraph } from './graph/build.js'
export { PermissionGraph } from './graph/permission-graph.js'
export type { AttributedPolicy, GraphParts, GraphStats, TrustGrant } from './graph/permission-graph.js'
export { exportGraph } from './graph/export.js'
export type { ExportEdge, ExportNode, ExportNodeKind, ExportOptions, GraphExport } from './graph/export.js'
export { QueryEngine } from './query/query-engine.js'
export type { WhoCanDoResult } from './query/query-engine.js'
export { formatAttribution } from './query/types.js'
export type {
  AssumableRole,
  Attribution,
  IdentitySummary,
  PermissionEntry,
  QueryOptions,
  SourcePolicy,
  WhatCanDoResult,
  WhoCanDoRecord,
} from './query/types.js'
export { deserializeGraph, GRAPH_FORMAT, GRAPH_FORMAT_VERSION, serializeGraph } from './serialization.js'
