import type { Effect, IdentityKind } from '../model/types.js'
import type { EvaluationAmbiguity } from '../policy/evaluator.js'

/**
 * How a permission reached the identity being asked about.
 */
export type Attribution =
  | { kind: 'direct' }
  | { kind: 'group'; group: string }
  | { kind: 'role'; chain: readonly string[] }

export function formatAttribution(attribution: Attribution): string {
  switch (attribution.kind) {
    case 'direct':
      return 'direct'
    case 'group':
      return `via-group:${attribution.group}`
    case 'role':
      return `via-role:${attribution.chain.join('->')}`
  }
}

export interface IdentitySummary {
  id: string
  name: string
  kind: IdentityKind
}

export interface SourcePolicy {
  id: string
  name: string
  /** `direct` or `via-group:<name>`, relative to the identity holding the policy. */
  attribution: string
}

export interface WhoCanDoRecord {
  identity: IdentitySummary
  /** Role names assumed on the way, in order; empty when the identity holds the grant itself. */
  via: string[]
  attribution: string
  /** Statement action patterns that overlap the query and survive every deny. */
  matchedActions: string[]
  matchedResources: string[]
  sourcePolicies: SourcePolicy[]
  warnings: EvaluationAmbiguity[]
}

export interface PermissionEntry {
  action: string
  resource: string
  effect: Effect
  sourcePolicyId: string
  sourcePolicyName: string
  attribution: Attribution
  /** {@link formatAttribution} of `attribution`. */
  path: string
}

export interface AssumableRole {
  role: IdentitySummary
  /** Role names from the first assumption to this role. */
  chain: string[]
}

export interface WhatCanDoResult {
  identity: IdentitySummary
  permissions: PermissionEntry[]
  assumableRoles: AssumableRole[]
  warnings: EvaluationAmbiguity[]
}

export interface QueryOptions {
  /** Checked before each identity is visited; an aborted query fails with `Cancelled`. */
  signal?: AbortSignal
}
