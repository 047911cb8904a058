import { getLogger } from '@iam-explorer/telemetry'
import { queryFailure, type QueryResult } from '../errors.js'
import type { AttributedPolicy, PermissionGraph } from '../graph/permission-graph.js'
import type { Identity, Role } from '../model/types.js'
import {
  conditionWarning,
  denyCovers,
  logAmbiguities,
  overlaps,
  statementRefs,
  type EvaluationAmbiguity,
  type StatementRef,
} from '../policy/evaluator.js'
import { isValidActionPattern, isValidResourcePattern, patternsOverlap } from '../policy/wildcard.js'
import {
  formatAttribution,
  type Attribution,
  type IdentitySummary,
  type PermissionEntry,
  type QueryOptions,
  type SourcePolicy,
  type WhatCanDoResult,
  type WhoCanDoRecord,
} from './types.js'

const logger = getLogger(['iam-explorer', 'query'])

export interface WhoCanDoResult {
  records: WhoCanDoRecord[]
  /**
   * Every ignored Condition that influenced the answer, including conditional denies that
   * removed an identity from `records` altogether.
   */
  warnings: EvaluationAmbiguity[]
}

interface SourcedRef extends StatementRef {
  source: SourcePolicy
}

interface Grant {
  actions: string[]
  resources: string[]
  sources: SourcePolicy[]
}

interface GrantAnalysis {
  grant?: Grant
  warnings: EvaluationAmbiguity[]
}

interface ReachableRole {
  role: Role
  chain: string[]
  /** Ignored trust Conditions on every hop of the chain. */
  trustWarnings: EvaluationAmbiguity[]
}

type PatternQuery = { action: string; resource: string }

function summarize(identity: Identity): IdentitySummary {
  return { id: identity.id, name: identity.name, kind: identity.kind }
}

function warningKey(warning: EvaluationAmbiguity): string {
  return `${warning.policyId}\u0000${warning.statementIndex}`
}

function mergeWarnings(
  into: Map<string, EvaluationAmbiguity>,
  warnings: readonly EvaluationAmbiguity[]
) {
  for (const warning of warnings) {
    if (!into.has(warningKey(warning))) into.set(warningKey(warning), warning)
  }
}

function cancelled(): QueryResult<never> {
  return queryFailure('Cancelled', 'Query was cancelled')
}

function validatePatterns(action: string, resource: string): QueryResult<never> | undefined {
  if (!action) return queryFailure('InvalidPattern', 'Action pattern must not be empty')
  if (!isValidActionPattern(action)) {
    return queryFailure(
      'InvalidPattern',
      `Action pattern "${action}" may only contain letters, digits, ":", "_", "-", "*" and "?"`
    )
  }
  if (!resource) return queryFailure('InvalidPattern', 'Resource pattern must not be empty')
  if (!isValidResourcePattern(resource)) {
    return queryFailure(
      'InvalidPattern',
      `Resource pattern "${resource}" may only contain printable ASCII without spaces`
    )
  }
  return undefined
}

/**
 * Answers "who can do X" and "what can Y do" over a built {@link PermissionGraph}.
 *
 * Queries never modify the graph; the only traversal state (visited roles, per-query
 * grant cache) lives on the stack of a single call, so concurrent callers do not share
 * anything mutable.
 */
export class QueryEngine {
  constructor(private readonly graph: PermissionGraph) {}

  /**
   * Identities allowed to perform some action matching `actionPattern` on some resource
   * matching `resourcePattern`. Both patterns may contain wildcards; a statement counts
   * when its patterns share at least one concrete string with the query's.
   *
   * Each identity yields one record for its own grant and one per assumable role (followed
   * transitively) whose grant qualifies, with `via` naming the roles on the way.
   */
  whoCanDo(
    actionPattern: string,
    resourcePattern = '*',
    options: QueryOptions = {}
  ): QueryResult<WhoCanDoResult> {
    const invalid = validatePatterns(actionPattern, resourcePattern)
    if (invalid) return invalid

    const started = performance.now()
    const query: PatternQuery = { action: actionPattern, resource: resourcePattern }
    const analyses = new Map<string, GrantAnalysis>()
    const analyze = (identity: Identity): GrantAnalysis => {
      const cached = analyses.get(identity.id)
      if (cached) return cached
      const analysis = this.analyzeGrant(identity, query)
      analyses.set(identity.id, analysis)
      return analysis
    }

    const records: WhoCanDoRecord[] = []
    const warnings = new Map<string, EvaluationAmbiguity>()
    for (const identity of this.graph.allIdentities()) {
      if (options.signal?.aborted) return cancelled()

      const own = analyze(identity)
      if (own.grant) records.push(this.toRecord(identity, [], own))
      for (const { role, chain, trustWarnings } of this.reachableRoles(identity)) {
        const viaRole = analyze(role)
        if (!viaRole.grant) continue
        records.push(this.toRecord(identity, chain, viaRole, trustWarnings))
        mergeWarnings(warnings, trustWarnings)
      }
    }

    for (const analysis of analyses.values()) mergeWarnings(warnings, analysis.warnings)
    logAmbiguities([...warnings.values()])

    logger.debug`who-can-do ${actionPattern} on ${resourcePattern}: ${records.length} records in ${Math.round(performance.now() - started)}ms`
    return { success: true, data: { records, warnings: [...warnings.values()] } }
  }

  /**
   * Every (action, resource, effect, source policy) tuple reachable by the identity: its
   * own and group-inherited policies, then the policies of every role it can assume,
   * directly or through other roles. Tuples are reported once, with the first attribution
   * found (direct, then groups, then roles breadth-first).
   */
  whatCanDo(identityRef: string, options: QueryOptions = {}): QueryResult<WhatCanDoResult> {
    const resolved = this.graph.resolveIdentity(identityRef)
    if (!resolved.success) return resolved
    const identity = resolved.data

    const started = performance.now()
    const seen = new Set<string>()
    const permissions: PermissionEntry[] = []
    const warnings = new Map<string, EvaluationAmbiguity>()

    const collect = (subject: Identity, attributionOf: (policy: AttributedPolicy) => Attribution) => {
      for (const policy of this.graph.attributedPolicies(subject)) {
        const attribution = attributionOf(policy)
        for (const ref of statementRefs([policy.document])) {
          const { statement } = ref
          if (statement.condition !== undefined) mergeWarnings(warnings, [conditionWarning(ref)])
          for (const action of statement.actions) {
            for (const resource of statement.resources) {
              const key = [action, resource, statement.effect, ref.policyId].join('\u0000')
              if (seen.has(key)) continue
              seen.add(key)
              permissions.push({
                action,
                resource,
                effect: statement.effect,
                sourcePolicyId: ref.policyId,
                sourcePolicyName: ref.policyName,
                attribution,
                path: formatAttribution(attribution),
              })
            }
          }
        }
      }
    }

    if (options.signal?.aborted) return cancelled()
    collect(identity, (policy) =>
      policy.group ? { kind: 'group', group: policy.group.name } : { kind: 'direct' }
    )

    const reachable = this.reachableRoles(identity)
    for (const { role, chain, trustWarnings } of reachable) {
      if (options.signal?.aborted) return cancelled()
      mergeWarnings(warnings, trustWarnings)
      collect(role, () => ({ kind: 'role', chain }))
    }

    logAmbiguities([...warnings.values()])
    logger.debug`what-can-do ${identity.id}: ${permissions.length} permissions via ${reachable.length} roles in ${Math.round(performance.now() - started)}ms`

    return {
      success: true,
      data: {
        identity: summarize(identity),
        permissions,
        assumableRoles: reachable.map(({ role, chain }) => ({ role: summarize(role), chain })),
        warnings: [...warnings.values()],
      },
    }
  }

  /**
   * Roles reachable from `start` through chains of trust, breadth-first. The visited set
   * is seeded with `start` and each role is expanded once, so cyclic trust terminates.
   */
  private reachableRoles(start: Identity): ReachableRole[] {
    const visited = new Set<string>([start.id])
    const reachable: ReachableRole[] = []
    const frontier: Array<Omit<ReachableRole, 'role'> & { identity: Identity }> = [
      { identity: start, chain: [], trustWarnings: [] },
    ]

    // the frontier grows while it is iterated
    for (const { identity, chain, trustWarnings } of frontier) {
      for (const { role, warnings } of this.graph.trustGrants(identity)) {
        if (visited.has(role.id)) continue
        visited.add(role.id)
        const hop = { role, chain: [...chain, role.name], trustWarnings: [...trustWarnings, ...warnings] }
        reachable.push(hop)
        frontier.push({ identity: role, chain: hop.chain, trustWarnings: hop.trustWarnings })
      }
    }
    return reachable
  }

  private sourcedRefs(identity: Identity): SourcedRef[] {
    return this.graph.attributedPolicies(identity).flatMap((policy) => {
      const source: SourcePolicy = {
        id: policy.document.id,
        name: policy.document.name,
        attribution: policy.group ? `via-group:${policy.group.name}` : 'direct',
      }
      return statementRefs([policy.document]).map((ref) => ({ ...ref, source }))
    })
  }

  /**
   * Finds the allow statements of the identity that overlap the query, pairing each of
   * their action and resource patterns, and drops every pair a deny statement fully
   * covers. Whatever pairs survive make up the grant.
   */
  private analyzeGrant(identity: Identity, query: PatternQuery): GrantAnalysis {
    const relevant = this.sourcedRefs(identity).filter((ref) =>
      overlaps(ref.statement, query.action, query.resource)
    )
    const denies = relevant.filter((ref) => ref.statement.effect === 'Deny')
    const allows = relevant.filter((ref) => ref.statement.effect === 'Allow')

    const actions = new Set<string>()
    const resources = new Set<string>()
    const sources = new Map<string, SourcePolicy>()
    const ambiguous = new Set<StatementRef>()

    for (const allow of allows) {
      let survived = false
      for (const action of allow.statement.actions) {
        if (!patternsOverlap(action, query.action)) continue
        for (const resource of allow.statement.resources) {
          if (!patternsOverlap(resource, query.resource)) continue
          const cancelling = denies.filter((deny) =>
            denyCovers(deny.statement, { action, resource }, query)
          )
          if (cancelling.length > 0) {
            for (const deny of cancelling) {
              if (deny.statement.condition !== undefined) ambiguous.add(deny)
            }
            continue
          }
          survived = true
          actions.add(action)
          resources.add(resource)
        }
      }
      if (survived) {
        if (!sources.has(allow.source.id)) sources.set(allow.source.id, allow.source)
        if (allow.statement.condition !== undefined) ambiguous.add(allow)
      }
    }

    const warnings = [...ambiguous].map(conditionWarning)
    if (actions.size === 0) return { warnings }
    return {
      grant: { actions: [...actions], resources: [...resources], sources: [...sources.values()] },
      warnings,
    }
  }

  private toRecord(
    identity: Identity,
    via: string[],
    analysis: GrantAnalysis,
    trustWarnings: EvaluationAmbiguity[] = []
  ): WhoCanDoRecord {
    const grant = analysis.grant ?? { actions: [], resources: [], sources: [] }
    const warnings = new Map<string, EvaluationAmbiguity>()
    mergeWarnings(warnings, trustWarnings)
    mergeWarnings(warnings, analysis.warnings)
    return {
      identity: summarize(identity),
      via,
      attribution: via.length > 0 ? formatAttribution({ kind: 'role', chain: via }) : 'direct',
      matchedActions: grant.actions,
      matchedResources: grant.resources,
      sourcePolicies: grant.sources,
      warnings: [...warnings.values()],
    }
  }
}
