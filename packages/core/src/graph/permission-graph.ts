import { queryFailure, type QueryResult } from '../errors.js'
import type { EvaluationAmbiguity } from '../policy/evaluator.js'
import { isRole, isUser, qualifiedName } from '../model/identity.js'
import type { Snapshot } from '../model/schema.js'
import type {
  Group,
  Identity,
  IdentityKind,
  PolicyDocument,
  RelationshipEdge,
  Role,
} from '../model/types.js'
import { evaluateTrust } from './trust.js'

/**
 * A policy document together with the group it was inherited from, if any.
 */
export interface AttributedPolicy {
  document: PolicyDocument
  group?: Group
}

/**
 * A role the identity may assume, with the trust-policy Conditions that were ignored to
 * reach that answer.
 */
export interface TrustGrant {
  role: Role
  warnings: readonly EvaluationAmbiguity[]
}

export interface GraphStats {
  totalNodes: number
  totalEdges: number
  users: number
  groups: number
  roles: number
  managedPolicies: number
  inlinePolicies: number
  memberships: number
  attachments: number
  trusts: number
}

export interface GraphParts {
  snapshot: Snapshot
  identities: Identity[]
  policies: PolicyDocument[]
  edges: RelationshipEdge[]
}

/**
 * The linked, read-only permission graph. Instances come from `buildGraph` or
 * `deserializeGraph`; nothing on the graph changes after construction, so one instance
 * can serve any number of queries.
 */
export class PermissionGraph {
  /** The validated snapshot the graph was built from; used for serialization. */
  readonly snapshot: Snapshot

  private readonly identityList: readonly Identity[]
  private readonly identityMap: Map<string, Identity>
  private readonly qualifiedMap: Map<string, Identity>
  private readonly nameMap: Map<string, Identity[]>
  private readonly policyList: readonly PolicyDocument[]
  private readonly policyMap: Map<string, PolicyDocument>
  private readonly edgeList: readonly RelationshipEdge[]
  // lazily filled; answers are a pure function of the frozen trust policies
  private readonly trustCache = new Map<string, readonly TrustGrant[]>()

  constructor(parts: GraphParts) {
    this.snapshot = parts.snapshot
    this.identityList = Object.freeze([...parts.identities])
    this.policyList = Object.freeze([...parts.policies])
    this.edgeList = Object.freeze(parts.edges.map((edge) => Object.freeze({ ...edge })))

    this.identityMap = new Map()
    this.qualifiedMap = new Map()
    this.nameMap = new Map()
    this.policyMap = new Map()

    for (const policy of this.policyList) {
      this.policyMap.set(policy.id, policy)
    }
    for (const identity of this.identityList) {
      this.identityMap.set(identity.id, identity)
      this.qualifiedMap.set(qualifiedName(identity), identity)
      this.nameMap.set(identity.name, [...(this.nameMap.get(identity.name) ?? []), identity])
      for (const inline of identity.inlinePolicies) this.policyMap.set(inline.id, inline)
      if (isRole(identity)) this.policyMap.set(identity.trustPolicy.id, identity.trustPolicy)
    }
  }

  /**
   * Every identity in snapshot insertion order: users, then groups, then roles. Each call
   * returns a fresh iterator.
   */
  *allIdentities(): Generator<Identity> {
    yield* this.identityList
  }

  identities(kind?: IdentityKind): Identity[] {
    return kind ? this.identityList.filter((i) => i.kind === kind) : [...this.identityList]
  }

  getIdentity(id: string): Identity | undefined {
    return this.identityMap.get(id)
  }

  /**
   * Resolves an ARN, a `kind/name` reference or a bare name. Bare names shared by several
   * identities are rejected rather than guessed.
   */
  resolveIdentity(ref: string): QueryResult<Identity> {
    const exact = this.identityMap.get(ref) ?? this.qualifiedMap.get(ref)
    if (exact) return { success: true, data: exact }

    const named = this.nameMap.get(ref) ?? []
    const [only] = named
    if (only && named.length === 1) return { success: true, data: only }
    if (named.length > 1) {
      return queryFailure(
        'AmbiguousIdentity',
        `"${ref}" names ${named.length} identities (${named.map(qualifiedName).join(', ')}); use an ARN or kind/name`
      )
    }
    return queryFailure('UnknownIdentity', `No identity matches "${ref}"`)
  }

  getPolicy(id: string): PolicyDocument | undefined {
    return this.policyMap.get(id)
  }

  /** Managed policies, in snapshot order. */
  policies(): PolicyDocument[] {
    return [...this.policyList]
  }

  edges(): readonly RelationshipEdge[] {
    return this.edgeList
  }

  groupsOf(identity: Identity): Group[] {
    if (!isUser(identity)) return []
    return identity.groupIds.flatMap((id) => {
      const group = this.identityMap.get(id)
      return group?.kind === 'group' ? [group] : []
    })
  }

  /** Managed policies attached to the identity, then its inline policies. */
  attachedPolicies(identity: Identity): PolicyDocument[] {
    const managed = identity.attachedPolicyIds.flatMap((id) => {
      const policy = this.policyMap.get(id)
      return policy ? [policy] : []
    })
    return [...managed, ...identity.inlinePolicies]
  }

  /**
   * Direct policies first, then those inherited from each group in membership order.
   * A document reachable twice is reported once, at its first position.
   */
  attributedPolicies(identity: Identity): AttributedPolicy[] {
    const seen = new Set<string>()
    const result: AttributedPolicy[] = []
    const push = (document: PolicyDocument, group?: Group) => {
      if (seen.has(document.id)) return
      seen.add(document.id)
      result.push(group ? { document, group } : { document })
    }

    for (const document of this.attachedPolicies(identity)) push(document)
    for (const group of this.groupsOf(identity)) {
      for (const document of this.attachedPolicies(group)) push(document, group)
    }
    return result
  }

  effectivePolicies(identity: Identity): PolicyDocument[] {
    return this.attributedPolicies(identity).map((p) => p.document)
  }

  /** Roles whose trust policy lets the identity call `sts:AssumeRole`. */
  assumableRoles(identity: Identity): readonly Role[] {
    return this.trustGrants(identity).map((grant) => grant.role)
  }

  /** {@link assumableRoles}, keeping the warnings of each trust evaluation. */
  trustGrants(identity: Identity): readonly TrustGrant[] {
    const cached = this.trustCache.get(identity.id)
    if (cached) return cached

    const grants: TrustGrant[] = []
    for (const candidate of this.identityList) {
      if (!isRole(candidate)) continue
      const evaluation = evaluateTrust(candidate, identity)
      if (evaluation.decision === 'Allow') {
        grants.push(Object.freeze({ role: candidate, warnings: Object.freeze(evaluation.warnings) }))
      }
    }
    const frozen = Object.freeze(grants)
    this.trustCache.set(identity.id, frozen)
    return frozen
  }

  stats(): GraphStats {
    const count = (kind: IdentityKind) => this.identityList.filter((i) => i.kind === kind).length
    const countEdges = (kind: RelationshipEdge['kind']) =>
      this.edgeList.filter((e) => e.kind === kind).length
    const inlinePolicies = this.identityList.reduce((n, i) => n + i.inlinePolicies.length, 0)

    return {
      totalNodes: this.identityList.length + this.policyList.length + inlinePolicies,
      totalEdges: this.edgeList.length,
      users: count('user'),
      groups: count('group'),
      roles: count('role'),
      managedPolicies: this.policyList.length,
      inlinePolicies,
      memberships: countEdges('member_of'),
      attachments: countEdges('attached'),
      trusts: countEdges('trusts'),
    }
  }
}
