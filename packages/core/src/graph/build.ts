import { getLogger } from '@iam-explorer/telemetry'
import { InconsistentSnapshotError } from '../errors.js'
import { groupMemberships } from '../model/identity.js'
import { inlinePolicyId, toPolicyDocument, trustPolicyId } from '../model/policy-document.js'
import {
  parseSnapshot,
  type GroupRecord,
  type PolicyDocumentJson,
  type Snapshot,
} from '../model/schema.js'
import type { Group, Identity, PolicyDocument, RelationshipEdge, Role, User } from '../model/types.js'
import { PermissionGraph } from './permission-graph.js'
import { trustSources } from './trust.js'

const logger = getLogger(['iam-explorer', 'graph'])

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

/**
 * Collects edges, dropping exact duplicates (a principal named twice in one trust policy,
 * for instance).
 */
class EdgeSet {
  private readonly keys = new Set<string>()
  readonly edges: RelationshipEdge[] = []

  add(kind: RelationshipEdge['kind'], source: string, target: string) {
    const key = `${kind}\u0000${source}\u0000${target}`
    if (this.keys.has(key)) return
    this.keys.add(key)
    this.edges.push({ kind, source, target })
  }
}

function inlinePolicies(ownerId: string, docs: Record<string, PolicyDocumentJson>): PolicyDocument[] {
  return Object.entries(docs).map(([name, json]) =>
    toPolicyDocument(json, { id: inlinePolicyId(ownerId, name), name, kind: 'inline', ownerId })
  )
}

function checkAttachments(ownerId: string, ids: string[], managed: Map<string, PolicyDocument>) {
  for (const id of ids) {
    if (!managed.has(id)) {
      throw new InconsistentSnapshotError(ownerId, `attached policy ${id} is not in the snapshot`)
    }
  }
}

function groupResolver(groups: GroupRecord[]) {
  const byArn = new Map(groups.map((g) => [g.arn, g]))
  const byName = new Map<string, GroupRecord[]>()
  for (const group of groups) byName.set(group.name, [...(byName.get(group.name) ?? []), group])

  return (ownerId: string, ref: string): string => {
    const direct = byArn.get(ref)
    if (direct) return direct.arn
    const named = byName.get(ref) ?? []
    const [only] = named
    if (!only) throw new InconsistentSnapshotError(ownerId, `group ${ref} is not in the snapshot`)
    if (named.length > 1) {
      throw new InconsistentSnapshotError(ownerId, `group name ${ref} is ambiguous; use its ARN`)
    }
    return only.arn
  }
}

/**
 * Validates a snapshot and links it into a {@link PermissionGraph}.
 *
 * Every reference is resolved before the graph exists: an attachment to an unknown policy,
 * a membership in an unknown group or a duplicated identifier aborts the build. A graph
 * with a dropped edge would under-report permissions.
 *
 * @throws MalformedEntityError when a record or policy statement is invalid.
 * @throws InconsistentSnapshotError when records reference each other inconsistently.
 */
export function buildGraph(input: unknown): PermissionGraph {
  const snapshot: Snapshot = parseSnapshot(input)

  const managed = new Map<string, PolicyDocument>()
  for (const record of snapshot.policies) {
    if (managed.has(record.arn)) {
      throw new InconsistentSnapshotError(record.arn, 'duplicate policy identifier')
    }
    managed.set(
      record.arn,
      toPolicyDocument(record.policy_document, {
        id: record.arn,
        name: record.name,
        kind: 'managed',
        awsManaged: record.is_aws_managed,
      })
    )
  }

  const seenIdentities = new Set<string>()
  const claim = (id: string) => {
    if (seenIdentities.has(id)) throw new InconsistentSnapshotError(id, 'duplicate identity identifier')
    seenIdentities.add(id)
  }
  const resolveGroup = groupResolver(snapshot.groups)
  const edges = new EdgeSet()

  const users = snapshot.users.map((record): User => {
    claim(record.arn)
    checkAttachments(record.arn, record.attached_policies, managed)
    const groupIds = [...new Set(record.groups.map((ref) => resolveGroup(record.arn, ref)))]
    return {
      kind: 'user',
      id: record.arn,
      name: record.name,
      ...(record.path !== undefined ? { path: record.path } : {}),
      attachedPolicyIds: record.attached_policies,
      inlinePolicies: inlinePolicies(record.arn, record.inline_policies),
      groupIds,
    }
  })

  const groups = snapshot.groups.map((record): Group => {
    claim(record.arn)
    checkAttachments(record.arn, record.attached_policies, managed)
    return {
      kind: 'group',
      id: record.arn,
      name: record.name,
      ...(record.path !== undefined ? { path: record.path } : {}),
      attachedPolicyIds: record.attached_policies,
      inlinePolicies: inlinePolicies(record.arn, record.inline_policies),
    }
  })

  const roles = snapshot.roles.map((record): Role => {
    claim(record.arn)
    checkAttachments(record.arn, record.attached_policies, managed)
    return {
      kind: 'role',
      id: record.arn,
      name: record.name,
      ...(record.path !== undefined ? { path: record.path } : {}),
      attachedPolicyIds: record.attached_policies,
      inlinePolicies: inlinePolicies(record.arn, record.inline_policies),
      trustPolicy: toPolicyDocument(record.assume_role_policy, {
        id: trustPolicyId(record.arn),
        name: `${record.name} trust policy`,
        kind: 'trust',
        ownerId: record.arn,
      }),
    }
  })

  const identities: Identity[] = [...users, ...groups, ...roles]
  for (const identity of identities) {
    for (const groupId of groupMemberships(identity)) edges.add('member_of', identity.id, groupId)
    for (const policyId of identity.attachedPolicyIds) edges.add('attached', identity.id, policyId)
    for (const inline of identity.inlinePolicies) edges.add('attached', identity.id, inline.id)
  }
  for (const role of roles) {
    for (const statement of role.trustPolicy.statements) {
      if (statement.effect !== 'Allow' || !statement.principal) continue
      for (const source of trustSources(statement.principal)) edges.add('trusts', source, role.id)
    }
  }

  const graph = new PermissionGraph({
    snapshot: deepFreeze(snapshot),
    identities: identities.map(deepFreeze),
    policies: [...managed.values()].map(deepFreeze),
    edges: edges.edges,
  })

  const stats = graph.stats()
  logger.info('built permission graph: {users} users, {groups} groups, {roles} roles, {policies} policies, {edges} edges', {
    users: stats.users,
    groups: stats.groups,
    roles: stats.roles,
    policies: stats.managedPolicies,
    edges: stats.totalEdges,
  })
  return graph
}
