export type Effect = 'Allow' | 'Deny'

/**
 * Principals named by a trust-policy statement. `any` is set for `"Principal": "*"` and for
 * an `AWS` entry of `*`.
 */
export interface PrincipalSpec {
  any: boolean
  aws: readonly string[]
  service: readonly string[]
  federated: readonly string[]
}

export interface Statement {
  sid?: string
  effect: Effect
  actions: readonly string[]
  resources: readonly string[]
  /** Opaque; never evaluated. */
  condition?: Readonly<Record<string, unknown>>
  principal?: PrincipalSpec
}

export type PolicyKind = 'managed' | 'inline' | 'trust'

export interface PolicyDocument {
  /** Managed: the policy ARN. Inline: `<owner-arn>#<name>`. Trust: `<role-arn>#trust`. */
  id: string
  name: string
  kind: PolicyKind
  ownerId?: string
  awsManaged: boolean
  statements: readonly Statement[]
}

export type IdentityKind = 'user' | 'group' | 'role'

interface IdentityBase {
  id: string
  name: string
  path?: string
  attachedPolicyIds: readonly string[]
  inlinePolicies: readonly PolicyDocument[]
}

export interface User extends IdentityBase {
  kind: 'user'
  /** Resolved group ARNs, in snapshot order. */
  groupIds: readonly string[]
}

export interface Group extends IdentityBase {
  kind: 'group'
}

export interface Role extends IdentityBase {
  kind: 'role'
  trustPolicy: PolicyDocument
}

export type Identity = User | Group | Role

export type EdgeKind = 'member_of' | 'attached' | 'trusts'

/**
 * `member_of`: user → group. `attached`: identity → policy document (managed or inline).
 * `trusts`: principal pattern → role.
 */
export interface RelationshipEdge {
  kind: EdgeKind
  source: string
  target: string
}
