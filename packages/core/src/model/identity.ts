import type { Group, Identity, PolicyDocument, Role, User } from './types.js'

export function isUser(identity: Identity): identity is User {
  return identity.kind === 'user'
}

export function isGroup(identity: Identity): identity is Group {
  return identity.kind === 'group'
}

export function isRole(identity: Identity): identity is Role {
  return identity.kind === 'role'
}

/** Group ARNs the identity belongs to. Only users have memberships. */
export function groupMemberships(identity: Identity): readonly string[] {
  return isUser(identity) ? identity.groupIds : []
}

export function trustPolicyOf(identity: Identity): PolicyDocument | undefined {
  return isRole(identity) ? identity.trustPolicy : undefined
}

/**
 * Account id segment of an ARN (`arn:partition:service:region:account:resource`), or
 * `undefined` for strings that are not ARNs.
 */
export function accountOf(arn: string): string | undefined {
  const parts = arn.split(':')
  if (parts.length < 6 || parts[0] !== 'arn') return undefined
  return parts[4] || undefined
}

/** `user/alice`, `group/admins`, `role/deployer`. */
export function qualifiedName(identity: Identity): string {
  return `${identity.kind}/${identity.name}`
}
