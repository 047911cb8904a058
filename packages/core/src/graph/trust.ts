import { accountOf, isGroup } from '../model/identity.js'
import type { Identity, PrincipalSpec, Role } from '../model/types.js'
import { decide, matches, statementRefs, type Evaluation } from '../policy/evaluator.js'
import { matchesPattern } from '../policy/wildcard.js'

export const ASSUME_ROLE_ACTION = 'sts:AssumeRole'

const ACCOUNT_ROOT = /^arn:[^:]+:iam::(\d+):root$/

function namesAccount(pattern: string, account: string): boolean {
  if (pattern === account) return true
  const root = ACCOUNT_ROOT.exec(pattern)
  return root?.[1] === account
}

/**
 * True when a trust statement's Principal designates the identity: by its ARN (wildcards
 * honored), by its account (`<account>` or `arn:aws:iam::<account>:root`), or by `*`.
 * Groups are never principals.
 */
export function principalMatches(principal: PrincipalSpec, identity: Identity): boolean {
  if (isGroup(identity)) return false
  if (principal.any) return true

  const account = accountOf(identity.id)
  return principal.aws.some(
    (pattern) =>
      matchesPattern(pattern, identity.id) ||
      (account !== undefined && namesAccount(pattern, account))
  )
}

/**
 * Evaluates the role's trust policy for `sts:AssumeRole` by the identity, considering only
 * statements whose Principal designates it. A matching Deny wins as usual.
 */
export function evaluateTrust(role: Role, identity: Identity): Evaluation {
  const applicable = statementRefs([role.trustPolicy]).filter(
    ({ statement }) =>
      statement.principal !== undefined &&
      principalMatches(statement.principal, identity) &&
      matches(statement, ASSUME_ROLE_ACTION, role.id)
  )
  return decide(applicable)
}

/** Source strings of the trust edges a statement contributes. */
export function trustSources(principal: PrincipalSpec): string[] {
  return [
    ...(principal.any ? ['*'] : []),
    ...principal.aws,
    ...principal.service,
    ...principal.federated,
  ]
}
