import type {
  EvaluationAmbiguity,
  GraphStats,
  WhatCanDoResult,
  WhoCanDoResult,
} from '@iam-explorer/core'

export type TableRow = Record<string, string | number>

export function whoCanDoRows(result: WhoCanDoResult): TableRow[] {
  return result.records.map((record) => ({
    Identity: record.identity.name,
    Kind: record.identity.kind,
    Path: record.attribution,
    Actions: record.matchedActions.join(', '),
    Resources: record.matchedResources.join(', '),
    Policies: record.sourcePolicies.map((p) => p.name).join(', '),
  }))
}

export function whatCanDoRows(result: WhatCanDoResult): TableRow[] {
  return result.permissions.map((permission) => ({
    Effect: permission.effect,
    Action: permission.action,
    Resource: permission.resource,
    Policy: permission.sourcePolicyName,
    Path: permission.path,
  }))
}

export function assumableRoleRows(result: WhatCanDoResult): TableRow[] {
  return result.assumableRoles.map(({ role, chain }) => ({
    Role: role.name,
    Chain: chain.join(' -> '),
  }))
}

export function statsRows(stats: GraphStats): TableRow[] {
  return [
    { Kind: 'users', Count: stats.users },
    { Kind: 'groups', Count: stats.groups },
    { Kind: 'roles', Count: stats.roles },
    { Kind: 'managed policies', Count: stats.managedPolicies },
    { Kind: 'inline policies', Count: stats.inlinePolicies },
    { Kind: 'member_of edges', Count: stats.memberships },
    { Kind: 'attached edges', Count: stats.attachments },
    { Kind: 'trusts edges', Count: stats.trusts },
    { Kind: 'total nodes', Count: stats.totalNodes },
    { Kind: 'total edges', Count: stats.totalEdges },
  ]
}

export function warningLines(warnings: EvaluationAmbiguity[]): string[] {
  return warnings.map((warning) => `⚠ ${warning.message}`)
}
