import { MalformedEntityError } from '../errors.js'
import { isValidActionPattern, isValidResourcePattern } from '../policy/wildcard.js'
import type { PolicyDocumentJson, PrincipalJson, StatementJson } from './schema.js'
import type { PolicyDocument, PolicyKind, PrincipalSpec, Statement } from './types.js'

export interface PolicyDocumentOptions {
  id: string
  name: string
  kind: PolicyKind
  ownerId?: string
  awsManaged?: boolean
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return []
  return Array.isArray(value) ? value : [value]
}

export function inlinePolicyId(ownerId: string, name: string): string {
  return `${ownerId}#${name}`
}

export function trustPolicyId(roleId: string): string {
  return `${roleId}#trust`
}

function toPrincipal(json: PrincipalJson): PrincipalSpec {
  if (json === '*') return { any: true, aws: [], service: [], federated: [] }
  const aws = toList(json.AWS)
  return {
    any: aws.includes('*'),
    aws: aws.filter((p) => p !== '*'),
    service: toList(json.Service),
    federated: toList(json.Federated),
  }
}

function toStatement(json: StatementJson, index: number, options: PolicyDocumentOptions): Statement {
  const where = `policy ${options.name} (${options.id}) statement ${json.Sid ?? index}`
  const fail = (reason: string): never => {
    throw new MalformedEntityError(options.ownerId ?? options.id, `${where}: ${reason}`)
  }

  if (json.NotAction !== undefined) fail('NotAction is not supported; rewrite it as an Action list')
  if (json.NotResource !== undefined) fail('NotResource is not supported; rewrite it as a Resource list')
  if (json.NotPrincipal !== undefined) fail('NotPrincipal is not supported; name the principals instead')

  const actions = toList(json.Action)
  if (actions.length === 0) fail('missing Action')
  for (const action of actions) {
    if (!isValidActionPattern(action)) fail(`invalid action pattern "${action}"`)
  }

  const isTrust = options.kind === 'trust'
  let resources = toList(json.Resource)
  if (resources.length === 0) {
    // trust policies are resource policies on the role itself
    if (isTrust) resources = ['*']
    else fail('missing Resource')
  }
  for (const resource of resources) {
    if (!isValidResourcePattern(resource)) fail(`invalid resource pattern "${resource}"`)
  }

  if (isTrust && json.Principal === undefined) fail('trust statement without Principal')

  return {
    ...(json.Sid !== undefined ? { sid: json.Sid } : {}),
    effect: json.Effect,
    actions,
    resources,
    ...(json.Condition !== undefined ? { condition: json.Condition } : {}),
    ...(json.Principal !== undefined ? { principal: toPrincipal(json.Principal) } : {}),
  }
}

/**
 * Turns a validated policy JSON document into the evaluator's model.
 *
 * @throws MalformedEntityError naming the owning identity (or the managed policy) when a
 * statement is unusable.
 */
export function toPolicyDocument(
  json: PolicyDocumentJson,
  options: PolicyDocumentOptions
): PolicyDocument {
  const statements = Array.isArray(json.Statement) ? json.Statement : [json.Statement]
  return {
    id: options.id,
    name: options.name,
    kind: options.kind,
    ...(options.ownerId !== undefined ? { ownerId: options.ownerId } : {}),
    awsManaged: options.awsManaged ?? false,
    statements: statements.map((statement, index) => toStatement(statement, index, options)),
  }
}
