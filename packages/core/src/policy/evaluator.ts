import { getLogger } from '@iam-explorer/telemetry'
import type { PolicyDocument, Statement } from '../model/types.js'
import { matchesPattern, patternCovers, patternsOverlap } from './wildcard.js'

const logger = getLogger(['iam-explorer', 'evaluator'])

export type Decision = 'Allow' | 'Deny' | 'ImplicitDeny'

/** Points at one statement inside one policy document. */
export interface StatementRef {
  policyId: string
  policyName: string
  index: number
  sid?: string
  statement: Statement
}

/**
 * A matching statement carried a Condition that was not evaluated. The statement was
 * treated as matching, so an Allow may be over-reported; a Deny is never hidden.
 */
export interface EvaluationAmbiguity {
  code: 'EvaluationAmbiguity'
  policyId: string
  statementIndex: number
  sid?: string
  message: string
}

export interface Evaluation {
  decision: Decision
  /** Deny statements when the decision is Deny, Allow statements when it is Allow. */
  deciding: StatementRef[]
  warnings: EvaluationAmbiguity[]
}

export function statementRefs(documents: Iterable<PolicyDocument>): StatementRef[] {
  const refs: StatementRef[] = []
  for (const document of documents) {
    document.statements.forEach((statement, index) => {
      refs.push({
        policyId: document.id,
        policyName: document.name,
        index,
        ...(statement.sid !== undefined ? { sid: statement.sid } : {}),
        statement,
      })
    })
  }
  return refs
}

export function conditionWarning(ref: StatementRef): EvaluationAmbiguity {
  const label = ref.sid ?? `#${ref.index}`
  return {
    code: 'EvaluationAmbiguity',
    policyId: ref.policyId,
    statementIndex: ref.index,
    ...(ref.sid !== undefined ? { sid: ref.sid } : {}),
    message: `Condition on ${ref.policyName} statement ${label} was not evaluated; treated as matching`,
  }
}

export function logAmbiguities(warnings: EvaluationAmbiguity[]): void {
  for (const warning of warnings) {
    logger.warn`${warning.message}`
  }
}

/**
 * True iff `action` matches one of the statement's Action patterns and `resource` one of
 * its Resource patterns. Conditions are ignored.
 */
export function matches(statement: Statement, action: string, resource: string): boolean {
  return (
    statement.actions.some((pattern) => matchesPattern(pattern, action)) &&
    statement.resources.some((pattern) => matchesPattern(pattern, resource))
  )
}

/**
 * Pattern-level variant of {@link matches}: true iff some concrete (action, resource) pair
 * is matched both by the statement and by the query patterns.
 */
export function overlaps(statement: Statement, actionPattern: string, resourcePattern: string): boolean {
  return (
    statement.actions.some((pattern) => patternsOverlap(pattern, actionPattern)) &&
    statement.resources.some((pattern) => patternsOverlap(pattern, resourcePattern))
  )
}

/**
 * True when a Deny statement is known to deny every (action, resource) pair that lies in
 * both the allowed patterns and the query patterns.
 */
export function denyCovers(
  deny: Statement,
  allowed: { action: string; resource: string },
  query: { action: string; resource: string }
): boolean {
  const coversAction = deny.actions.some(
    (pattern) => patternCovers(pattern, allowed.action) || patternCovers(pattern, query.action)
  )
  if (!coversAction) return false
  return deny.resources.some(
    (pattern) => patternCovers(pattern, allowed.resource) || patternCovers(pattern, query.resource)
  )
}

/**
 * Evaluates an (action, resource) pair against every statement of every document and
 * explains the outcome.
 *
 * The Deny scan runs over all documents before any Allow is considered, so an explicit
 * deny wins regardless of statement order or of which document carries it.
 */
export function explain(
  documents: Iterable<PolicyDocument>,
  action: string,
  resource: string
): Evaluation {
  return decide(statementRefs(documents).filter((ref) => matches(ref.statement, action, resource)))
}

/** Decision over statements already known to match the request; Deny wins over Allow. */
export function decide(matching: StatementRef[]): Evaluation {
  const denies = matching.filter((ref) => ref.statement.effect === 'Deny')
  const allows = matching.filter((ref) => ref.statement.effect === 'Allow')
  const deciding = denies.length > 0 ? denies : allows
  const decision: Decision = denies.length > 0 ? 'Deny' : allows.length > 0 ? 'Allow' : 'ImplicitDeny'

  const warnings = deciding.filter((ref) => ref.statement.condition !== undefined).map(conditionWarning)
  logAmbiguities(warnings)

  return { decision, deciding, warnings }
}

export function evaluate(documents: Iterable<PolicyDocument>, action: string, resource: string): Decision {
  return explain(documents, action, resource).decision
}
