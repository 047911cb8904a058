/**
 * Error taxonomy for graph construction and querying.
 *
 * Construction failures (`MalformedEntity`, `InconsistentSnapshot`, `InvalidGraphData`) are
 * thrown and abort the build; no partially linked graph is ever returned. Query failures
 * are reported as a `QueryResult` failure so a batch of queries can keep going.
 */

export type ConstructionErrorCode = 'MalformedEntity' | 'InconsistentSnapshot' | 'InvalidGraphData'

export type QueryErrorCode = 'UnknownIdentity' | 'AmbiguousIdentity' | 'InvalidPattern' | 'Cancelled'

export type ErrorCode = ConstructionErrorCode | QueryErrorCode

export class IamExplorerError extends Error {
  readonly code: ErrorCode
  /** Identifier of the offending record, when there is one. */
  readonly entityId?: string

  constructor(code: ErrorCode, message: string, entityId?: string) {
    super(message)
    this.name = 'IamExplorerError'
    this.code = code
    this.entityId = entityId
  }
}

export class MalformedEntityError extends IamExplorerError {
  constructor(entityId: string, reason: string) {
    super('MalformedEntity', `Malformed entity ${entityId}: ${reason}`, entityId)
    this.name = 'MalformedEntityError'
  }
}

export class InconsistentSnapshotError extends IamExplorerError {
  constructor(entityId: string, reason: string) {
    super('InconsistentSnapshot', `Inconsistent snapshot at ${entityId}: ${reason}`, entityId)
    this.name = 'InconsistentSnapshotError'
  }
}

export class InvalidGraphDataError extends IamExplorerError {
  constructor(reason: string) {
    super('InvalidGraphData', `Invalid serialized graph: ${reason}`)
    this.name = 'InvalidGraphDataError'
  }
}

export interface QueryFailure {
  code: QueryErrorCode
  message: string
}

/**
 * Result of a single query. Mirrors the success/error result shape used across packages,
 * with a typed error payload.
 */
export type QueryResult<T> = { success: true; data: T } | { success: false; error: QueryFailure }

export function queryFailure(code: QueryErrorCode, message: string): QueryResult<never> {
  return { success: false, error: { code, message } }
}

export function isIamExplorerError(err: unknown): err is IamExplorerError {
  return err instanceof IamExplorerError
}
