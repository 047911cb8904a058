import { z } from 'zod'
import { MalformedEntityError } from '../errors.js'

/**
 * Zod schemas for the normalized snapshot handed over by the fetch step.
 *
 * Field names follow the fetch output (snake_case records, AWS-cased policy JSON) so a
 * snapshot file written by the fetcher can be loaded as-is.
 */

const StringOrListSchema = z.union([z.string(), z.array(z.string())])

export const PrincipalJsonSchema = z.union([
  z.literal('*'),
  z.object({
    AWS: StringOrListSchema.optional(),
    Service: StringOrListSchema.optional(),
    Federated: StringOrListSchema.optional(),
    CanonicalUser: StringOrListSchema.optional(),
  }),
])

export type PrincipalJson = z.infer<typeof PrincipalJsonSchema>

export const StatementJsonSchema = z.object({
  Sid: z.string().optional(),
  Effect: z.enum(['Allow', 'Deny']),
  Action: StringOrListSchema.optional(),
  Resource: StringOrListSchema.optional(),
  Condition: z.record(z.string(), z.unknown()).optional(),
  Principal: PrincipalJsonSchema.optional(),
  // Accepted by the schema only so the normalizer can reject them by name.
  NotAction: z.unknown().optional(),
  NotResource: z.unknown().optional(),
  NotPrincipal: z.unknown().optional(),
})

export type StatementJson = z.infer<typeof StatementJsonSchema>

export const PolicyDocumentJsonSchema = z.object({
  Version: z.string().optional(),
  Id: z.string().optional(),
  Statement: z.union([StatementJsonSchema, z.array(StatementJsonSchema)]),
})

export type PolicyDocumentJson = z.infer<typeof PolicyDocumentJsonSchema>

const TagSchema = z.object({ Key: z.string(), Value: z.string() })

const identityFields = {
  arn: z.string().min(1),
  name: z.string().min(1),
  path: z.string().optional(),
  create_date: z.string().optional(),
  attached_policies: z.array(z.string().min(1)).default([]),
  inline_policies: z.record(z.string(), PolicyDocumentJsonSchema).default({}),
}

export const UserRecordSchema = z.object({
  ...identityFields,
  user_id: z.string().optional(),
  groups: z.array(z.string().min(1)).default([]),
  tags: z.array(TagSchema).default([]),
})

export const GroupRecordSchema = z.object({
  ...identityFields,
  group_id: z.string().optional(),
})

export const RoleRecordSchema = z.object({
  ...identityFields,
  role_id: z.string().optional(),
  assume_role_policy: PolicyDocumentJsonSchema,
  tags: z.array(TagSchema).default([]),
})

export const PolicyRecordSchema = z.object({
  arn: z.string().min(1),
  name: z.string().min(1),
  policy_document: PolicyDocumentJsonSchema,
  is_aws_managed: z.boolean().default(false),
  create_date: z.string().optional(),
  update_date: z.string().optional(),
})

export const SnapshotMetadataSchema = z.object({
  fetch_time: z.string().optional(),
  profile: z.string().optional(),
  region: z.string().optional(),
})

export type UserRecord = z.infer<typeof UserRecordSchema>
export type GroupRecord = z.infer<typeof GroupRecordSchema>
export type RoleRecord = z.infer<typeof RoleRecordSchema>
export type PolicyRecord = z.infer<typeof PolicyRecordSchema>
export type SnapshotMetadata = z.infer<typeof SnapshotMetadataSchema>

export interface Snapshot {
  users: UserRecord[]
  groups: GroupRecord[]
  roles: RoleRecord[]
  policies: PolicyRecord[]
  metadata?: SnapshotMetadata
}

/** Input shape accepted by {@link parseSnapshot}, before defaults are applied. */
export type SnapshotInput = {
  users?: z.input<typeof UserRecordSchema>[]
  groups?: z.input<typeof GroupRecordSchema>[]
  roles?: z.input<typeof RoleRecordSchema>[]
  policies?: z.input<typeof PolicyRecordSchema>[]
  metadata?: SnapshotMetadata
}

const SnapshotEnvelopeSchema = z.object({
  users: z.array(z.unknown()).default([]),
  groups: z.array(z.unknown()).default([]),
  roles: z.array(z.unknown()).default([]),
  policies: z.array(z.unknown()).default([]),
  metadata: SnapshotMetadataSchema.optional(),
})

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

function recordLabel(raw: unknown, collection: string, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'arn' in raw) {
    const arn = raw.arn
    if (typeof arn === 'string' && arn.length > 0) return arn
  }
  return `${collection}[${index}]`
}

function parseCollection<T extends z.ZodTypeAny>(
  collection: string,
  records: unknown[],
  schema: T
): z.output<T>[] {
  return records.map((raw, index) => {
    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      throw new MalformedEntityError(recordLabel(raw, collection, index), formatIssues(parsed.error))
    }
    return parsed.data
  })
}

/**
 * Validates an untyped snapshot. Each record is checked on its own so the error names the
 * offending record rather than a path into the whole document.
 *
 * @throws MalformedEntityError on the first invalid record.
 */
export function parseSnapshot(input: unknown): Snapshot {
  const envelope = SnapshotEnvelopeSchema.safeParse(input)
  if (!envelope.success) {
    throw new MalformedEntityError('<snapshot>', formatIssues(envelope.error))
  }
  const { users, groups, roles, policies, metadata } = envelope.data

  return {
    users: parseCollection('users', users, UserRecordSchema),
    groups: parseCollection('groups', groups, GroupRecordSchema),
    roles: parseCollection('roles', roles, RoleRecordSchema),
    policies: parseCollection('policies', policies, PolicyRecordSchema),
    ...(metadata ? { metadata } : {}),
  }
}
