import type { PolicyDocumentJson, SnapshotInput } from '../src/index.js'

export const ACCOUNT = '111122223333'

export const userArn = (name: string) => `arn:aws:iam::${ACCOUNT}:user/${name}`
export const groupArn = (name: string) => `arn:aws:iam::${ACCOUNT}:group/${name}`
export const roleArn = (name: string) => `arn:aws:iam::${ACCOUNT}:role/${name}`
export const policyArn = (name: string) => `arn:aws:iam::${ACCOUNT}:policy/${name}`

export function allow(action: string | string[], resource: string | string[] = '*'): PolicyDocumentJson {
  return { Version: '2012-10-17', Statement: [{ Effect: 'Allow', Action: action, Resource: resource }] }
}

export function deny(action: string | string[], resource: string | string[] = '*'): PolicyDocumentJson {
  return { Version: '2012-10-17', Statement: [{ Effect: 'Deny', Action: action, Resource: resource }] }
}

export function trust(...principals: string[]): PolicyDocumentJson {
  return {
    Version: '2012-10-17',
    Statement: [{ Effect: 'Allow', Principal: { AWS: principals }, Action: 'sts:AssumeRole' }],
  }
}

/**
 * A small account:
 * - alice is in `developers` (Allow s3:* on *) and carries an inline Deny of s3:DeleteBucket
 * - bob has `ReadOnly` attached (s3:GetObject) and may assume `deployer`
 * - `deployer` (lambda:InvokeFunction) may assume `auditor` (cloudtrail:LookupEvents)
 */
export function sampleSnapshot(): SnapshotInput {
  return {
    users: [
      {
        arn: userArn('alice'),
        name: 'alice',
        groups: ['developers'],
        inline_policies: { 'no-delete': deny('s3:DeleteBucket') },
      },
      {
        arn: userArn('bob'),
        name: 'bob',
        attached_policies: [policyArn('ReadOnly')],
      },
    ],
    groups: [
      {
        arn: groupArn('developers'),
        name: 'developers',
        attached_policies: [policyArn('S3Full')],
      },
    ],
    roles: [
      {
        arn: roleArn('deployer'),
        name: 'deployer',
        assume_role_policy: trust(userArn('bob')),
        attached_policies: [policyArn('Invoke')],
      },
      {
        arn: roleArn('auditor'),
        name: 'auditor',
        assume_role_policy: trust(roleArn('deployer')),
        inline_policies: { trail: allow('cloudtrail:LookupEvents') },
      },
    ],
    policies: [
      { arn: policyArn('S3Full'), name: 'S3Full', policy_document: allow('s3:*') },
      { arn: policyArn('ReadOnly'), name: 'ReadOnly', policy_document: allow('s3:GetObject') },
      { arn: policyArn('Invoke'), name: 'Invoke', policy_document: allow('lambda:InvokeFunction') },
    ],
    metadata: { profile: 'default', region: 'us-east-1' },
  }
}
