import { describe, expect, it } from 'vitest'
import {
  isValidActionPattern,
  isValidResourcePattern,
  matchesPattern,
  patternCovers,
  patternsOverlap,
  wildcardToRegex,
} from '../src/index.js'
import { BoundedCache } from '../src/policy/wildcard.js'

describe('matchesPattern', () => {
  it('lets a bare star match anything, including the empty string', () => {
    expect(matchesPattern('*', '')).toBe(true)
    expect(matchesPattern('*', 's3:GetObject')).toBe(true)
  })

  it('matches a trailing star against any suffix', () => {
    expect(matchesPattern('s3:Get*', 's3:GetObject')).toBe(true)
    expect(matchesPattern('s3:Get*', 's3:Get')).toBe(true)
    expect(matchesPattern('s3:Get*', 's3:PutObject')).toBe(false)
  })

  it('matches ? against exactly one character', () => {
    expect(matchesPattern('s3:Get?bject', 's3:GetObject')).toBe(true)
    expect(matchesPattern('s3:Get?', 's3:Get')).toBe(false)
    expect(matchesPattern('s3:Get?', 's3:GetAB')).toBe(false)
  })

  it('is case-sensitive', () => {
    expect(matchesPattern('s3:GetObject', 'S3:getobject')).toBe(false)
  })

  it('treats regex metacharacters in ARNs literally', () => {
    expect(matchesPattern('arn:aws:s3:::my.bucket/*', 'arn:aws:s3:::my.bucket/key')).toBe(true)
    expect(matchesPattern('arn:aws:s3:::my.bucket/*', 'arn:aws:s3:::myxbucket/key')).toBe(false)
  })

  it('anchors the pattern at both ends', () => {
    expect(wildcardToRegex('s3:Get').test('xs3:Getx')).toBe(false)
  })
})

describe('patternsOverlap', () => {
  it('finds a shared string between two wildcarded patterns', () => {
    expect(patternsOverlap('*:Delete*', 's3:DeleteBucket')).toBe(true)
    expect(patternsOverlap('s3:Get*', 's3:*Object')).toBe(true)
  })

  it('rejects patterns with disjoint literal prefixes', () => {
    expect(patternsOverlap('s3:Get*', 's3:Put*')).toBe(false)
    expect(patternsOverlap('ec2:*', 's3:*')).toBe(false)
  })

  it('respects ? lengths', () => {
    expect(patternsOverlap('a?c', 'abc')).toBe(true)
    expect(patternsOverlap('a?c', 'ac')).toBe(false)
    expect(patternsOverlap('a*c', 'a??')).toBe(true)
  })

  it('is symmetric', () => {
    expect(patternsOverlap('s3:*Object', 's3:Get*')).toBe(true)
    expect(patternsOverlap('s3:Put*', 's3:Get*')).toBe(false)
  })
})

describe('patternCovers', () => {
  it('lets a bare star cover everything', () => {
    expect(patternCovers('*', 's3:Get*')).toBe(true)
  })

  it('covers a literal that the outer pattern matches', () => {
    expect(patternCovers('s3:*', 's3:DeleteBucket')).toBe(true)
    expect(patternCovers('s3:Get*', 's3:DeleteBucket')).toBe(false)
  })

  it('covers a narrower wildcard pattern', () => {
    expect(patternCovers('s3:*', 's3:Get*')).toBe(true)
    expect(patternCovers('s3:Get*', 's3:GetObject*')).toBe(true)
  })

  it('does not cover a broader pattern', () => {
    expect(patternCovers('s3:Get*', 's3:*')).toBe(false)
    expect(patternCovers('s3:DeleteBucket', 's3:Delete*')).toBe(false)
  })

  it('lets ? absorb ? but not *', () => {
    expect(patternCovers('a?c', 'a?c')).toBe(true)
    expect(patternCovers('a*c', 'a?c')).toBe(true)
    expect(patternCovers('a?c', 'a*c')).toBe(false)
  })
})

describe('pattern alphabets', () => {
  it('accepts IAM action characters', () => {
    expect(isValidActionPattern('s3:Get*')).toBe(true)
    expect(isValidActionPattern('iam:Pass-Role_2?')).toBe(true)
  })

  it('rejects spaces and punctuation in actions', () => {
    expect(isValidActionPattern('s3:Get Object')).toBe(false)
    expect(isValidActionPattern('s3/Get')).toBe(false)
    expect(isValidActionPattern('')).toBe(false)
  })

  it('accepts printable ASCII resources without spaces', () => {
    expect(isValidResourcePattern('arn:aws:s3:::bucket/${aws:username}/*')).toBe(true)
    expect(isValidResourcePattern('arn:aws:s3:::my bucket')).toBe(false)
    expect(isValidResourcePattern('arn:aws:s3:::bücket')).toBe(false)
  })
})

describe('BoundedCache', () => {
  it('evicts the oldest pattern once full', () => {
    const cache = new BoundedCache<string, number>(2)
    cache.set('s3:*', 1)
    cache.set('ec2:*', 2)
    cache.set('iam:*', 3)

    expect(cache.size).toBe(2)
    expect(cache.get('s3:*')).toBeUndefined()
    expect(cache.get('ec2:*')).toBe(2)
    expect(cache.get('iam:*')).toBe(3)
  })

  it('overwrites an existing key without evicting', () => {
    const cache = new BoundedCache<string, number>(2)
    cache.set('s3:*', 1)
    cache.set('ec2:*', 2)
    cache.set('s3:*', 10)

    expect(cache.size).toBe(2)
    expect(cache.get('s3:*')).toBe(10)
    expect(cache.get('ec2:*')).toBe(2)
  })
})
