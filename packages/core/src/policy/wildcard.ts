/**
 * AWS-style wildcard patterns: `*` matches any run of characters (including none), `?`
 * matches exactly one character, everything else is literal and case-sensitive. Patterns
 * are matched against the whole `service:Action` or ARN string.
 */

type Token = { kind: 'star' } | { kind: 'one' } | { kind: 'char'; value: string }

const ACTION_ALPHABET = /^[A-Za-z0-9:_*?-]+$/
const RESOURCE_ALPHABET = /^[!-~]+$/

/** Map that evicts its oldest entry once `limit` entries are held. */
export class BoundedCache<K, V> {
  private readonly entries = new Map<K, V>()

  constructor(readonly limit: number) {}

  get size(): number {
    return this.entries.size
  }

  get(key: K): V | undefined {
    return this.entries.get(key)
  }

  set(key: K, value: V): void {
    if (!this.entries.has(key) && this.entries.size >= this.limit) {
      const oldest = this.entries.keys().next()
      if (!oldest.done) this.entries.delete(oldest.value)
    }
    this.entries.set(key, value)
  }
}

const PATTERN_CACHE_LIMIT = 4096

const regexCache = new BoundedCache<string, RegExp>(PATTERN_CACHE_LIMIT)
const tokenCache = new BoundedCache<string, Token[]>(PATTERN_CACHE_LIMIT)

/**
 * Convert a wildcard pattern (e.g. "arn:aws:s3:::bucket/*") into an anchored RegExp.
 */
export function wildcardToRegex(pattern: string): RegExp {
  const cached = regexCache.get(pattern)
  if (cached) return cached

  let source = '^'
  for (const ch of pattern) {
    if (ch === '*') source += '.*'
    else if (ch === '?') source += '.'
    else source += ch.replace(/[-/\\^$+?.()|[\]{}*]/g, '\\$&')
  }
  const regex = new RegExp(source + '$', 's')
  regexCache.set(pattern, regex)
  return regex
}

export function matchesPattern(pattern: string, value: string): boolean {
  if (pattern === '*') return true
  return wildcardToRegex(pattern).test(value)
}

export function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?')
}

export function isValidActionPattern(pattern: string): boolean {
  return ACTION_ALPHABET.test(pattern)
}

export function isValidResourcePattern(pattern: string): boolean {
  return RESOURCE_ALPHABET.test(pattern)
}

function tokenize(pattern: string): Token[] {
  const cached = tokenCache.get(pattern)
  if (cached) return cached

  const tokens: Token[] = []
  for (const ch of pattern) {
    if (ch === '*') {
      // runs of stars accept the same language as a single star
      if (tokens[tokens.length - 1]?.kind !== 'star') tokens.push({ kind: 'star' })
    } else if (ch === '?') {
      tokens.push({ kind: 'one' })
    } else {
      tokens.push({ kind: 'char', value: ch })
    }
  }
  tokenCache.set(pattern, tokens)
  return tokens
}

function acceptsSameChar(a: Token, b: Token): boolean {
  if (a.kind === 'char' && b.kind === 'char') return a.value === b.value
  return true
}

/**
 * True iff some concrete string is matched by both patterns.
 *
 * Walks the product of the two pattern automata: a state is a pair of token positions, a
 * star may be skipped (matching nothing) on either side, and both sides may consume one
 * shared character when their current tokens can agree on it. The intersection is
 * non-empty iff the pair of end positions is reachable.
 */
export function patternsOverlap(a: string, b: string): boolean {
  if (a === '*' || b === '*' || a === b) return true

  const left = tokenize(a)
  const right = tokenize(b)
  const width = right.length + 1
  const seen = new Set<number>()
  const stack: Array<[number, number]> = [[0, 0]]

  while (stack.length > 0) {
    const next = stack.pop()
    if (!next) break
    const [i, j] = next
    const key = i * width + j
    if (seen.has(key)) continue
    seen.add(key)

    if (i === left.length && j === right.length) return true

    const l = left[i]
    const r = right[j]
    if (l?.kind === 'star') stack.push([i + 1, j])
    if (r?.kind === 'star') stack.push([i, j + 1])
    if (!l || !r || !acceptsSameChar(l, r)) continue

    const leftNext = l.kind === 'star' ? i : i + 1
    const rightNext = r.kind === 'star' ? j : j + 1
    if (leftNext !== i || rightNext !== j) stack.push([leftNext, rightNext])
  }
  return false
}

/**
 * True when every string matched by `inner` is also matched by `outer`.
 *
 * Decided by matching `outer` against `inner` read as a string in which each `*` of
 * `inner` may only be absorbed by a `*` of `outer`, and each `?` by a `*` or `?`. The test
 * is sound but not complete: a `false` never hides a real containment of literal strings,
 * and for wildcard inners it only errs towards "not covered".
 */
export function patternCovers(outer: string, inner: string): boolean {
  if (outer === '*' || outer === inner) return true
  if (!hasWildcard(inner)) return matchesPattern(outer, inner)

  const o = tokenize(outer)
  const n = tokenize(inner)
  const width = n.length + 1
  const seen = new Set<number>()
  const stack: Array<[number, number]> = [[0, 0]]

  while (stack.length > 0) {
    const next = stack.pop()
    if (!next) break
    const [i, j] = next
    const key = i * width + j
    if (seen.has(key)) continue
    seen.add(key)

    if (i === o.length && j === n.length) return true

    const ot = o[i]
    const nt = n[j]
    if (ot?.kind === 'star') {
      stack.push([i + 1, j])
      if (nt) stack.push([i, j + 1])
      continue
    }
    if (!ot || !nt) continue
    if (ot.kind === 'one' && nt.kind !== 'star') stack.push([i + 1, j + 1])
    if (ot.kind === 'char' && nt.kind === 'char' && ot.value === nt.value) {
      stack.push([i + 1, j + 1])
    }
  }
  return false
}
