import { describe, expect, it } from 'vitest'
import { UsageError } from '../../lib/errors'
import { asChoice, asCount, asString, parseFlags } from '../parse-flags'

describe('parseFlags', () => {
  it('parses spaced, inline and bare flags', () => {
    expect(parseFlags(['--mode', 'articles', '--target=3', '--json'])).toEqual({
      mode: 'articles',
      target: '3',
      json: true,
    })
  })

  it('treats a flag followed by another flag as bare', () => {
    expect(parseFlags(['--json', '--limit', '5'])).toEqual({ json: true, limit: '5' })
  })

  it('ignores positional tokens', () => {
    expect(parseFlags(['extra', '--since', '2024-01-01', 'more'])).toEqual({ since: '2024-01-01' })
  })

  it('keeps "=" inside inline values', () => {
    expect(parseFlags(['--since=a=b'])).toEqual({ since: 'a=b' })
  })
})

describe('asString', () => {
  it('returns only non-empty strings', () => {
    expect(asString('x')).toBe('x')
    expect(asString('')).toBeUndefined()
    expect(asString(true)).toBeUndefined()
    expect(asString(undefined)).toBeUndefined()
  })
})

describe('asCount', () => {
  it('parses non-negative integers', () => {
    expect(asCount('target', '0')).toBe(0)
    expect(asCount('target', '12')).toBe(12)
    expect(asCount('target', undefined)).toBeUndefined()
  })

  it('rejects anything else', () => {
    expect(() => asCount('target', '-1')).toThrow('--target expects a non-negative integer')
    expect(() => asCount('target', '1.5')).toThrow(UsageError)
    expect(() => asCount('target', true)).toThrow(UsageError)
  })
})

describe('asChoice', () => {
  const modes = ['newsletters', 'articles', 'both'] as const

  it('narrows to a choice', () => {
    expect(asChoice('mode', 'articles', modes)).toBe('articles')
    expect(asChoice('mode', undefined, modes)).toBeUndefined()
  })

  it('lists the choices on a mismatch', () => {
    expect(() => asChoice('mode', 'weekly', modes)).toThrow('--mode must be one of: newsletters, articles, both')
  })
})
