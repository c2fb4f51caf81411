import { describe, expect, it } from 'vitest'
import { drain } from '../../__tests__/helpers/sources'
import {
  CURATED_SOURCE_LABEL,
  CuratedSource,
  expandTemplate,
  loadCuratedTemplates,
  seededRandom,
  seededShuffle,
} from '../curated'

describe('expandTemplate', () => {
  it('fills query and token placeholders', () => {
    expect(expandTemplate('https://x.test/{query}?p={token%10}&t={token}', 'a b', 1234)).toBe(
      'https://x.test/a%20b?p=4&t=1234'
    )
  })

  it('encodes reserved characters in the query', () => {
    expect(expandTemplate('https://x.test/?q={query}', 'C# & F#', 1)).toBe('https://x.test/?q=C%23%20%26%20F%23')
  })

  it('leaves templates without placeholders untouched', () => {
    expect(expandTemplate('https://x.test/static', 'q', 7)).toBe('https://x.test/static')
  })
})

describe('seededRandom', () => {
  it('is deterministic per seed and stays in [0, 1)', () => {
    const a = seededRandom(42)
    const b = seededRandom(42)
    for (let i = 0; i < 50; i++) {
      const value = a()
      expect(value).toBe(b())
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})

describe('seededShuffle', () => {
  const items = Array.from({ length: 14 }, (_, i) => i)

  it('returns a permutation without mutating the input', () => {
    const shuffled = seededShuffle(items, 1700000000)

    expect([...shuffled].sort((a, b) => a - b)).toEqual(items)
    expect(items).toEqual(Array.from({ length: 14 }, (_, i) => i))
  })

  it('reproduces the same order for the same seed', () => {
    expect(seededShuffle(items, 1700000000)).toEqual(seededShuffle(items, 1700000000))
  })

  it('varies the order across seeds', () => {
    const orders = new Set(
      Array.from({ length: 10 }, (_, i) => seededShuffle(items, 1700000000 + i).join(','))
    )
    expect(orders.size).toBeGreaterThan(1)
  })
})

describe('loadCuratedTemplates', () => {
  it('loads the bundled template list', () => {
    const templates = loadCuratedTemplates()

    expect(templates).toHaveLength(14)
    for (const template of templates) {
      expect(template.url).toMatch(/^https:\/\//)
      expect(template.url).toContain('{query}')
    }
  })
})

describe('CuratedSource', () => {
  const templates = [
    { url: 'https://a.test/{query}' },
    { url: 'https://b.test/?page={token%3}', title: 'Page B' },
    { url: 'https://c.test/?v={token}' },
  ]

  it('yields one candidate per template up to maxResults', async () => {
    const source = new CuratedSource({ kind: 'curated', topic: 'Rust', maxResults: 2, templates })

    const candidates = await drain(source.fetch('Rust guide', 10))

    expect(candidates).toHaveLength(2)
    for (const candidate of candidates) {
      expect(candidate.sourceLabel).toBe(CURATED_SOURCE_LABEL)
      expect(candidate.description).toBe('Curated source for Rust content')
    }
  })

  it('expands every template when maxResults allows', async () => {
    const source = new CuratedSource({ kind: 'curated', topic: 'Rust', maxResults: 10, templates })

    const candidates = await drain(source.fetch('Rust guide', 10))

    expect(candidates.map((c) => c.url).sort()).toEqual([
      'https://a.test/Rust%20guide',
      'https://b.test/?page=1',
      'https://c.test/?v=10',
    ])
    expect(candidates.find((c) => c.url.startsWith('https://b.test'))?.title).toBe('Page B')
  })

  it('numbers generated titles by position', async () => {
    const source = new CuratedSource({
      kind: 'curated',
      topic: 'Rust',
      maxResults: 1,
      templates: [{ url: 'https://a.test/{query}' }],
    })

    const [first] = await drain(source.fetch('Rust', 1))

    expect(first.title).toBe('Rust resource #1')
  })

  it('returns the same candidates for the same token', async () => {
    const source = new CuratedSource({ kind: 'curated', topic: 'TypeScript', maxResults: 5 })

    const first = await drain(source.fetch('TypeScript', 1700000000))
    const second = await drain(source.fetch('TypeScript', 1700000000))

    expect(second).toEqual(first)
  })

  it('changes its output as the token advances', async () => {
    const source = new CuratedSource({ kind: 'curated', topic: 'TypeScript', maxResults: 5 })

    const first = await drain(source.fetch('TypeScript', 1700000000))
    const later = await drain(source.fetch('TypeScript', 1700000001))

    expect(later.map((c) => c.url)).not.toEqual(first.map((c) => c.url))
  })
})
