import { describe, expect, it } from 'vitest'
import { buildQueries } from '../queries'

describe('buildQueries', () => {
  it('builds newsletter queries', () => {
    expect(buildQueries('Rust', 'newsletters')).toEqual([
      'Rust newsletter',
      'Rust weekly digest',
      'Rust newsletter archive',
      'Rust community updates',
    ])
  })

  it('builds article queries', () => {
    expect(buildQueries('Rust', 'articles')).toEqual([
      'Rust documentation',
      'Rust tutorial',
      'Rust guide',
      'Rust API',
      'Rust examples',
      'Rust articles',
    ])
  })

  it('puts articles before newsletters for both', () => {
    const queries = buildQueries('Rust', 'both')

    expect(queries).toHaveLength(10)
    expect(queries[0]).toBe('Rust documentation')
    expect(queries[6]).toBe('Rust newsletter')
  })
})
