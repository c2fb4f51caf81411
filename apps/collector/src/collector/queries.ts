import type { CollectionMode } from '../config/settings.js'

const NEWSLETTER_QUERIES = ['newsletter', 'weekly digest', 'newsletter archive', 'community updates']

const ARTICLE_QUERIES = ['documentation', 'tutorial', 'guide', 'API', 'examples', 'articles']

/**
 * Ordered query list for a mode. `both` cycles articles first.
 */
export function buildQueries(topic: string, mode: CollectionMode): string[] {
  const suffixes =
    mode === 'newsletters'
      ? NEWSLETTER_QUERIES
      : mode === 'articles'
        ? ARTICLE_QUERIES
        : [...ARTICLE_QUERIES, ...NEWSLETTER_QUERIES]
  return suffixes.map((suffix) => `${topic} ${suffix}`)
}
