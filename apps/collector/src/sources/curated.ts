/**
 * Curated Source
 *
 * Expands a fixed list of URL templates. The freshness token seeds both the
 * placeholders and the selection order, so consecutive runs differ while a
 * fixed token reproduces the same output.
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import type { CandidateSource, CuratedSourceConfig, CuratedTemplate, RawCandidate } from './types.js'

const log = loggers.sources.child('curated')

export const CURATED_SOURCE_LABEL = 'Curated Sources'

const DEFAULT_TEMPLATES_PATH = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'data',
  'curated-sources.json'
)

const templatesSchema = z.array(
  z.object({
    url: z.string().min(1),
    title: z.string().optional(),
  })
)

export function loadCuratedTemplates(path: string = DEFAULT_TEMPLATES_PATH): CuratedTemplate[] {
  return templatesSchema.parse(JSON.parse(readFileSync(path, 'utf-8')))
}

/**
 * mulberry32: small deterministic PRNG returning floats in [0, 1)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const random = seededRandom(seed)
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const tmp = result[i]
    result[i] = result[j]
    result[j] = tmp
  }
  return result
}

export function expandTemplate(template: string, query: string, token: number): string {
  return template
    .replace(/\{token(?:%(\d+))?\}/g, (_match, modulo: string | undefined) =>
      String(modulo ? token % Number(modulo) : token)
    )
    .replace(/\{query\}/g, encodeURIComponent(query))
}

export class CuratedSource implements CandidateSource {
  readonly kind = 'curated' as const
  readonly label = CURATED_SOURCE_LABEL

  private templates: CuratedTemplate[] | null

  constructor(private readonly config: CuratedSourceConfig) {
    this.templates = config.templates ?? null
  }

  async *fetch(query: string, freshnessToken: number): AsyncGenerator<RawCandidate> {
    let templates: CuratedTemplate[]
    try {
      templates = this.templates ??= loadCuratedTemplates()
    } catch (error) {
      log.error('Failed to load curated templates', {}, error)
      return
    }

    const selected = seededShuffle(templates, freshnessToken).slice(0, this.config.maxResults)

    for (const [index, template] of selected.entries()) {
      yield {
        url: expandTemplate(template.url, query, freshnessToken),
        title: template.title ?? `${this.config.topic} resource #${index + 1}`,
        description: `Curated source for ${this.config.topic} content`,
        sourceLabel: CURATED_SOURCE_LABEL,
      }
    }
  }
}
