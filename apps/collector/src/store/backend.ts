/**
 * Store Backend
 *
 * The command subset the fingerprint store needs from the key-value service.
 * RedisStoreBackend maps it onto ioredis; tests supply an in-process backend.
 */

import type { Redis } from '@topicsweep/redis'

export interface ScoredMember {
  member: string
  score: number
}

export interface RangeByScoreOptions {
  /** Inclusive lower bound, '-inf' when omitted */
  min?: number
  /** Inclusive upper bound, '+inf' when omitted */
  max?: number
  limit?: number
}

export interface StoreBackend {
  ping(): Promise<void>
  sismember(key: string, member: string): Promise<boolean>
  /** @returns number of members actually added */
  sadd(key: string, member: string): Promise<number>
  scard(key: string): Promise<number>
  set(key: string, value: string): Promise<void>
  get(key: string): Promise<string | null>
  hset(key: string, fields: Record<string, string>): Promise<void>
  hgetall(key: string): Promise<Record<string, string>>
  hincrby(key: string, field: string, increment: number): Promise<number>
  zadd(key: string, score: number, member: string): Promise<void>
  zrangebyscore(key: string, options?: RangeByScoreOptions): Promise<ScoredMember[]>
  quit(): Promise<void>
}

/**
 * Pair up a flat WITHSCORES reply: [member, score, member, score, ...]
 */
export function pairScores(reply: string[]): ScoredMember[] {
  const result: ScoredMember[] = []
  for (let i = 0; i + 1 < reply.length; i += 2) {
    result.push({ member: reply[i], score: Number(reply[i + 1]) })
  }
  return result
}

export class RedisStoreBackend implements StoreBackend {
  constructor(private readonly redis: Redis) {}

  async ping(): Promise<void> {
    await this.redis.ping()
  }

  async sismember(key: string, member: string): Promise<boolean> {
    return (await this.redis.sismember(key, member)) === 1
  }

  sadd(key: string, member: string): Promise<number> {
    return this.redis.sadd(key, member)
  }

  scard(key: string): Promise<number> {
    return this.redis.scard(key)
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value)
  }

  get(key: string): Promise<string | null> {
    return this.redis.get(key)
  }

  async hset(key: string, fields: Record<string, string>): Promise<void> {
    await this.redis.hset(key, fields)
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.redis.hgetall(key)
  }

  hincrby(key: string, field: string, increment: number): Promise<number> {
    return this.redis.hincrby(key, field, increment)
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    await this.redis.zadd(key, score, member)
  }

  async zrangebyscore(key: string, options: RangeByScoreOptions = {}): Promise<ScoredMember[]> {
    const min = options.min ?? '-inf'
    const max = options.max ?? '+inf'
    const reply =
      options.limit === undefined
        ? await this.redis.zrangebyscore(key, min, max, 'WITHSCORES')
        : await this.redis.zrangebyscore(key, min, max, 'WITHSCORES', 'LIMIT', 0, options.limit)
    return pairScores(reply)
  }

  async quit(): Promise<void> {
    await this.redis.quit()
  }
}
