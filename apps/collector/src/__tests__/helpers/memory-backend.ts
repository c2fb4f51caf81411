import type { RangeByScoreOptions, ScoredMember, StoreBackend } from '../../store/backend'

type Command = keyof StoreBackend

/**
 * In-process StoreBackend with per-command failure injection.
 */
export class MemoryBackend implements StoreBackend {
  readonly sets = new Map<string, Set<string>>()
  readonly strings = new Map<string, string>()
  readonly hashes = new Map<string, Map<string, string>>()
  readonly zsets = new Map<string, Map<string, number>>()
  readonly calls: Command[] = []
  closed = false

  private readonly failures = new Map<Command, Error>()

  failOn(command: Command, error: Error): void {
    this.failures.set(command, error)
  }

  clearFailures(): void {
    this.failures.clear()
  }

  private enter(command: Command): void {
    this.calls.push(command)
    const failure = this.failures.get(command)
    if (failure) throw failure
  }

  async ping(): Promise<void> {
    this.enter('ping')
  }

  async sismember(key: string, member: string): Promise<boolean> {
    this.enter('sismember')
    return this.sets.get(key)?.has(member) ?? false
  }

  async sadd(key: string, member: string): Promise<number> {
    this.enter('sadd')
    const set = this.sets.get(key) ?? new Set<string>()
    this.sets.set(key, set)
    if (set.has(member)) return 0
    set.add(member)
    return 1
  }

  async scard(key: string): Promise<number> {
    this.enter('scard')
    return this.sets.get(key)?.size ?? 0
  }

  async set(key: string, value: string): Promise<void> {
    this.enter('set')
    this.strings.set(key, value)
  }

  async get(key: string): Promise<string | null> {
    this.enter('get')
    return this.strings.get(key) ?? null
  }

  async hset(key: string, fields: Record<string, string>): Promise<void> {
    this.enter('hset')
    const hash = this.hashes.get(key) ?? new Map<string, string>()
    this.hashes.set(key, hash)
    for (const [field, value] of Object.entries(fields)) hash.set(field, value)
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.enter('hgetall')
    return Object.fromEntries(this.hashes.get(key) ?? [])
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    this.enter('hincrby')
    const hash = this.hashes.get(key) ?? new Map<string, string>()
    this.hashes.set(key, hash)
    const next = parseInt(hash.get(field) ?? '0', 10) + increment
    hash.set(field, String(next))
    return next
  }

  async zadd(key: string, score: number, member: string): Promise<void> {
    this.enter('zadd')
    const zset = this.zsets.get(key) ?? new Map<string, number>()
    this.zsets.set(key, zset)
    zset.set(member, score)
  }

  async zrangebyscore(key: string, options: RangeByScoreOptions = {}): Promise<ScoredMember[]> {
    this.enter('zrangebyscore')
    const min = options.min ?? -Infinity
    const max = options.max ?? Infinity
    const members = [...(this.zsets.get(key) ?? new Map<string, number>())]
      .map(([member, score]) => ({ member, score }))
      .filter(({ score }) => score >= min && score <= max)
      .sort((a, b) => a.score - b.score || a.member.localeCompare(b.member))
    return options.limit === undefined ? members : members.slice(0, options.limit)
  }

  async quit(): Promise<void> {
    this.enter('quit')
    this.closed = true
  }
}
