import { UsageError } from '../lib/errors.js'

export type Flags = Record<string, string | boolean>

/**
 * Parse `--key value`, `--key=value` and bare `--flag` tokens.
 * Positional tokens are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq !== -1) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      flags[body] = next
      i++
    } else {
      flags[body] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined
}

/**
 * @throws UsageError when present but not a non-negative integer
 */
export function asCount(name: string, value: string | boolean | undefined): number | undefined {
  if (value === undefined) return undefined
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new UsageError(`--${name} expects a non-negative integer`)
  }
  return Number.parseInt(value, 10)
}

/**
 * @throws UsageError when present but not one of the choices
 */
export function asChoice<T extends string>(
  name: string,
  value: string | boolean | undefined,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) return undefined
  const match = choices.find((choice) => choice === value)
  if (match === undefined) {
    throw new UsageError(`--${name} must be one of: ${choices.join(', ')}`)
  }
  return match
}
