/**
 * Command-line option parsing: `--name=value`, `--name value` and bare
 * `--flag` switches, validated against a zod schema keyed by camelCase name.
 */

import { z } from 'zod'
import { createBadRequestError } from '@npu-latency/errors'

export type RawCliArgs = Record<string, string | true>

function toCamelCase(name: string): string {
  return name.replace(/-([a-z0-9])/g, (_, letter: string) => letter.toUpperCase())
}

function toKebabCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)
}

export function tokenizeArgs(argv: string[]): RawCliArgs {
  const result: RawCliArgs = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      throw createBadRequestError(`Unexpected argument: ${token}`)
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq >= 0) {
      result[toCamelCase(body.slice(0, eq))] = body.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      result[toCamelCase(body)] = next
      i++
    } else {
      result[toCamelCase(body)] = true
    }
  }

  return result
}

/** Boolean switch: present, or `true`/`false`/`1`/`0` */
export function cliFlag() {
  return z
    .union([z.literal(true), z.enum(['true', 'false', '1', '0'])])
    .optional()
    .transform((value) => value === true || value === 'true' || value === '1')
}

export function helpRequested(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h')
}

/**
 * Parse argv against a schema. Throws BAD_REQUEST naming every invalid option.
 */
export function parseCliArgs<T extends z.ZodTypeAny>(argv: string[], schema: T): z.infer<T> {
  const parsed = schema.safeParse(tokenizeArgs(argv))
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${toKebabCase(issue.path.join('.'))}: ${issue.message}` : issue.message
    )
    throw createBadRequestError(`Invalid options\n  ${problems.join('\n  ')}`, {
      details: { problems },
    })
  }
  return parsed.data
}
