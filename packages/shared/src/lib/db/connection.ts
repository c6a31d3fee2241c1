/**
 * Shared database connection utilities.
 *
 * Every package that needs a database URL or parsed connection options
 * should import from here instead of reading env vars directly.
 *
 * The `prefix` parameter lets each subsystem define its own override:
 *   getDatabaseUrl('CRONJOBS')  → CRONJOBS_DATABASE_URL  > DATABASE_URL > localhost
 *   getDatabaseUrl()            → DATABASE_URL > localhost
 */

export type ParsedDatabaseConnection = {
  host: string
  port: number
  user?: string
  password?: string
  database?: string
}

const DEFAULT_DATABASE_URL = 'postgres://localhost:5432/postgres'

type Env = Record<string, string | undefined>

/**
 * Resolve a database URL from environment variables.
 *
 * Priority: <PREFIX>_DATABASE_URL  →  DATABASE_URL  →  postgres://localhost:5432/postgres
 */
export function getDatabaseUrl(prefix?: string, env: Env = process.env): string {
  if (prefix) {
    const prefixed = env[`${prefix}_DATABASE_URL`]
    if (prefixed) return prefixed
  }
  return env.DATABASE_URL || DEFAULT_DATABASE_URL
}

/**
 * Parse a postgres:// URL into its parts. Used for log lines, where the
 * password must never be printed.
 */
export function parseDatabaseUrl(url: string): ParsedDatabaseConnection {
  try {
    const parsed = new URL(url)
    const database = parsed.pathname ? decodeURIComponent(parsed.pathname.slice(1)) : ''
    return {
      host: parsed.hostname || 'localhost',
      port: parseInt(parsed.port, 10) || 5432,
      user: parsed.username ? decodeURIComponent(parsed.username) : undefined,
      password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
      database: database || undefined,
    }
  } catch {
    return { host: 'localhost', port: 5432 }
  }
}

/**
 * Render a connection without its password, e.g. `app@db.internal:5432/reports`.
 */
export function describeDatabaseUrl(url: string): string {
  const { host, port, user, database } = parseDatabaseUrl(url)
  const auth = user ? `${user}@` : ''
  return `${auth}${host}:${port}${database ? `/${database}` : ''}`
}
