/**
 * Environment variable parsing.
 *
 * `env` is read once when the entry point imports this module. GPU credentials
 * are optional here: a missing key is reported to the client on each
 * generation attempt instead of stopping the server.
 */

type EnvSource = Record<string, string | undefined>

const DEV_SESSION_SECRET = 'dev-only-session-secret'

function required(source: EnvSource, key: string): string {
  const val = source[key]
  if (!val) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Set it in .env or your deployment configuration.`,
    )
  }
  return val
}

function optional(source: EnvSource, key: string, fallback: string): string {
  return source[key] || fallback
}

function unset(source: EnvSource, key: string): string | undefined {
  const val = source[key]?.trim()
  return val ? val : undefined
}

function port(raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0 || value > 65_535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got "${raw}".`)
  }
  return value
}

export function loadEnv(source: EnvSource = process.env) {
  const NODE_ENV = optional(source, 'NODE_ENV', 'development')

  return {
    NODE_ENV,
    PORT: port(optional(source, 'PORT', '8080')),
    RUNPOD_API_KEY: unset(source, 'RUNPOD_API_KEY'),
    RUNPOD_ENDPOINT_ID: unset(source, 'RUNPOD_ENDPOINT_ID'),
    RUNPOD_API_URL: optional(source, 'RUNPOD_API_URL', 'https://api.runpod.ai/v2').replace(/\/+$/, ''),
    SESSION_SECRET: NODE_ENV === 'production'
      ? required(source, 'SESSION_SECRET')
      : optional(source, 'SESSION_SECRET', DEV_SESSION_SECRET),
    CORS_ORIGINS: optional(source, 'CORS_ORIGINS', 'http://localhost:3000').split(',').map((o) => o.trim()),
  } as const
}

export type Env = ReturnType<typeof loadEnv>
