import { z } from 'zod'
import { ConfigurationMissing } from './errors.js'
import { DEFAULT_BASE_URL, DEFAULT_RANKING_LIMIT, MIN_REQUEST_INTERVAL_MS } from './services/external/streamscharts.js'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1')

// Empty strings in .env files count as unset
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional())

const EnvSchema = z.object({
  CLIENT_ID: optionalString,
  TOKEN: optionalString,
  STREAMSCHARTS_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  STREAMSCHARTS_TESTING_MODE: booleanFlag,
  RANKING_LIMIT: z.coerce.number().int().positive().default(DEFAULT_RANKING_LIMIT),
  REQUEST_INTERVAL_MS: z.coerce.number().int().min(MIN_REQUEST_INTERVAL_MS).default(MIN_REQUEST_INTERVAL_MS),
  PGDATABASE: z.string().min(1).default('twitchdata'),
  PGUSER: z.string().min(1).default('postgres'),
  PGPASSWORD: optionalString,
  PGHOST: z.string().min(1).default('localhost'),
  PGPORT: z.coerce.number().int().positive().default(5432),
  COLLECTION_SCHEDULE: optionalString,
})

export interface SourceConfig {
  baseUrl: string
  clientId: string
  token: string
  testingMode: boolean
  rankingLimit: number
  requestIntervalMs: number
}

export interface DatabaseConfig {
  database: string
  username: string
  password?: string
  host: string
  port: number
}

export interface CollectorConfig {
  source: SourceConfig
  database: DatabaseConfig
  schedule?: string
}

type ParsedEnv = z.infer<typeof EnvSchema>

function databaseFrom(parsed: ParsedEnv): DatabaseConfig {
  return {
    database: parsed.PGDATABASE,
    username: parsed.PGUSER,
    password: parsed.PGPASSWORD,
    host: parsed.PGHOST,
    port: parsed.PGPORT,
  }
}

/** Database settings alone, for scripts that never call the API. */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return databaseFrom(EnvSchema.parse(env))
}

/**
 * Build the collector config from environment variables.
 * Throws ConfigurationMissing when the API credentials are absent.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const parsed = EnvSchema.parse(env)

  const missing: string[] = []
  if (!parsed.CLIENT_ID) missing.push('CLIENT_ID')
  if (!parsed.TOKEN) missing.push('TOKEN')
  if (!parsed.CLIENT_ID || !parsed.TOKEN) throw new ConfigurationMissing(missing)

  return {
    source: {
      baseUrl: parsed.STREAMSCHARTS_BASE_URL.replace(/\/+$/, ''),
      clientId: parsed.CLIENT_ID,
      token: parsed.TOKEN,
      testingMode: parsed.STREAMSCHARTS_TESTING_MODE,
      rankingLimit: parsed.RANKING_LIMIT,
      requestIntervalMs: parsed.REQUEST_INTERVAL_MS,
    },
    database: databaseFrom(parsed),
    schedule: parsed.COLLECTION_SCHEDULE,
  }
}
