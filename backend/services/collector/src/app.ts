import { loadConfig, type CollectorConfig, type DatabaseConfig } from './config.js'
import { ConfigurationMissing } from './errors.js'
import type { Logger } from './logger.js'
import { createDataSource } from './db/data-source.js'
import { StreamerStore, type StoreQueryRunner } from './db/streamer-store.js'
import { StreamsChartsClient } from './services/external/streamscharts.js'
import { runCollection } from './services/pipeline.js'
import type { CollectionSummary } from './types.js'

/** What a run needs from an initialized TypeORM DataSource. */
export interface StoreConnection {
  createQueryRunner(): StoreQueryRunner
  destroy(): Promise<void>
}

export interface AppDeps {
  logger: Logger
  fetchImpl?: typeof fetch
  openDataSource?: (db: DatabaseConfig) => Promise<StoreConnection>
}

async function initializeDataSource(db: DatabaseConfig): Promise<StoreConnection> {
  return createDataSource(db).initialize()
}

/**
 * Read the config, or log why it is unusable and return null.
 */
export function resolveConfig(env: NodeJS.ProcessEnv, logger: Logger): CollectorConfig | null {
  try {
    return loadConfig(env)
  } catch (err) {
    if (err instanceof ConfigurationMissing) {
      logger.error({ missing: err.missing }, `[CONFIG] ${err.message}. Exiting.`)
      return null
    }
    throw err
  }
}

/**
 * Run a single collection with the given config. The data source is opened
 * on the first store call, so a run with no streamers never connects, and is
 * destroyed afterwards.
 */
export async function collectWithConfig(config: CollectorConfig, deps: AppDeps): Promise<CollectionSummary> {
  const { logger } = deps
  const client = new StreamsChartsClient({
    baseUrl: config.source.baseUrl,
    clientId: config.source.clientId,
    token: config.source.token,
    testingMode: config.source.testingMode,
    minIntervalMs: config.source.requestIntervalMs,
    fetchImpl: deps.fetchImpl,
    logger: logger.child({ component: 'source' }),
  })

  const open = deps.openDataSource ?? initializeDataSource
  let connection: Promise<StoreConnection> | null = null
  const connect = () => {
    if (!connection) connection = open(config.database)
    return connection
  }

  const store = new StreamerStore(async () => (await connect()).createQueryRunner(), logger.child({ component: 'store' }))
  try {
    return await runCollection({ client, store, logger, rankingLimit: config.source.rankingLimit })
  } finally {
    if (connection) await closeConnection(connection, logger)
  }
}

async function closeConnection(connection: Promise<StoreConnection>, logger: Logger): Promise<void> {
  let dataSource: StoreConnection
  try {
    dataSource = await connection
  } catch (err) {
    // The open failure already surfaced through the run
    logger.debug({ err }, '[STORE] Data source never opened')
    return
  }
  await dataSource.destroy()
}

/**
 * Load config from `env` and run one collection. Returns null without touching
 * the network or database when credentials are missing.
 */
export async function runOnce(env: NodeJS.ProcessEnv, deps: AppDeps): Promise<CollectionSummary | null> {
  const config = resolveConfig(env, deps.logger)
  if (!config) return null
  return collectWithConfig(config, deps)
}
