import 'reflect-metadata'
import dotenv from 'dotenv'
import { loadDatabaseConfig } from '../config.js'
import { createDataSource } from '../db/data-source.js'
import { StreamerStore } from '../db/streamer-store.js'
import { createLogger } from '../logger.js'

dotenv.config()
const logger = createLogger(process.env.LOG_LEVEL)

/**
 * Pick a random stored row from a random streamer table and confirm it can be
 * read back by its date and viewer count.
 */
async function verify() {
  const database = loadDatabaseConfig()
  const dataSource = await createDataSource(database).initialize()
  try {
    const store = new StreamerStore(() => dataSource.createQueryRunner(), logger)
    const tables = await store.listStreamerTables()
    const table = tables[Math.floor(Math.random() * tables.length)]
    if (!table) {
      logger.warn('[VERIFY] No streamer tables found')
      return false
    }

    const row = await store.sampleRecord(table)
    if (!row) {
      logger.warn({ table }, '[VERIFY] Table has no rows')
      return false
    }

    const found = await store.hasRecord(table, row)
    if (found) logger.info({ table, row }, '[VERIFY] Data line found')
    else logger.warn({ table, row }, '[VERIFY] Data line not found')
    return found
  } finally {
    await dataSource.destroy()
  }
}

verify()
  .then((ok) => {
    if (!ok) process.exitCode = 1
  })
  .catch((e) => {
    logger.error(e, '[VERIFY] Failed')
    process.exit(1)
  })
