import 'reflect-metadata'
import dotenv from 'dotenv'
import { loadDatabaseConfig } from '../config.js'
import { createDataSource } from '../db/data-source.js'
import { StreamerStore } from '../db/streamer-store.js'
import { createLogger } from '../logger.js'

dotenv.config()
const logger = createLogger('warn')

async function checkTables() {
  const database = loadDatabaseConfig()
  const dataSource = await createDataSource(database).initialize()
  try {
    const store = new StreamerStore(() => dataSource.createQueryRunner(), logger)
    const tables = await store.listStreamerTables()
    console.log(`[CHECK] ${tables.length} streamer tables in ${database.database}`)
    for (const table of tables) {
      const sample = await store.sampleRecord(table)
      console.log(`  - ${table}${sample ? ` (e.g. ${sample.date}: ${sample.averageViewers ?? '?'} viewers)` : ' (empty)'}`)
    }
  } finally {
    await dataSource.destroy()
  }
}

checkTables().catch((error) => {
  console.error('[CHECK] Error:', error instanceof Error ? error.message : error)
  process.exit(1)
})
