import type { Logger } from '../logger.js'
import type { HistoryRecord, HistoryRow } from '../types.js'

export const TABLE_PREFIX = 'streamer_'

/**
 * Storage table for a channel. Case is folded, so "Foo" and "foo" share a table.
 */
export function tableNameFor(entityKey: string): string {
  return `${TABLE_PREFIX}${entityKey.toLowerCase()}`
}

/**
 * Group history records into rows per storage table, keeping entity and
 * window order. Metrics are passed through untouched, nulls included.
 */
export function normalize(historyMap: Map<string, HistoryRecord[]>, logger?: Logger): Map<string, HistoryRow[]> {
  const tables = new Map<string, HistoryRow[]>()
  const owners = new Map<string, string>()

  for (const [entityKey, records] of historyMap) {
    const tableName = tableNameFor(entityKey)
    const previous = owners.get(tableName)
    if (previous !== undefined && previous !== entityKey) {
      logger?.warn({ tableName, previous, entityKey }, `[NORMALIZE] ${entityKey} and ${previous} share ${tableName}; keeping ${entityKey}`)
    }
    owners.set(tableName, entityKey)

    tables.set(
      tableName,
      records.map((record) => ({
        date: record.periodLabel,
        averageViewers: record.averageViewers,
        streamDays: record.activeDays,
      }))
    )
  }

  logger?.debug({ tables: tables.size }, '[NORMALIZE] Formatted history rows')
  return tables
}
