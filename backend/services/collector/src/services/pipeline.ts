import type { Logger } from '../logger.js'
import { DEFAULT_RANKING_LIMIT, type StreamsChartsClient } from './external/streamscharts.js'
import type { StreamerStore } from '../db/streamer-store.js'
import { normalize } from './normalizer.js'
import { HISTORY_WINDOWS, type CollectionSummary, type HistoryRecord } from '../types.js'

export interface PipelineDeps {
  client: Pick<StreamsChartsClient, 'fetchRanking' | 'fetchHistory'>
  store: Pick<StreamerStore, 'ensureSchema' | 'appendRecords'>
  logger: Logger
  rankingLimit?: number
}

/**
 * One collection run: rank streamers, pull their history for every window,
 * make sure their tables exist and append whatever is new. Strictly sequential.
 */
export async function runCollection({ client, store, logger, rankingLimit = DEFAULT_RANKING_LIMIT }: PipelineDeps): Promise<CollectionSummary> {
  const summary: CollectionSummary = {
    status: 'completed',
    streamers: 0,
    historyRecords: 0,
    tables: 0,
    inserted: 0,
    skipped: 0,
    failed: 0,
  }

  // 1. Ranking
  const streamers = await client.fetchRanking('average_viewers', '7-days', rankingLimit)
  if (streamers.length === 0) {
    logger.warn('[PIPELINE] No streamers returned; nothing to collect')
    return { ...summary, status: 'empty' }
  }
  summary.streamers = streamers.length

  // 2. History per streamer and window
  logger.info({ windows: HISTORY_WINDOWS }, '[PIPELINE] Fetching history for each streamer')
  const history = new Map<string, HistoryRecord[]>()
  for (const streamer of streamers) {
    const records: HistoryRecord[] = []
    for (const window of HISTORY_WINDOWS) {
      const record = await client.fetchHistory(streamer, window)
      if (record) records.push(record)
    }
    history.set(streamer, records)
    summary.historyRecords += records.length
  }

  // 3. Tables
  await store.ensureSchema(streamers)

  // 4. Rows per table
  const tables = normalize(history, logger)
  summary.tables = tables.size

  // 5. Append
  for (const [tableName, rows] of tables) {
    const result = await store.appendRecords(tableName, rows)
    summary.inserted += result.inserted
    summary.skipped += result.skipped
    summary.failed += result.failed
  }

  logger.info(summary, '[PIPELINE] Collection complete')
  return summary
}
