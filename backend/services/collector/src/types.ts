export const HISTORY_WINDOWS = ['7-days', 'last-month', 'last-year'] as const
export type HistoryWindow = (typeof HISTORY_WINDOWS)[number]

export type RankingMetric = 'average_viewers' | 'peak_viewers' | 'hours_watched' | 'stream_days'

/** One history snapshot for a channel over a window. */
export interface HistoryRecord {
  entityKey: string
  periodLabel: HistoryWindow
  averageViewers: number | null
  activeDays: number | null
}

/** A row as stored in a streamer_<channel> table. */
export interface HistoryRow {
  date: string
  averageViewers: number | null
  streamDays: number | null
}

export interface CollectionSummary {
  status: 'completed' | 'empty'
  streamers: number
  historyRecords: number
  tables: number
  inserted: number
  skipped: number
  failed: number
}
