import type { Logger } from '../../logger.js'
import { SourceUnavailable, describeError } from '../../errors.js'
import {
  HistoryDataSchema,
  HistoryResponseSchema,
  RankingItemSchema,
  RankingResponseSchema,
  type RankingItem,
} from '../schemas.js'
import type { HistoryRecord, HistoryWindow, RankingMetric } from '../../types.js'

export const DEFAULT_BASE_URL = 'https://streamscharts.com/api/jazz'
export const DEFAULT_RANKING_LIMIT = 20
// Spacing the API tolerates between history requests
export const MIN_REQUEST_INTERVAL_MS = 200

export interface StreamsChartsClientOptions {
  clientId: string
  token: string
  logger: Logger
  baseUrl?: string
  platform?: string
  testingMode?: boolean
  /** Minimum spacing between history requests */
  minIntervalMs?: number
  fetchImpl?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Client for the Streams Charts channel endpoints.
 * Failures never throw: rankings degrade to [] and history lookups to null.
 */
export class StreamsChartsClient {
  private readonly baseUrl: string
  private readonly platform: string
  private readonly testingMode: boolean
  private readonly minIntervalMs: number
  private readonly headers: Record<string, string>
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly logger: Logger
  private lastHistoryRequest: number | null = null

  constructor(opts: StreamsChartsClientOptions) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.platform = opts.platform ?? 'twitch'
    this.testingMode = opts.testingMode ?? false
    this.minIntervalMs = opts.minIntervalMs ?? MIN_REQUEST_INTERVAL_MS
    this.headers = {
      'Client-ID': opts.clientId,
      Token: opts.token,
    }
    this.fetchImpl = opts.fetchImpl ?? fetch
    this.sleep = opts.sleep ?? defaultSleep
    this.now = opts.now ?? Date.now
    this.logger = opts.logger
  }

  /**
   * Top channels for a window, sorted by `metric` descending (ties keep
   * response order) and cut to `limit`.
   */
  async fetchRanking(
    metric: RankingMetric = 'average_viewers',
    window: HistoryWindow = '7-days',
    limit: number = DEFAULT_RANKING_LIMIT
  ): Promise<string[]> {
    const url = this.buildUrl('/channels', window)
    this.logger.info({ limit, metric, window }, '[SOURCE] Requesting top streamers')

    let body: unknown
    try {
      body = await this.getJson(url)
    } catch (err) {
      this.logger.error({ err, url }, `[SOURCE] Failed to fetch streamers: ${describeError(err)}`)
      return []
    }

    const parsed = RankingResponseSchema.safeParse(body)
    if (!parsed.success) {
      this.logger.error({ url, issues: parsed.error.issues }, '[SOURCE] Unexpected ranking payload')
      return []
    }

    const items: RankingItem[] = []
    for (const raw of parsed.data.data) {
      const item = RankingItemSchema.safeParse(raw)
      if (item.success) items.push(item.data)
      else this.logger.warn({ item: raw }, '[SOURCE] Skipping ranking entry without channel_name')
    }

    const streamers = rankBy(items, metric)
      .slice(0, limit)
      .map((item) => item.channel_name)

    this.logger.info({ count: streamers.length }, `[SOURCE] Found ${streamers.length} streamers`)
    this.logger.debug({ streamers }, '[SOURCE] Streamer list')
    return streamers
  }

  /**
   * History snapshot for one channel and window, or null when the API has
   * nothing usable for it.
   */
  async fetchHistory(entity: string, window: HistoryWindow): Promise<HistoryRecord | null> {
    await this.waitForSlot()

    const url = this.buildUrl(`/channels/${encodeURIComponent(entity)}`, window)
    this.logger.debug({ entity, window }, '[SOURCE] Requesting history')

    let body: unknown
    try {
      body = await this.getJson(url)
    } catch (err) {
      this.logger.error({ err, entity, window }, `[SOURCE] Failed to fetch history for ${entity} (${window}): ${describeError(err)}`)
      return null
    }

    const envelope = HistoryResponseSchema.safeParse(body)
    if (!envelope.success || !envelope.data.data || Object.keys(envelope.data.data).length === 0) {
      this.logger.warn({ entity, window }, '[SOURCE] No history data returned')
      return null
    }

    const data = HistoryDataSchema.parse(envelope.data.data)
    this.logger.info({ entity, window }, `[SOURCE] History record for ${entity} (${window}) added`)
    return {
      entityKey: entity,
      periodLabel: window,
      averageViewers: data.average_viewers,
      activeDays: data.stream_days,
    }
  }

  private buildUrl(path: string, window: HistoryWindow): string {
    const params = new URLSearchParams({ platform: this.platform, time: window })
    if (this.testingMode) params.set('testing_mode', 'true')
    return `${this.baseUrl}${path}?${params.toString()}`
  }

  private async getJson(url: string): Promise<unknown> {
    const res = await this.fetchImpl(url, { headers: this.headers })
    this.logger.debug({ url, status: res.status }, '[SOURCE] Response received')
    if (!res.ok) {
      const text = await res.text().catch(() => '')
      throw new SourceUnavailable(url, res.status, text)
    }
    return res.json()
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastHistoryRequest !== null) {
      const elapsed = this.now() - this.lastHistoryRequest
      if (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed)
      }
    }
    this.lastHistoryRequest = this.now()
  }
}

function metricValue(item: RankingItem, metric: RankingMetric): number {
  const value = item[metric]
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}

/** Stable descending sort on a numeric field. */
export function rankBy(items: RankingItem[], metric: RankingMetric): RankingItem[] {
  return items
    .map((item, index) => ({ item, index, value: metricValue(item, metric) }))
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .map(({ item }) => item)
}
