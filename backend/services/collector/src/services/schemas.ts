import { z } from 'zod'

// Metrics arrive as numbers, but anything else is treated as unknown rather than rejected
const metric = z.unknown().transform((v) => (typeof v === 'number' && Number.isFinite(v) ? v : null))

export const RankingItemSchema = z
  .object({
    channel_name: z.string().min(1),
  })
  .passthrough()
export type RankingItem = z.infer<typeof RankingItemSchema>

export const RankingResponseSchema = z.object({
  data: z.array(z.unknown()).optional().default([]),
})

export const HistoryDataSchema = z
  .object({
    average_viewers: metric,
    stream_days: metric,
  })
  .passthrough()

export const HistoryResponseSchema = z.object({
  data: z.record(z.unknown()).nullish(),
})
