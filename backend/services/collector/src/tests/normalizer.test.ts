import { describe, it, expect, vi } from 'vitest'
import { normalize, tableNameFor } from '../services/normalizer.js'
import type { HistoryRecord } from '../types.js'
import { silentLogger } from './helpers/memory-database.js'

function record(entityKey: string, periodLabel: HistoryRecord['periodLabel'], averageViewers: number | null, activeDays: number | null): HistoryRecord {
  return { entityKey, periodLabel, averageViewers, activeDays }
}

describe('tableNameFor', () => {
  it('prefixes and lowercases the channel name', () => {
    expect(tableNameFor('foo')).toBe('streamer_foo')
    expect(tableNameFor('Foo_Bar')).toBe('streamer_foo_bar')
  })

  it('maps names differing only in case to the same table', () => {
    expect(tableNameFor('XQC')).toBe(tableNameFor('xqc'))
  })
})

describe('normalize', () => {
  it('turns history records into rows per table', () => {
    const history = new Map([
      ['foo', [record('foo', '7-days', 120, 5), record('foo', 'last-year', 90, 200)]],
      ['Bar', [record('Bar', 'last-month', 60, 12)]],
    ])

    const tables = normalize(history)

    expect([...tables.keys()]).toEqual(['streamer_foo', 'streamer_bar'])
    expect(tables.get('streamer_foo')).toEqual([
      { date: '7-days', averageViewers: 120, streamDays: 5 },
      { date: 'last-year', averageViewers: 90, streamDays: 200 },
    ])
    expect(tables.get('streamer_bar')).toEqual([{ date: 'last-month', averageViewers: 60, streamDays: 12 }])
  })

  it('keeps streamers with no history as empty tables', () => {
    const tables = normalize(new Map<string, HistoryRecord[]>([['quiet', []]]))
    expect(tables.get('streamer_quiet')).toEqual([])
  })

  it('does not default unknown metrics', () => {
    const tables = normalize(new Map([['foo', [record('foo', '7-days', null, null)]]]))
    expect(tables.get('streamer_foo')).toEqual([{ date: '7-days', averageViewers: null, streamDays: null }])
  })

  it('warns when two channels collide on one table and keeps the later one', () => {
    const logger = silentLogger()
    const warn = vi.spyOn(logger, 'warn')
    const history = new Map([
      ['Foo', [record('Foo', '7-days', 1, 1)]],
      ['foo', [record('foo', 'last-month', 2, 2)]],
    ])

    const tables = normalize(history, logger)

    expect(tables.size).toBe(1)
    expect(tables.get('streamer_foo')).toEqual([{ date: 'last-month', averageViewers: 2, streamDays: 2 }])
    expect(warn).toHaveBeenCalledTimes(1)
  })
})
