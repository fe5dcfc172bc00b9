import { describe, it, expect, beforeEach } from 'vitest'
import { StreamerStore } from '../db/streamer-store.js'
import { quoteTableName } from '../db/identifiers.js'
import { InvalidTableName } from '../errors.js'
import { MemoryDatabase, silentLogger } from './helpers/memory-database.js'

describe('quoteTableName', () => {
  it('quotes names on the allow-list', () => {
    expect(quoteTableName('streamer_foo_123')).toBe('"streamer_foo_123"')
  })

  it('rejects anything else', () => {
    expect(() => quoteTableName('streamer_Foo')).toThrow(InvalidTableName)
    expect(() => quoteTableName('streamer_a"; drop table x; --')).toThrow(InvalidTableName)
    expect(() => quoteTableName(`streamer_${'a'.repeat(55)}`)).toThrow(InvalidTableName)
  })
})

describe('StreamerStore', () => {
  let db: MemoryDatabase
  let store: StreamerStore

  beforeEach(() => {
    db = new MemoryDatabase()
    store = new StreamerStore(db.createRunner, silentLogger())
  })

  describe('ensureSchema', () => {
    it('creates one table per streamer and can run again', async () => {
      expect(await store.ensureSchema(['foo', 'Bar'])).toEqual({ ensured: ['streamer_foo', 'streamer_bar'], failed: [] })
      await store.ensureSchema(['foo'])

      expect([...db.tables.keys()]).toEqual(['streamer_foo', 'streamer_bar'])
      expect(db.connections).toBe(2)
      expect(db.releases).toBe(2)
    })

    it('skips names that are not safe identifiers without blocking the rest', async () => {
      const result = await store.ensureSchema(['x"; DROP TABLE users; --', 'foo'])

      expect(result).toEqual({ ensured: ['streamer_foo'], failed: ['streamer_x"; drop table users; --'] })
      expect(db.statements).toHaveLength(1)
      expect(db.statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS "streamer_foo" \(/)
    })

    it('keeps going when one create fails', async () => {
      db.failWhen = (sql) => sql.includes('"streamer_foo"')

      const result = await store.ensureSchema(['foo', 'bar'])

      expect(result).toEqual({ ensured: ['streamer_bar'], failed: ['streamer_foo'] })
      expect(db.releases).toBe(1)
    })
  })

  describe('appendRecords', () => {
    beforeEach(async () => {
      await store.ensureSchema(['foo'])
    })

    it('inserts a period once and never overwrites it', async () => {
      const first = await store.appendRecords('streamer_foo', [{ date: '7-days', averageViewers: 120, streamDays: 5 }])
      const again = await store.appendRecords('streamer_foo', [{ date: '7-days', averageViewers: 120, streamDays: 5 }])
      const changed = await store.appendRecords('streamer_foo', [{ date: '7-days', averageViewers: 999, streamDays: 7 }])

      expect(first).toEqual({ inserted: 1, skipped: 0, failed: 0 })
      expect(again).toEqual({ inserted: 0, skipped: 1, failed: 0 })
      expect(changed).toEqual({ inserted: 0, skipped: 1, failed: 0 })
      expect(db.rows('streamer_foo')).toEqual([{ date: '7-days', average_viewers: 120, stream_days: 5 }])
    })

    it('rolls back only the row that fails', async () => {
      const result = await store.appendRecords('streamer_foo', [
        { date: '7-days', averageViewers: 120, streamDays: 5 },
        { date: 'last-month', averageViewers: 12.5, streamDays: 3 },
        { date: 'last-year', averageViewers: 80, streamDays: null },
      ])

      expect(result).toEqual({ inserted: 2, skipped: 0, failed: 1 })
      expect(db.rows('streamer_foo')).toEqual([
        { date: '7-days', average_viewers: 120, stream_days: 5 },
        { date: 'last-year', average_viewers: 80, stream_days: null },
      ])
    })

    it('moves on to the next row when a rollback fails', async () => {
      db.failRollback = true

      const result = await store.appendRecords('streamer_foo', [
        { date: '7-days', averageViewers: 12.5, streamDays: 5 },
        { date: 'last-month', averageViewers: 110, streamDays: 20 },
      ])

      expect(result).toEqual({ inserted: 1, skipped: 0, failed: 1 })
      expect(db.rows('streamer_foo')).toEqual([{ date: 'last-month', average_viewers: 110, stream_days: 20 }])
      expect(db.releases).toBe(db.connections)
    })

    it('fails every row of a table that does not exist', async () => {
      const result = await store.appendRecords('streamer_ghost', [
        { date: '7-days', averageViewers: 1, streamDays: 1 },
        { date: 'last-year', averageViewers: 2, streamDays: 2 },
      ])

      expect(result).toEqual({ inserted: 0, skipped: 0, failed: 2 })
      expect(db.tables.has('streamer_ghost')).toBe(false)
    })

    it('refuses unsafe table names before touching the database', async () => {
      const statementsBefore = db.statements.length

      const result = await store.appendRecords('streamer_foo; drop table streamer_foo', [
        { date: '7-days', averageViewers: 1, streamDays: 1 },
      ])

      expect(result).toEqual({ inserted: 0, skipped: 0, failed: 1 })
      expect(db.statements).toHaveLength(statementsBefore)
    })

    it('does nothing for an empty batch', async () => {
      const connectionsBefore = db.connections
      expect(await store.appendRecords('streamer_foo', [])).toEqual({ inserted: 0, skipped: 0, failed: 0 })
      expect(db.connections).toBe(connectionsBefore)
    })
  })

  describe('read-back', () => {
    beforeEach(async () => {
      await store.ensureSchema(['foo', 'bar'])
      await store.appendRecords('streamer_foo', [{ date: '7-days', averageViewers: 120, streamDays: 5 }])
    })

    it('lists streamer tables in name order', async () => {
      expect(await store.listStreamerTables()).toEqual(['streamer_bar', 'streamer_foo'])
    })

    it('samples a stored row', async () => {
      expect(await store.sampleRecord('streamer_foo')).toEqual({ date: '7-days', averageViewers: 120, streamDays: 5 })
      expect(await store.sampleRecord('streamer_bar')).toBeNull()
    })

    it('finds a row by date and viewers', async () => {
      expect(await store.hasRecord('streamer_foo', { date: '7-days', averageViewers: 120 })).toBe(true)
      expect(await store.hasRecord('streamer_foo', { date: '7-days', averageViewers: 121 })).toBe(false)
    })
  })
})
