import type { QueryRunner } from 'typeorm'
import { z } from 'zod'
import type { Logger } from '../logger.js'
import { RecordInsertFailure, describeError } from '../errors.js'
import { TABLE_PREFIX, tableNameFor } from '../services/normalizer.js'
import type { HistoryRow } from '../types.js'
import { quoteTableName } from './identifiers.js'

/** The slice of TypeORM's QueryRunner the store relies on. */
export type StoreQueryRunner = Pick<
  QueryRunner,
  'connect' | 'startTransaction' | 'commitTransaction' | 'rollbackTransaction' | 'release' | 'isTransactionActive'
> & {
  query(sql: string, parameters?: unknown[]): Promise<unknown>
}

export interface SchemaResult {
  ensured: string[]
  failed: string[]
}

export interface AppendResult {
  inserted: number
  skipped: number
  failed: number
}

const TableListSchema = z.array(z.object({ tablename: z.string() }))
const StoredRowSchema = z.object({
  date: z.string(),
  average_viewers: z.number().nullable(),
  stream_days: z.number().nullable(),
})
const ReturnedRowsSchema = z.array(z.unknown())

/**
 * Per-streamer history tables: `streamer_<channel>(date, average_viewers, stream_days)`.
 * Each public method holds one query runner for its duration.
 */
export class StreamerStore {
  constructor(
    private readonly createRunner: () => StoreQueryRunner | Promise<StoreQueryRunner>,
    private readonly logger: Logger
  ) {}

  async ensureSchema(entityKeys: string[]): Promise<SchemaResult> {
    this.logger.info({ count: entityKeys.length }, '[STORE] Checking/creating streamer tables')
    const result: SchemaResult = { ensured: [], failed: [] }

    await this.withRunner(async (runner) => {
      for (const key of entityKeys) {
        const tableName = tableNameFor(key)
        try {
          await runner.query(`
            CREATE TABLE IF NOT EXISTS ${quoteTableName(tableName)} (
              date TEXT PRIMARY KEY,
              average_viewers INTEGER,
              stream_days INTEGER
            )
          `)
          result.ensured.push(tableName)
        } catch (err) {
          this.logger.error({ err, tableName }, `[STORE] Could not create ${tableName}: ${describeError(err)}`)
          result.failed.push(tableName)
        }
      }
    })

    this.logger.info({ ensured: result.ensured.length, failed: result.failed.length }, '[STORE] Streamer tables ready')
    return result
  }

  /**
   * Insert rows that are not stored yet. Existing dates are left as they are;
   * a row that fails is rolled back alone and the rest carry on.
   */
  async appendRecords(tableName: string, rows: HistoryRow[]): Promise<AppendResult> {
    const result: AppendResult = { inserted: 0, skipped: 0, failed: 0 }
    if (rows.length === 0) return result

    let table: string
    try {
      table = quoteTableName(tableName)
    } catch (err) {
      this.logger.error({ err, tableName }, `[STORE] ${describeError(err)}`)
      result.failed = rows.length
      return result
    }

    await this.withRunner(async (runner) => {
      for (const row of rows) {
        try {
          await runner.startTransaction()
          const returned = ReturnedRowsSchema.parse(
            await runner.query(
              `INSERT INTO ${table} (date, average_viewers, stream_days) VALUES ($1, $2, $3)
               ON CONFLICT (date) DO NOTHING RETURNING date`,
              [row.date, row.averageViewers, row.streamDays]
            )
          )
          await runner.commitTransaction()
          if (returned.length > 0) result.inserted++
          else result.skipped++
        } catch (err) {
          await this.rollbackRow(runner, tableName, row)
          const failure = new RecordInsertFailure(tableName, row.date, err)
          this.logger.error({ err: failure, row }, `[STORE] ${failure.message}`)
          result.failed++
        }
      }
    })

    this.logger.info({ tableName, ...result }, `[STORE] Appended rows to ${tableName}`)
    return result
  }

  async listStreamerTables(): Promise<string[]> {
    return this.withRunner(async (runner) => {
      const rows = TableListSchema.parse(
        await runner.query(
          `SELECT tablename FROM pg_tables WHERE schemaname = 'public' AND tablename LIKE $1 ORDER BY tablename`,
          [`${TABLE_PREFIX}%`]
        )
      )
      return rows.map((r) => r.tablename)
    })
  }

  /** A random stored row, or null when the table is empty. */
  async sampleRecord(tableName: string): Promise<HistoryRow | null> {
    const table = quoteTableName(tableName)
    return this.withRunner(async (runner) => {
      const rows = z
        .array(StoredRowSchema)
        .parse(await runner.query(`SELECT date, average_viewers, stream_days FROM ${table} ORDER BY RANDOM() LIMIT 1`))
      const [row] = rows
      if (!row) return null
      return { date: row.date, averageViewers: row.average_viewers, streamDays: row.stream_days }
    })
  }

  async hasRecord(tableName: string, row: Pick<HistoryRow, 'date' | 'averageViewers'>): Promise<boolean> {
    const table = quoteTableName(tableName)
    return this.withRunner(async (runner) => {
      const rows = ReturnedRowsSchema.parse(
        await runner.query(
          `SELECT 1 FROM ${table} WHERE date = $1 AND average_viewers IS NOT DISTINCT FROM $2`,
          [row.date, row.averageViewers]
        )
      )
      return rows.length > 0
    })
  }

  private async rollbackRow(runner: StoreQueryRunner, tableName: string, row: HistoryRow): Promise<void> {
    if (!runner.isTransactionActive) return
    try {
      await runner.rollbackTransaction()
    } catch (err) {
      this.logger.error({ err, tableName, row }, `[STORE] Rollback failed for ${row.date} in ${tableName}: ${describeError(err)}`)
    }
  }

  private async withRunner<T>(work: (runner: StoreQueryRunner) => Promise<T>): Promise<T> {
    const runner = await this.createRunner()
    await runner.connect()
    try {
      return await work(runner)
    } finally {
      await runner.release()
    }
  }
}
