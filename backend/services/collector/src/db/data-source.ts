import 'reflect-metadata'
import { DataSource } from 'typeorm'
import type { DatabaseConfig } from '../config.js'

/**
 * Postgres connection for the streamer tables. Tables are created at run
 * time per channel, so there are no entities or migrations to register.
 */
export function createDataSource(db: DatabaseConfig): DataSource {
  return new DataSource({
    type: 'postgres',
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.database,
    entities: [],
    synchronize: false,
    logging: false,
    poolSize: 1,
  })
}
