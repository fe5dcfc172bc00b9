import { InvalidTableName } from '../errors.js'

// Postgres truncates identifiers beyond 63 bytes, which would merge distinct tables
const MAX_IDENTIFIER_LENGTH = 63
const SAFE_IDENTIFIER = /^[a-z0-9_]+$/

export function isSafeTableName(name: string): boolean {
  return name.length <= MAX_IDENTIFIER_LENGTH && SAFE_IDENTIFIER.test(name)
}

/**
 * Quote a table name for interpolation into SQL.
 * Channel names come from the remote API, so anything outside the allow-list is rejected.
 */
export function quoteTableName(name: string): string {
  if (!isSafeTableName(name)) throw new InvalidTableName(name)
  return `"${name}"`
}
