/**
 * Failure modes of a collection run.
 * Only ConfigurationMissing stops a run; the rest are logged where they happen.
 */

export class SourceUnavailable extends Error {
  readonly name = 'SourceUnavailable'

  constructor(readonly url: string, readonly status: number, readonly body: string) {
    super(`Source returned ${status} for ${url}${body ? `: ${body.substring(0, 200)}` : ''}`)
  }
}

export class RecordInsertFailure extends Error {
  readonly name = 'RecordInsertFailure'

  constructor(readonly tableName: string, readonly date: string | null, cause: unknown) {
    super(`Failed to insert ${date ?? '<no date>'} into ${tableName}: ${describeError(cause)}`, { cause })
  }
}

export class ConfigurationMissing extends Error {
  readonly name = 'ConfigurationMissing'

  constructor(readonly missing: string[]) {
    super(`${missing.join(' or ')} not found in environment`)
  }
}

export class InvalidTableName extends Error {
  readonly name = 'InvalidTableName'

  constructor(readonly tableName: string) {
    super(`Refusing to use ${JSON.stringify(tableName)} as a table name`)
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
