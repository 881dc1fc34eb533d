import {readFileSync} from 'node:fs'
import {fileURLToPath} from 'node:url'

import type {StructuredLogger} from '@conference-api/logging'
import Database from 'better-sqlite3'
import type {RunResult} from 'better-sqlite3'
import type {Logger as QueryLogger} from 'drizzle-orm'
import {drizzle, type BetterSQLite3Database} from 'drizzle-orm/better-sqlite3'
import type {BaseSQLiteDatabase} from 'drizzle-orm/sqlite-core'

import * as schema from './schema.js'

export type DatabaseSchema = typeof schema
export type DatabaseClient = BetterSQLite3Database<DatabaseSchema>

/** The client itself or a transaction opened on it. */
export type DatabaseExecutor = BaseSQLiteDatabase<'sync', RunResult, DatabaseSchema>

export type DatabaseHandle = {
  db: DatabaseClient
  close: () => void
}

const SCHEMA_SQL_PATH = fileURLToPath(new URL('../sql/schema.sql', import.meta.url))

export const readSchemaSql = () => readFileSync(SCHEMA_SQL_PATH, 'utf8')

const createQueryLogger = (logger: StructuredLogger): QueryLogger => ({
  logQuery: (query, params) => {
    logger.debug({
      event: 'db.query',
      component: 'db.sqlite',
      metadata: {query, param_count: params.length}
    })
  }
})

export const openDatabase = ({
  filename,
  logger,
  logQueries = false
}: {
  filename: string
  logger: StructuredLogger
  logQueries?: boolean
}): DatabaseHandle => {
  const sqlite = new Database(filename)

  try {
    sqlite.pragma('journal_mode = WAL')
    sqlite.pragma('foreign_keys = ON')
    sqlite.exec(readSchemaSql())
  } catch (error) {
    sqlite.close()
    throw error
  }

  const db = drizzle(sqlite, {
    schema,
    logger: logQueries ? createQueryLogger(logger) : false
  })

  logger.info({
    event: 'db.opened',
    component: 'db.sqlite',
    metadata: {filename}
  })

  return {
    db,
    close: () => {
      if (sqlite.open) {
        sqlite.close()
      }
    }
  }
}
