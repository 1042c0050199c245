/**
 * SpeedtestRepository - Effect-based data access for speed test history.
 *
 * Append-only: records are inserted and read back, never updated or deleted.
 * The live implementation runs on the SqlClient provided by PgClientLive.
 */

import { SqlClient } from "@effect/sql"
import { Clock, Context, Effect, Layer, Schema } from "effect"
import { describeCause } from "../db/config.js"
import { SCHEMA_STATEMENTS } from "../db/schema.js"
import {
  MeasurementRecord,
  MeasurementSummary,
  StoredMeasurement,
} from "../schema/SpeedTest.js"

// ============================================
// Repository Errors
// ============================================

export class RepositoryError {
  readonly _tag = "RepositoryError"
  constructor(
    readonly operation: "ensure_schema" | "insert" | "latest" | "summary",
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// Service Interface
// ============================================

export interface SpeedtestRepositoryShape {
  /**
   * Create the speed_tests table and its timestamp index when absent
   */
  readonly ensureSchema: Effect.Effect<void, RepositoryError>

  /**
   * Insert one measurement in its own transaction, returning the new row id
   */
  readonly insert: (record: MeasurementRecord) => Effect.Effect<number, RepositoryError>

  /**
   * Most recent measurements, newest first
   */
  readonly latest: (
    limit: number
  ) => Effect.Effect<ReadonlyArray<StoredMeasurement>, RepositoryError>

  /**
   * Row count and first/last timestamps
   */
  readonly summary: Effect.Effect<MeasurementSummary, RepositoryError>
}

export class SpeedtestRepository extends Context.Tag("SpeedtestRepository")<
  SpeedtestRepository,
  SpeedtestRepositoryShape
>() {}

const validateRecord = (record: MeasurementRecord) =>
  Schema.validate(MeasurementRecord)(record).pipe(
    Effect.mapError(
      (e) => new RepositoryError("insert", `Invalid measurement record: ${e.message}`, e)
    )
  )

/**
 * Decode driver rows. NUMERIC and COUNT(*) arrive as strings.
 */
export const decodeRows = <A, I>(
  operation: RepositoryError["operation"],
  rows: ReadonlyArray<unknown>,
  schema: Schema.Schema<A, I>
): Effect.Effect<ReadonlyArray<A>, RepositoryError> =>
  Schema.decodeUnknown(Schema.Array(schema))(rows).pipe(
    Effect.mapError((e) => new RepositoryError(operation, `Failed to parse row: ${e.message}`, e))
  )

// ============================================
// Live Implementation
// ============================================

export const SpeedtestRepositoryLive = Layer.effect(
  SpeedtestRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    const sqlFailure =
      (operation: RepositoryError["operation"], action: string) => (error: unknown) =>
        new RepositoryError(operation, `${action}: ${describeCause(error)}`, error)

    const impl: SpeedtestRepositoryShape = {
      ensureSchema: sql
        .withTransaction(
          Effect.forEach(SCHEMA_STATEMENTS, (statement) => sql.unsafe(statement), {
            discard: true,
          })
        )
        .pipe(Effect.mapError(sqlFailure("ensure_schema", "Schema initialization failed"))),

      insert: (record) =>
        Effect.gen(function* () {
          const valid = yield* validateRecord(record)
          const rows = yield* sql
            .withTransaction(
              sql<{ readonly id: number }>`
                INSERT INTO speed_tests ${sql.insert({
                  download_mbps: valid.download_mbps,
                  upload_mbps: valid.upload_mbps,
                  ping_ms: valid.ping_ms,
                  server_name: valid.server_name,
                  server_location: valid.server_location,
                  server_sponsor: valid.server_sponsor,
                })}
                RETURNING id
              `
            )
            .pipe(Effect.mapError(sqlFailure("insert", "Insert failed")))

          const inserted = rows[0]
          if (inserted === undefined) {
            return yield* Effect.fail(new RepositoryError("insert", "Insert returned no row id"))
          }
          return inserted.id
        }),

      latest: (limit) =>
        sql`
          SELECT id, timestamp, download_mbps, upload_mbps, ping_ms,
                 server_name, server_location, server_sponsor
          FROM speed_tests
          ORDER BY timestamp DESC
          LIMIT ${limit}
        `.pipe(
          Effect.mapError(sqlFailure("latest", "Query failed")),
          Effect.flatMap((rows) => decodeRows("latest", rows, StoredMeasurement))
        ),

      summary: sql`
        SELECT COUNT(*) AS total, MIN(timestamp) AS first_test, MAX(timestamp) AS last_test
        FROM speed_tests
      `.pipe(
        Effect.mapError(sqlFailure("summary", "Query failed")),
        Effect.flatMap((rows) => decodeRows("summary", rows, MeasurementSummary)),
        Effect.flatMap((rows) => {
          const summary = rows[0]
          return summary === undefined
            ? Effect.fail(new RepositoryError("summary", "Summary query returned no rows"))
            : Effect.succeed(summary)
        })
      ),
    }

    return impl
  })
)

// ============================================
// In-Memory Implementation (for testing)
// ============================================

export interface MemoryDatabase {
  readonly tables: Set<string>
  readonly indexes: Set<string>
  readonly rows: StoredMeasurement[]
  /** Number of upcoming inserts to reject */
  failInserts: number
}

export const makeMemoryDatabase = (): MemoryDatabase => ({
  tables: new Set(),
  indexes: new Set(),
  rows: [],
  failInserts: 0,
})

const DDL_PATTERN = /^CREATE\s+(TABLE|INDEX)\s+(IF\s+NOT\s+EXISTS\s+)?(\w+)/i

/**
 * Applies the real DDL statements to an in-memory catalog, so a statement lacking
 * IF NOT EXISTS fails the second time just like it would in PostgreSQL.
 */
const applyStatement = (
  db: MemoryDatabase,
  statement: string
): Effect.Effect<void, RepositoryError> => {
  const match = DDL_PATTERN.exec(statement.trim())
  if (match === null) {
    return Effect.fail(
      new RepositoryError("ensure_schema", `Unsupported statement: ${statement.trim()}`)
    )
  }
  const [, kind = "", guard, name = ""] = match
  const catalog = kind.toUpperCase() === "TABLE" ? db.tables : db.indexes
  if (catalog.has(name)) {
    return guard
      ? Effect.void
      : Effect.fail(new RepositoryError("ensure_schema", `relation "${name}" already exists`))
  }
  catalog.add(name)
  return Effect.void
}

export const SpeedtestRepositoryMemory = (db: MemoryDatabase) =>
  Layer.succeed(SpeedtestRepository, {
    ensureSchema: Effect.forEach(SCHEMA_STATEMENTS, (statement) => applyStatement(db, statement), {
      discard: true,
    }),

    insert: (record) =>
      Effect.gen(function* () {
        const valid = yield* validateRecord(record)
        if (!db.tables.has("speed_tests")) {
          return yield* Effect.fail(
            new RepositoryError("insert", 'Insert failed: relation "speed_tests" does not exist')
          )
        }
        if (db.failInserts > 0) {
          db.failInserts -= 1
          return yield* Effect.fail(new RepositoryError("insert", "Insert failed: connection reset"))
        }
        const now = yield* Clock.currentTimeMillis
        const id = db.rows.length + 1
        db.rows.push({ id, timestamp: new Date(now), ...valid })
        return id
      }),

    latest: (limit) =>
      Effect.sync(() =>
        [...db.rows]
          .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime() || b.id - a.id)
          .slice(0, limit)
      ),

    summary: Effect.sync(() => {
      const times = db.rows.map((row) => row.timestamp.getTime())
      return {
        total: db.rows.length,
        first_test: times.length > 0 ? new Date(Math.min(...times)) : null,
        last_test: times.length > 0 ? new Date(Math.max(...times)) : null,
      }
    }),
  })
