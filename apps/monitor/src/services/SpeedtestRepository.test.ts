import { Effect, Either, TestClock, TestContext } from "effect"
import { describe, expect, it } from "vitest"
import { SCHEMA_STATEMENTS } from "../db/schema.js"
import {
  MeasurementSummary,
  StoredMeasurement,
  type MeasurementRecord,
} from "../schema/SpeedTest.js"
import {
  decodeRows,
  makeMemoryDatabase,
  SpeedtestRepository,
  SpeedtestRepositoryMemory,
  type MemoryDatabase,
} from "./SpeedtestRepository.js"

const record: MeasurementRecord = {
  download_mbps: 93.45,
  upload_mbps: 11.2,
  ping_ms: 14.7,
  server_name: "NYC1",
  server_location: "NYC1, US",
  server_sponsor: "ExampleISP",
}

const run = <A, E>(db: MemoryDatabase, effect: Effect.Effect<A, E, SpeedtestRepository>) =>
  effect.pipe(
    Effect.provide(SpeedtestRepositoryMemory(db)),
    Effect.provide(TestContext.TestContext),
    Effect.runPromise
  )

describe("schema statements", () => {
  it("guards every statement with IF NOT EXISTS", () => {
    for (const statement of SCHEMA_STATEMENTS) {
      expect(statement).toMatch(/^CREATE (TABLE|INDEX) IF NOT EXISTS /)
    }
  })

  it("creates the speed_tests table with fixed-point measurement columns", () => {
    const [table] = SCHEMA_STATEMENTS
    expect(table).toContain("CREATE TABLE IF NOT EXISTS speed_tests (")
    expect(table).toContain("timestamp TIMESTAMP WITH TIME ZONE DEFAULT NOW()")
    expect(table).toContain("download_mbps NUMERIC(10,2) NOT NULL")
    expect(table).toContain("upload_mbps NUMERIC(10,2) NOT NULL")
    expect(table).toContain("ping_ms NUMERIC(10,2) NOT NULL")
    expect(table).toContain("server_sponsor VARCHAR(255)")
  })

  it("indexes timestamp descending", () => {
    expect(SCHEMA_STATEMENTS[1]).toBe(
      "CREATE INDEX IF NOT EXISTS idx_speed_tests_timestamp ON speed_tests (timestamp DESC)"
    )
  })
})

describe("SpeedtestRepository (in-memory)", () => {
  it("ensureSchema is idempotent", async () => {
    const db = makeMemoryDatabase()

    await run(
      db,
      Effect.gen(function* () {
        const repository = yield* SpeedtestRepository
        yield* repository.ensureSchema
        yield* repository.ensureSchema
      })
    )

    expect([...db.tables]).toEqual(["speed_tests"])
    expect([...db.indexes]).toEqual(["idx_speed_tests_timestamp"])
  })

  it("rejects inserts before the schema exists", async () => {
    const db = makeMemoryDatabase()

    const result = await run(
      db,
      Effect.gen(function* () {
        const repository = yield* SpeedtestRepository
        return yield* Effect.either(repository.insert(record))
      })
    )

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isRight(result)) return
    expect(result.left.operation).toBe("insert")
    expect(db.rows).toHaveLength(0)
  })

  it("appends records with increasing ids and store-assigned timestamps", async () => {
    const db = makeMemoryDatabase()

    const ids = await run(
      db,
      Effect.gen(function* () {
        const repository = yield* SpeedtestRepository
        yield* repository.ensureSchema
        yield* TestClock.setTime(1_000)
        const first = yield* repository.insert(record)
        yield* TestClock.setTime(2_000)
        const second = yield* repository.insert({ ...record, download_mbps: 50 })
        return [first, second]
      })
    )

    expect(ids).toEqual([1, 2])
    expect(db.rows.map((row) => row.timestamp.getTime())).toEqual([1_000, 2_000])
    expect(db.rows[0]).toEqual({ id: 1, timestamp: new Date(1_000), ...record })
  })

  it("rejects negative measurements", async () => {
    const db = makeMemoryDatabase()

    const result = await run(
      db,
      Effect.gen(function* () {
        const repository = yield* SpeedtestRepository
        yield* repository.ensureSchema
        return yield* Effect.either(repository.insert({ ...record, ping_ms: -1 }))
      })
    )

    expect(Either.isLeft(result)).toBe(true)
    expect(db.rows).toHaveLength(0)
  })

  it("returns latest rows newest first and summarizes history", async () => {
    const db = makeMemoryDatabase()

    const { latest, summary } = await run(
      db,
      Effect.gen(function* () {
        const repository = yield* SpeedtestRepository
        yield* repository.ensureSchema
        for (const [time, download] of [
          [1_000, 10],
          [3_000, 30],
          [2_000, 20],
        ] as const) {
          yield* TestClock.setTime(time)
          yield* repository.insert({ ...record, download_mbps: download })
        }
        return {
          latest: yield* repository.latest(2),
          summary: yield* repository.summary,
        }
      })
    )

    expect(latest.map((row) => row.download_mbps)).toEqual([30, 20])
    expect(summary).toEqual({
      total: 3,
      first_test: new Date(1_000),
      last_test: new Date(3_000),
    })
  })
})

describe("decodeRows", () => {
  it("reads NUMERIC columns returned as strings", async () => {
    const rows = await Effect.runPromise(
      decodeRows(
        "latest",
        [
          {
            id: 7,
            timestamp: new Date(1_000),
            download_mbps: "93.45",
            upload_mbps: "11.20",
            ping_ms: "14.70",
            server_name: "NYC1",
            server_location: "NYC1, US",
            server_sponsor: "ExampleISP",
          },
        ],
        StoredMeasurement
      )
    )

    expect(rows).toEqual([{ id: 7, timestamp: new Date(1_000), ...record }])
  })

  it("reads a COUNT(*) total returned as a string", async () => {
    const rows = await Effect.runPromise(
      decodeRows(
        "summary",
        [{ total: "3", first_test: new Date(1_000), last_test: new Date(3_000) }],
        MeasurementSummary
      )
    )

    expect(rows).toEqual([{ total: 3, first_test: new Date(1_000), last_test: new Date(3_000) }])
  })

  it("fails with the operation on a malformed row", async () => {
    const result = await Effect.runPromise(
      Effect.either(decodeRows("summary", [{ total: "many" }], MeasurementSummary))
    )

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isRight(result)) return
    expect(result.left.operation).toBe("summary")
    expect(result.left.message.startsWith("Failed to parse row:")).toBe(true)
  })
})
