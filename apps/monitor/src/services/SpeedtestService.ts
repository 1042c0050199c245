/**
 * SpeedtestService - one measurement against the speed test engine.
 *
 * Runs the session steps in order and normalizes the numbers into a MeasurementRecord.
 * Only the server list refresh is best-effort; every other failed step aborts the
 * measurement with a SpeedtestError naming the step.
 */

import { Context, Effect, Layer, Schema } from "effect"
import { MeasurementRecord } from "../schema/SpeedTest.js"
import { SpeedtestEngine, SpeedtestError, type TestServer } from "./SpeedtestEngine.js"

// ============================================
// Helper Functions
// ============================================

/** bits per second -> megabits per second */
export const toMbps = (bitsPerSecond: number): number => bitsPerSecond / 1_000_000

export const roundTo2 = (value: number): number => Math.round(value * 100) / 100

export const describeServer = (
  server: TestServer | null
): Pick<MeasurementRecord, "server_name" | "server_location" | "server_sponsor"> =>
  server === null
    ? { server_name: null, server_location: null, server_sponsor: null }
    : {
        server_name: server.name,
        server_location: `${server.name}, ${server.country}`,
        server_sponsor: server.sponsor,
      }

/**
 * Build the record from raw engine output
 */
export const toMeasurementRecord = (raw: {
  readonly downloadBps: number
  readonly uploadBps: number
  readonly latencyMs: number
  readonly server: TestServer | null
}): MeasurementRecord => ({
  download_mbps: roundTo2(toMbps(raw.downloadBps)),
  upload_mbps: roundTo2(toMbps(raw.uploadBps)),
  ping_ms: roundTo2(raw.latencyMs),
  ...describeServer(raw.server),
})

// ============================================
// Service Interface
// ============================================

export interface SpeedtestServiceShape {
  /**
   * Run one full speed test and return the normalized result
   */
  readonly measure: Effect.Effect<MeasurementRecord, SpeedtestError>
}

export class SpeedtestService extends Context.Tag("SpeedtestService")<
  SpeedtestService,
  SpeedtestServiceShape
>() {}

// ============================================
// Live Implementation
// ============================================

export const SpeedtestServiceLive = Layer.effect(
  SpeedtestService,
  Effect.gen(function* () {
    const engine = yield* SpeedtestEngine

    const measure = Effect.gen(function* () {
      yield* Effect.logInfo("Initializing speed test...")
      const session = yield* engine.open

      yield* Effect.logInfo("Getting server list...")
      yield* session.refreshServers.pipe(
        Effect.tap((count) => Effect.logInfo(`Found ${count} servers`)),
        Effect.catchAll((error) =>
          Effect.logWarning(
            `Could not get server list: ${error.message}. Continuing with default configuration...`
          )
        )
      )

      yield* Effect.logInfo("Finding best server...")
      const best = yield* session.selectBestServer
      if (best.server !== null) {
        yield* Effect.logInfo(`Testing via: ${best.server.sponsor} (${best.server.name})`)
      } else {
        yield* Effect.logInfo("Testing via: default server (no server metadata)")
      }

      yield* Effect.logInfo("Testing download speed...")
      const downloadBps = yield* session.download

      yield* Effect.logInfo("Testing upload speed...")
      const uploadBps = yield* session.upload

      const record = yield* Schema.validate(MeasurementRecord)(
        toMeasurementRecord({
          downloadBps,
          uploadBps,
          latencyMs: best.latencyMs,
          server: best.server,
        })
      ).pipe(
        Effect.mapError(
          (e) => new SpeedtestError("result", `Measurement out of range: ${e.message}`, e)
        )
      )

      yield* Effect.logInfo(
        `Results: download ${record.download_mbps.toFixed(2)} Mbps, upload ${record.upload_mbps.toFixed(2)} Mbps, ping ${record.ping_ms.toFixed(2)} ms`
      )

      return record
    })

    const impl: SpeedtestServiceShape = { measure }
    return impl
  })
)
