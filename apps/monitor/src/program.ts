/**
 * Speedwatch startup sequence and layer wiring.
 *
 * Configuration is loaded and the banner logged before any layer connects, so a bad
 * database target is reported after the settings that produced it.
 */

import { Cause, Effect, Layer, Option } from "effect"

import {
  loadMonitorConfig,
  MonitorConfigService,
  type MonitorConfig,
} from "./config/MonitorConfig.js"
import { describeCause, PgClientLive, StorageConnectionError } from "./db/config.js"
import {
  SchedulerService,
  SchedulerServiceLive,
  SpeedtestEngineLive,
  SpeedtestRepository,
  SpeedtestRepositoryLive,
  SpeedtestServiceLive,
} from "./services/index.js"

export interface ProgramOptions {
  /** Run a single cycle and return instead of scheduling */
  readonly once: boolean
}

/**
 * Service layers for a loaded configuration
 */
export const makeServicesLayer = (config: MonitorConfig) => {
  const ConfigLayer = Layer.succeed(MonitorConfigService, config)

  const RepositoryLayer = SpeedtestRepositoryLive.pipe(
    Layer.provide(PgClientLive),
    Layer.provide(ConfigLayer)
  )

  const SpeedtestLayer = SpeedtestServiceLive.pipe(
    Layer.provide(SpeedtestEngineLive),
    Layer.provide(ConfigLayer)
  )

  const SchedulerLayer = SchedulerServiceLive.pipe(
    Layer.provide(SpeedtestLayer),
    Layer.provide(RepositoryLayer),
    Layer.provide(ConfigLayer)
  )

  return Layer.merge(RepositoryLayer, SchedulerLayer)
}

export const logBanner = (config: MonitorConfig) =>
  Effect.all([
    Effect.log("Internet Speed Test Monitor"),
    Effect.log(`  Test interval: every ${config.testIntervalMinutes} minutes`),
    Effect.log(`  PostgreSQL:    ${config.dbHost}:${config.dbPort}/${config.dbName}`),
    Effect.log(`  User:          ${config.dbUser}`),
  ])

/**
 * Log how much history is stored and the most recent result
 */
export const logHistory = Effect.gen(function* () {
  const repository = yield* SpeedtestRepository
  const summary = yield* repository.summary
  if (summary.total === 0) {
    yield* Effect.logInfo("No speed tests stored yet")
    return
  }
  yield* Effect.logInfo(`${summary.total} speed tests stored`)
  const [last] = yield* repository.latest(1)
  if (last !== undefined) {
    yield* Effect.logInfo(
      `Last result at ${last.timestamp.toISOString()}: download ${last.download_mbps} Mbps, upload ${last.upload_mbps} Mbps, ping ${last.ping_ms} ms`
    )
  }
}).pipe(
  Effect.catchAll((error) => Effect.logWarning(`Could not read history summary: ${error.message}`))
)

const runServices = (options: ProgramOptions) =>
  Effect.gen(function* () {
    const repository = yield* SpeedtestRepository
    const scheduler = yield* SchedulerService

    yield* repository.ensureSchema.pipe(
      Effect.mapError((error) => new StorageConnectionError(error.message, error))
    )
    yield* Effect.logInfo("Database schema initialized")
    yield* logHistory

    if (options.once) {
      yield* Effect.logInfo("Running a single speed test (--once)")
      yield* scheduler.runCycle
      return
    }

    yield* scheduler.run
  })

export const program = (options: ProgramOptions) =>
  Effect.gen(function* () {
    const config = yield* loadMonitorConfig
    yield* logBanner(config)
    yield* runServices(options).pipe(Effect.provide(makeServicesLayer(config)))
  })

/**
 * Human-readable reason for a startup failure, including defects
 */
export const describeFailure = <E extends { readonly message: string }>(
  cause: Cause.Cause<E>
): string =>
  Option.match(Cause.failureOption(cause), {
    onSome: (error) => error.message,
    onNone: () =>
      Option.match(Cause.dieOption(cause), {
        onSome: describeCause,
        onNone: () => Cause.pretty(cause),
      }),
  })

/**
 * Log any non-interrupt failure as a single FATAL ERROR line
 */
export const reportFatal = <A, E extends { readonly message: string }, R>(
  self: Effect.Effect<A, E, R>
): Effect.Effect<A, E, R> =>
  self.pipe(
    Effect.tapErrorCause((cause) =>
      Cause.isInterruptedOnly(cause)
        ? Effect.void
        : Effect.logFatal(`FATAL ERROR: ${describeFailure(cause)}`)
    )
  )
