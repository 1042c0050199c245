/**
 * PostgreSQL configuration for Effect SQL
 */
import { PgClient } from "@effect/sql-pg"
import { Config, Effect, Layer } from "effect"
import { MonitorConfigService } from "../config/MonitorConfig.js"

export class StorageConnectionError {
  readonly _tag = "StorageConnectionError"
  constructor(
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

/**
 * Best human-readable reason out of an SqlError-like failure
 */
export const describeCause = (error: unknown): string => {
  if (error instanceof Error) {
    const inner = describeInner(error.cause)
    return inner && inner !== error.message ? `${error.message}: ${inner}` : error.message
  }
  return String(error)
}

const describeInner = (cause: unknown): string | null => {
  if (cause instanceof Error) return cause.message
  if (cause === undefined || cause === null) return null
  return String(cause)
}

/**
 * PostgreSQL client layer - provides SqlClient to all services.
 *
 * The pool is capped at one connection: the monitor writes at most one row per cycle and
 * owns that connection for its whole lifetime.
 */
export const PgClientLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* MonitorConfigService
    const target = `${config.dbHost}:${config.dbPort}/${config.dbName}`

    yield* Effect.logInfo(`Connecting to PostgreSQL at ${target}`)

    // Released after the client pool has been ended
    const closeNotice = Layer.scopedDiscard(
      Effect.addFinalizer(() => Effect.logInfo(`PostgreSQL connection to ${target} closed`))
    )

    return PgClient.layer({
      host: Config.succeed(config.dbHost),
      port: Config.succeed(config.dbPort),
      database: Config.succeed(config.dbName),
      username: Config.succeed(config.dbUser),
      password: Config.succeed(config.dbPassword),
      maxConnections: Config.succeed(1),
      applicationName: Config.succeed("speedwatch"),
    }).pipe(
      Layer.provideMerge(closeNotice),
      Layer.mapError(
        (error) =>
          new StorageConnectionError(
            `Failed to connect to PostgreSQL at ${target}: ${describeCause(error)}`,
            error
          )
      ),
      Layer.tap(() => Effect.logInfo(`Connected to PostgreSQL at ${target}`))
    )
  })
)
