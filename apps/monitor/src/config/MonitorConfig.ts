/**
 * Monitor configuration using Effect Config
 */
import {
  Config,
  ConfigError,
  Context,
  Effect,
  Either,
  Layer,
  Logger,
  LogLevel,
  Redacted,
} from "effect"

/**
 * Monitor configuration interface
 */
export interface MonitorConfig {
  readonly dbHost: string
  readonly dbPort: number
  readonly dbName: string
  readonly dbUser: string
  readonly dbPassword: Redacted.Redacted
  readonly testIntervalMinutes: number
  readonly tickSeconds: number
  readonly failureWarnThreshold: number
  readonly speedtestCommand: string
  readonly speedtestTimeoutSeconds: number
  readonly speedtestSecure: boolean
}

/**
 * MonitorConfig service tag
 */
export class MonitorConfigService extends Context.Tag("MonitorConfigService")<
  MonitorConfigService,
  MonitorConfig
>() {}

// ============================================
// Error Types
// ============================================

export class ConfigurationError {
  readonly _tag = "ConfigurationError"
  constructor(
    readonly keys: readonly string[],
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

/**
 * Default monitor configuration (DB_PASSWORD has none)
 */
const defaultConfig = {
  dbHost: "postgres",
  dbPort: 5432,
  dbName: "speedtest",
  dbUser: "speedtest_user",
  testIntervalMinutes: 30,
  tickSeconds: 60,
  failureWarnThreshold: 3,
  speedtestCommand: "speedtest-cli",
  speedtestTimeoutSeconds: 120,
  speedtestSecure: false,
} as const

// Validation runs inside the nesting so failures carry the variable name in their path
const positiveInteger = (name: string, fallback: number) =>
  Config.nested(
    Config.integer().pipe(
      Config.validate({
        message: `${name} must be a positive integer`,
        validation: (n) => n >= 1,
      })
    ),
    name
  ).pipe(Config.withDefault(fallback))

/**
 * Load monitor config from environment with defaults
 */
export const monitorConfig: Config.Config<MonitorConfig> = Config.all({
  dbHost: Config.string("DB_HOST").pipe(Config.withDefault(defaultConfig.dbHost)),
  dbPort: Config.nested(
    Config.integer().pipe(
      Config.validate({
        message: "DB_PORT must be between 1 and 65535",
        validation: (port) => port >= 1 && port <= 65535,
      })
    ),
    "DB_PORT"
  ).pipe(Config.withDefault(defaultConfig.dbPort)),
  dbName: Config.string("DB_NAME").pipe(Config.withDefault(defaultConfig.dbName)),
  dbUser: Config.string("DB_USER").pipe(Config.withDefault(defaultConfig.dbUser)),
  // An empty DB_PASSWORD counts as unset
  dbPassword: Config.nested(
    Config.redacted().pipe(
      Config.mapOrFail((password) =>
        Redacted.value(password).length > 0
          ? Either.right(password)
          : Either.left(ConfigError.MissingData([], "DB_PASSWORD is empty"))
      )
    ),
    "DB_PASSWORD"
  ),
  testIntervalMinutes: positiveInteger("TEST_INTERVAL", defaultConfig.testIntervalMinutes),
  tickSeconds: positiveInteger("SCHEDULER_TICK_SECONDS", defaultConfig.tickSeconds),
  failureWarnThreshold: positiveInteger(
    "FAILURE_WARN_THRESHOLD",
    defaultConfig.failureWarnThreshold
  ),
  speedtestCommand: Config.string("SPEEDTEST_COMMAND").pipe(
    Config.withDefault(defaultConfig.speedtestCommand)
  ),
  speedtestTimeoutSeconds: positiveInteger(
    "SPEEDTEST_TIMEOUT_SECONDS",
    defaultConfig.speedtestTimeoutSeconds
  ),
  speedtestSecure: Config.boolean("SPEEDTEST_SECURE").pipe(
    Config.withDefault(defaultConfig.speedtestSecure)
  ),
})

interface ConfigIssue {
  readonly key: string
  readonly missing: boolean
  readonly message: string
}

const collectIssues = (error: ConfigError.ConfigError): ConfigIssue[] => {
  switch (error._op) {
    case "And":
    case "Or":
      return [...collectIssues(error.left), ...collectIssues(error.right)]
    default:
      return [
        {
          key: error.path.join("_"),
          missing: error._op === "MissingData",
          message: error.message,
        },
      ]
  }
}

/**
 * Convert an Effect ConfigError into a ConfigurationError naming the offending keys
 */
export const toConfigurationError = (error: ConfigError.ConfigError): ConfigurationError => {
  const issues = collectIssues(error)
  const missing = [...new Set(issues.filter((issue) => issue.missing).map((issue) => issue.key))]

  if (missing.length > 0) {
    const noun = missing.length === 1 ? "variable" : "variables"
    return new ConfigurationError(
      missing,
      `Missing required environment ${noun}: ${missing.join(", ")}`,
      error
    )
  }

  const invalid = issues.filter((issue) => !issue.missing)
  return new ConfigurationError(
    [...new Set(invalid.map((issue) => issue.key).filter((key) => key.length > 0))],
    `Invalid configuration: ${invalid
      .map((issue) => (issue.key ? `${issue.key}: ${issue.message}` : issue.message))
      .join("; ")}`,
    error
  )
}

export const loadMonitorConfig: Effect.Effect<MonitorConfig, ConfigurationError> =
  monitorConfig.pipe(Effect.mapError(toConfigurationError))

/**
 * Minimum log level from LOG_LEVEL (Info when unset)
 */
export const MonitorLoggerLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
    Effect.map(Logger.minimumLogLevel),
    Effect.mapError(toConfigurationError)
  )
)
