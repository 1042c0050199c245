/**
 * SpeedtestEngine - the external speed measurement capability.
 *
 * A session mirrors one speedtest.net run: refresh the server list, pick the best
 * server, then download and upload against it. The live engine drives the
 * `speedtest-cli` command line tool, one process per step.
 */

import { Context, Effect, Layer, Ref, Schema } from "effect"
import * as ChildProcess from "node:child_process"
import { MonitorConfigService } from "../config/MonitorConfig.js"
import { CliResult } from "../schema/SpeedTest.js"

// ============================================
// Types
// ============================================

export interface TestServer {
  readonly id: string
  readonly name: string
  readonly country: string
  readonly sponsor: string
  readonly host: string | null
}

export interface BestServer {
  /** null when the capability reports no server metadata */
  readonly server: TestServer | null
  readonly latencyMs: number
}

export interface ListedServer {
  readonly id: string
  readonly sponsor: string
  readonly name: string
  readonly country: string
  readonly distanceKm: number
}

export interface SpeedtestSession {
  /** Refresh candidate servers, returning how many were found */
  readonly refreshServers: Effect.Effect<number, SpeedtestError>
  readonly selectBestServer: Effect.Effect<BestServer, SpeedtestError>
  /** Download throughput in bits per second */
  readonly download: Effect.Effect<number, SpeedtestError>
  /** Upload throughput in bits per second */
  readonly upload: Effect.Effect<number, SpeedtestError>
}

export interface SpeedtestEngineShape {
  /**
   * Initialize a fresh session for one cycle
   */
  readonly open: Effect.Effect<SpeedtestSession, SpeedtestError>
}

export interface CliOptions {
  readonly command: string
  readonly timeoutSeconds: number
  readonly secure: boolean
}

// ============================================
// Error Types
// ============================================

export type SpeedtestStep =
  | "init"
  | "config"
  | "server_list"
  | "best_server"
  | "download"
  | "upload"
  | "result"
  | "unexpected"

export class SpeedtestError {
  readonly _tag = "SpeedtestError"
  constructor(
    readonly type: SpeedtestStep,
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// Service Tag
// ============================================

export class SpeedtestEngine extends Context.Tag("SpeedtestEngine")<
  SpeedtestEngine,
  SpeedtestEngineShape
>() {}

// ============================================
// Helper Functions
// ============================================

export interface CommandOutput {
  readonly stdout: string
  readonly stderr: string
  readonly code: number
}

/**
 * Run a command and return stdout/stderr. The process is killed on timeout and when
 * the calling fiber is interrupted.
 */
const runCommand = (
  step: SpeedtestStep,
  command: string,
  args: readonly string[],
  timeoutSeconds: number
): Effect.Effect<CommandOutput, SpeedtestError> =>
  Effect.async<CommandOutput, SpeedtestError>((resume) => {
    const proc = ChildProcess.spawn(command, args, { windowsHide: true })

    let stdout = ""
    let stderr = ""
    let settled = false

    const settle = (effect: Effect.Effect<CommandOutput, SpeedtestError>) => {
      if (!settled) {
        settled = true
        clearTimeout(timeoutId)
        resume(effect)
      }
    }

    // Manual timeout handling (spawn doesn't support timeout option)
    const timeoutId = setTimeout(() => {
      proc.kill("SIGTERM")
      settle(
        Effect.fail(new SpeedtestError(step, `${command} timed out after ${timeoutSeconds}s`))
      )
    }, timeoutSeconds * 1000)

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on("close", (code) => {
      settle(Effect.succeed({ stdout, stderr, code: code ?? 1 }))
    })

    proc.on("error", (err: NodeJS.ErrnoException) => {
      const message =
        err.code === "ENOENT" ? `${command} not found on PATH` : `${command}: ${err.message}`
      settle(Effect.fail(new SpeedtestError(step, message, err)))
    })

    return Effect.sync(() => {
      settled = true
      clearTimeout(timeoutId)
      proc.kill("SIGTERM")
    })
  })

const CONFIG_RETRIEVAL_PATTERN = /retrieve speedtest configuration/i

/**
 * Turn a non-zero exit into a SpeedtestError for the step that ran
 */
export const commandFailure = (step: SpeedtestStep, output: CommandOutput): SpeedtestError => {
  const detail = (output.stderr.trim() || output.stdout.trim()).split("\n").at(-1) ?? ""
  const reason = detail || `exit code ${output.code}`

  if (CONFIG_RETRIEVAL_PATTERN.test(output.stderr) || CONFIG_RETRIEVAL_PATTERN.test(output.stdout)) {
    return new SpeedtestError("config", `Failed to retrieve speed test configuration: ${reason}`)
  }
  return new SpeedtestError(step, reason)
}

/**
 * Decode the JSON printed by `speedtest-cli --json`
 */
export const decodeCliResult = (
  step: SpeedtestStep,
  stdout: string
): Effect.Effect<CliResult, SpeedtestError> =>
  Schema.decodeUnknown(Schema.parseJson(CliResult))(stdout.trim()).pipe(
    Effect.mapError(
      (e) => new SpeedtestError(step, `Unexpected speedtest-cli output: ${e.message}`, e)
    )
  )

// "  1234) Example ISP (New York, NY, United States) [12.34 km]"
const SERVER_LINE = /^\s*(\d+)\)\s+(.+?)\s+\((.+),\s*([^,()]+)\)\s+\[([\d.]+)\s*km\]\s*$/

/**
 * Parse the server table printed by `speedtest-cli --list`
 */
export const parseServerList = (stdout: string): ListedServer[] =>
  stdout.split("\n").flatMap((line) => {
    const match = SERVER_LINE.exec(line)
    if (match === null) return []
    const [, id = "", sponsor = "", name = "", country = "", distance = "0"] = match
    return [{ id, sponsor, name: name.trim(), country: country.trim(), distanceKm: parseFloat(distance) }]
  })

const toTestServer = (result: CliResult): TestServer | null =>
  result.server === undefined
    ? null
    : {
        id: String(result.server.id),
        name: result.server.name,
        country: result.server.country,
        sponsor: result.server.sponsor,
        host: result.server.host ?? null,
      }

// ============================================
// Live Implementation
// ============================================

/**
 * Session over the speedtest-cli tool. The best server chosen by selectBestServer is
 * pinned for the throughput tests.
 */
export const makeCliSession = (options: CliOptions): Effect.Effect<SpeedtestSession> =>
  Effect.gen(function* () {
    const serverRef = yield* Ref.make<TestServer | null>(null)
    const baseArgs = options.secure ? ["--secure"] : []

    const run = (step: SpeedtestStep, args: readonly string[]) =>
      runCommand(step, options.command, [...baseArgs, ...args], options.timeoutSeconds).pipe(
        Effect.filterOrFail(
          (output) => output.code === 0,
          (output) => commandFailure(step, output)
        )
      )

    const runJson = (step: SpeedtestStep, args: readonly string[]) =>
      run(step, ["--json", ...args]).pipe(
        Effect.flatMap((output) => decodeCliResult(step, output.stdout))
      )

    const pinnedServerArgs = Ref.get(serverRef).pipe(
      Effect.map((server) => (server === null ? [] : ["--server", server.id]))
    )

    const session: SpeedtestSession = {
      refreshServers: run("server_list", ["--list"]).pipe(
        Effect.map((output) => parseServerList(output.stdout).length)
      ),

      selectBestServer: runJson("best_server", ["--no-download", "--no-upload"]).pipe(
        Effect.map((result) => ({ server: toTestServer(result), latencyMs: result.ping })),
        Effect.tap((best) => Ref.set(serverRef, best.server))
      ),

      download: pinnedServerArgs.pipe(
        Effect.flatMap((serverArgs) => runJson("download", ["--no-upload", ...serverArgs])),
        Effect.map((result) => result.download)
      ),

      upload: pinnedServerArgs.pipe(
        Effect.flatMap((serverArgs) => runJson("upload", ["--no-download", ...serverArgs])),
        Effect.map((result) => result.upload)
      ),
    }

    return session
  })

export const SpeedtestEngineLive = Layer.effect(
  SpeedtestEngine,
  Effect.gen(function* () {
    const config = yield* MonitorConfigService
    const options: CliOptions = {
      command: config.speedtestCommand,
      timeoutSeconds: config.speedtestTimeoutSeconds,
      secure: config.speedtestSecure,
    }

    return {
      open: runCommand("init", options.command, ["--version"], 10).pipe(
        Effect.filterOrFail(
          (output) => output.code === 0,
          (output) => commandFailure("init", output)
        ),
        Effect.tap((output) =>
          Effect.logDebug(`Speedtest tool: ${output.stdout.split("\n")[0]?.trim() ?? options.command}`)
        ),
        Effect.flatMap(() => makeCliSession(options))
      ),
    }
  })
)
