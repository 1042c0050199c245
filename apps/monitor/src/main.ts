/**
 * Speedwatch - periodic internet speed test monitor.
 *
 * Loads configuration, connects to PostgreSQL, ensures the schema, then runs a speed
 * test immediately and every TEST_INTERVAL minutes, writing each result to the
 * speed_tests table.
 *
 * Run with: npm start (after npm run build)
 * Pass --once to run a single cycle and exit.
 */

import { NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { MonitorLoggerLive } from "./config/MonitorConfig.js"
import { program, reportFatal } from "./program.js"

const main = program({ once: process.argv.includes("--once") }).pipe(
  Effect.provide(MonitorLoggerLive),
  reportFatal
)

// SIGINT/SIGTERM interrupt the main fiber: layers release the database connection and the
// process exits 0. Startup failures exit 1 after the FATAL ERROR line.
NodeRuntime.runMain(main, { disableErrorReporting: true })
