/**
 * SchedulerService - Effect-based speed test cycle scheduler.
 *
 * Provides:
 * - One cycle immediately at startup, then one every interval
 * - A short polling tick so shutdown is observed between cycles
 * - Cycle outcomes as values (a failed cycle never fails the loop)
 * - Statistics tracking (cycles completed/failed, last and next run time)
 */

import { Clock, Context, Duration, Effect, Either, Layer, Ref } from "effect"
import { MonitorConfigService } from "../config/MonitorConfig.js"
import type { MeasurementRecord } from "../schema/SpeedTest.js"
import { SpeedtestError } from "./SpeedtestEngine.js"
import { SpeedtestRepository, type RepositoryError } from "./SpeedtestRepository.js"
import { SpeedtestService } from "./SpeedtestService.js"

// ============================================
// Types
// ============================================

export interface SchedulerConfig {
  readonly intervalMinutes: number
  readonly tickSeconds: number
  readonly failureWarnThreshold: number
}

export type SchedulerState = "idle" | "running_cycle" | "shutting_down"

export type CycleOutcome =
  | { readonly _tag: "Recorded"; readonly id: number; readonly record: MeasurementRecord }
  | { readonly _tag: "MeasurementFailed"; readonly error: SpeedtestError }
  | {
      readonly _tag: "WriteFailed"
      readonly record: MeasurementRecord
      readonly error: RepositoryError
    }

export interface SchedulerStats {
  readonly state: SchedulerState
  readonly cycles_completed: number
  readonly cycles_failed: number
  readonly consecutive_failures: number
  readonly last_cycle_time: string | null
  readonly next_cycle_time: string | null
}

// ============================================
// Schedule (due-time tracking)
// ============================================

export interface CycleSchedule {
  readonly intervalMillis: number
  /** null until the first cycle has run, which makes the first tick due */
  readonly nextDueAt: number | null
}

export const initialSchedule = (intervalMinutes: number): CycleSchedule => ({
  intervalMillis: Duration.toMillis(Duration.minutes(intervalMinutes)),
  nextDueAt: null,
})

export const isDue = (schedule: CycleSchedule, now: number): boolean =>
  schedule.nextDueAt === null || now >= schedule.nextDueAt

export const armAfterCycle = (schedule: CycleSchedule, finishedAt: number): CycleSchedule => ({
  ...schedule,
  nextDueAt: finishedAt + schedule.intervalMillis,
})

// ============================================
// Service Interface
// ============================================

export interface SchedulerServiceShape {
  /**
   * Run one measure-and-store cycle. Failures are logged and returned, never raised.
   */
  readonly runCycle: Effect.Effect<CycleOutcome>

  /**
   * Evaluate the schedule once, running a cycle when one is due
   */
  readonly tick: Effect.Effect<boolean>

  /**
   * Run a cycle now, then tick forever. Interrupting it shuts the scheduler down.
   */
  readonly run: Effect.Effect<never>

  /**
   * Get scheduler statistics
   */
  readonly getStats: Effect.Effect<SchedulerStats>
}

export class SchedulerService extends Context.Tag("SchedulerService")<
  SchedulerService,
  SchedulerServiceShape
>() {}

// ============================================
// Live Implementation
// ============================================

export const SchedulerServiceLive = Layer.effect(
  SchedulerService,
  Effect.gen(function* () {
    const speedtestService = yield* SpeedtestService
    const repository = yield* SpeedtestRepository
    const monitorConfig = yield* MonitorConfigService

    const config: SchedulerConfig = {
      intervalMinutes: monitorConfig.testIntervalMinutes,
      tickSeconds: monitorConfig.tickSeconds,
      failureWarnThreshold: monitorConfig.failureWarnThreshold,
    }

    // State
    const stateRef = yield* Ref.make<SchedulerState>("idle")
    const scheduleRef = yield* Ref.make<CycleSchedule>(initialSchedule(config.intervalMinutes))
    const cyclesCompletedRef = yield* Ref.make(0)
    const cyclesFailedRef = yield* Ref.make(0)
    const consecutiveFailuresRef = yield* Ref.make(0)
    const lastCycleTimeRef = yield* Ref.make<number | null>(null)

    /**
     * Log a cycle outcome and update stats
     */
    const handleOutcome = (outcome: CycleOutcome) =>
      Effect.gen(function* () {
        switch (outcome._tag) {
          case "Recorded":
            yield* Ref.update(cyclesCompletedRef, (n) => n + 1)
            yield* Ref.set(consecutiveFailuresRef, 0)
            yield* Effect.logInfo(`Data written to PostgreSQL successfully (id ${outcome.id})`)
            return
          case "MeasurementFailed":
            yield* Effect.logError(
              `Speed test failed: ${outcome.error.message} (error type: ${outcome.error.type})`
            )
            break
          case "WriteFailed":
            yield* Effect.logError(
              `Failed to write result to PostgreSQL: ${outcome.error.message}`
            )
            break
        }

        yield* Ref.update(cyclesFailedRef, (n) => n + 1)
        const consecutive = yield* Ref.updateAndGet(consecutiveFailuresRef, (n) => n + 1)
        if (consecutive % config.failureWarnThreshold === 0) {
          yield* Effect.logWarning(
            `Scheduler: ${consecutive} consecutive cycles failed; still retrying every ${config.intervalMinutes} minutes`
          )
        }
      })

    const measure = speedtestService.measure.pipe(
      Effect.catchAllDefect((defect) =>
        Effect.fail(new SpeedtestError("unexpected", String(defect), defect))
      )
    )

    const runCycle: Effect.Effect<CycleOutcome> = Effect.gen(function* () {
      yield* Ref.set(stateRef, "running_cycle")
      const startedAt = yield* Clock.currentTimeMillis
      yield* Effect.logInfo(`Running speed test at ${new Date(startedAt).toISOString()}`)

      const measured = yield* Effect.either(measure)
      let outcome: CycleOutcome
      if (Either.isLeft(measured)) {
        outcome = { _tag: "MeasurementFailed", error: measured.left }
      } else {
        const written = yield* Effect.either(repository.insert(measured.right))
        outcome = Either.isLeft(written)
          ? { _tag: "WriteFailed", record: measured.right, error: written.left }
          : { _tag: "Recorded", id: written.right, record: measured.right }
      }

      yield* handleOutcome(outcome)

      const finishedAt = yield* Clock.currentTimeMillis
      yield* Ref.set(lastCycleTimeRef, finishedAt)
      const schedule = yield* Ref.updateAndGet(scheduleRef, (s) => armAfterCycle(s, finishedAt))
      yield* Ref.set(stateRef, "idle")
      if (schedule.nextDueAt !== null) {
        yield* Effect.logInfo(
          `Scheduler: Next test at ${new Date(schedule.nextDueAt).toISOString()}`
        )
      }
      return outcome
    })

    const tick = Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis
      const schedule = yield* Ref.get(scheduleRef)
      if (!isDue(schedule, now)) {
        return false
      }
      yield* runCycle
      return true
    })

    const getStats = Effect.gen(function* () {
      const schedule = yield* Ref.get(scheduleRef)
      const lastCycleTime = yield* Ref.get(lastCycleTimeRef)
      return {
        state: yield* Ref.get(stateRef),
        cycles_completed: yield* Ref.get(cyclesCompletedRef),
        cycles_failed: yield* Ref.get(cyclesFailedRef),
        consecutive_failures: yield* Ref.get(consecutiveFailuresRef),
        last_cycle_time: lastCycleTime === null ? null : new Date(lastCycleTime).toISOString(),
        next_cycle_time:
          schedule.nextDueAt === null ? null : new Date(schedule.nextDueAt).toISOString(),
      }
    })

    const run = Effect.gen(function* () {
      yield* Effect.logInfo(
        `Scheduler: Starting (every ${config.intervalMinutes} minutes, checking every ${config.tickSeconds}s)`
      )
      yield* runCycle
      return yield* Effect.sleep(Duration.seconds(config.tickSeconds)).pipe(
        Effect.zipRight(tick),
        Effect.forever
      )
    }).pipe(
      Effect.onInterrupt(() =>
        Effect.gen(function* () {
          yield* Ref.set(stateRef, "shutting_down")
          yield* Effect.logInfo("Shutting down gracefully...")
          const stats = yield* getStats
          yield* Effect.logInfo(
            `Scheduler stats: ${stats.cycles_completed} cycles completed, ${stats.cycles_failed} failed`
          )
        })
      )
    )

    const impl: SchedulerServiceShape = { runCycle, tick, run, getStats }
    return impl
  })
)
