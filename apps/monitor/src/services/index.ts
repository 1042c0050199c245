/**
 * Effect services for the speed test monitor.
 *
 * This module exports all service layers that can be composed
 * together for dependency injection using Effect's Layer system.
 */

export * from "./SpeedtestEngine.js"
export * from "./SpeedtestRepository.js"
export * from "./SpeedtestService.js"
export * from "./SchedulerService.js"
