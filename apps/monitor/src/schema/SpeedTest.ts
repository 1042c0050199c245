/**
 * Effect Schema definitions for speed test records.
 */

import { Schema } from "effect"

// PostgreSQL hands NUMERIC columns back as strings
const Numeric = Schema.Union(Schema.Number, Schema.NumberFromString)

const NonNegativeNumber = Schema.Number.pipe(Schema.finite(), Schema.nonNegative())

// ============================================
// Measurement Record (insert)
// ============================================

export const MeasurementRecord = Schema.Struct({
  download_mbps: NonNegativeNumber,
  upload_mbps: NonNegativeNumber,
  ping_ms: NonNegativeNumber,
  server_name: Schema.NullOr(Schema.String),
  server_location: Schema.NullOr(Schema.String),
  server_sponsor: Schema.NullOr(Schema.String),
})

export type MeasurementRecord = typeof MeasurementRecord.Type

// ============================================
// Stored Measurement (DB row)
// ============================================

export const StoredMeasurement = Schema.Struct({
  id: Schema.Number,
  timestamp: Schema.DateFromSelf,
  download_mbps: Numeric,
  upload_mbps: Numeric,
  ping_ms: Numeric,
  server_name: Schema.NullOr(Schema.String),
  server_location: Schema.NullOr(Schema.String),
  server_sponsor: Schema.NullOr(Schema.String),
})

export type StoredMeasurement = typeof StoredMeasurement.Type

// ============================================
// History Summary
// ============================================

export const MeasurementSummary = Schema.Struct({
  // COUNT(*) is a bigint, returned as a string
  total: Numeric,
  first_test: Schema.NullOr(Schema.DateFromSelf),
  last_test: Schema.NullOr(Schema.DateFromSelf),
})

export type MeasurementSummary = typeof MeasurementSummary.Type

// ============================================
// speedtest-cli JSON output
// ============================================

/**
 * `server` object printed by `speedtest-cli --json`. The tool prints the id as a string,
 * older builds as a number.
 */
export const CliServer = Schema.Struct({
  id: Schema.Union(Schema.String, Schema.Number),
  name: Schema.String,
  country: Schema.String,
  sponsor: Schema.String,
  host: Schema.optional(Schema.String),
})

export type CliServer = typeof CliServer.Type

/**
 * Top-level `speedtest-cli --json` result; download/upload are bits per second and are 0
 * for a skipped test.
 */
export const CliResult = Schema.Struct({
  download: Schema.Number,
  upload: Schema.Number,
  ping: Schema.Number,
  server: Schema.optional(CliServer),
})

export type CliResult = typeof CliResult.Type
