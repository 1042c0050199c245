/**
 * PostgreSQL schema for speed test history.
 *
 * Every statement is guarded with IF NOT EXISTS so it can run on each startup.
 */

const createTable = `
CREATE TABLE IF NOT EXISTS speed_tests (
  id SERIAL PRIMARY KEY,
  timestamp TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
  download_mbps NUMERIC(10,2) NOT NULL,
  upload_mbps NUMERIC(10,2) NOT NULL,
  ping_ms NUMERIC(10,2) NOT NULL,
  server_name VARCHAR(255),
  server_location VARCHAR(255),
  server_sponsor VARCHAR(255)
)`

// Time-range queries (Grafana panels read newest first)
const createTimestampIndex =
  "CREATE INDEX IF NOT EXISTS idx_speed_tests_timestamp ON speed_tests (timestamp DESC)"

export const SCHEMA_STATEMENTS: readonly string[] = [createTable.trim(), createTimestampIndex]
