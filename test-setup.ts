/**
 * Test setup file for Vitest
 * Loaded before every test file so nothing touches the real data directory
 */

import { mkdirSync } from 'node:fs'
import { join } from 'node:path'

process.env.NODE_ENV = 'test'

if (!process.env.LOGSYNC_DATA_DIR) {
  const testDataDir = join(process.cwd(), '.tmp', `test-data-${process.pid}`)
  process.env.LOGSYNC_DATA_DIR = testDataDir
  mkdirSync(testDataDir, { recursive: true })
}

// Environment overrides would leak into config tests
delete process.env.LOGSYNC_CONFIG
delete process.env.LOGSYNC_REMOTE_HOST
delete process.env.LOGSYNC_SSH_KEY
delete process.env.LOGSYNC_INTERVAL
