/**
 * Logs command - print the tail of the activity log, optionally following it
 */
import { existsSync } from 'node:fs'
import { defineCommand } from 'citty'
import { ErrorCodes } from '../types'
import { error, getOutputFormat, info, success } from '../utils/output'
import { followFile, readLastLines } from '../utils/tail'
import { loadCliConfig } from './shared'

function parseLineCount(value: string): number {
  const lines = Number(value)
  if (!Number.isInteger(lines) || lines < 0) {
    return error(
      ErrorCodes.INVALID_ARGS,
      `Invalid --lines: "${value}" (expected a non-negative integer)`,
    )
  }
  return lines
}

export const logsCommand = defineCommand({
  meta: {
    name: 'logs',
    description: 'Show the daemon activity log',
  },
  args: {
    lines: {
      type: 'string',
      alias: 'n',
      description: 'Number of lines to show',
      default: '50',
    },
    follow: {
      type: 'boolean',
      description: 'Keep printing new lines until interrupted (--no-follow to exit)',
      default: true,
    },
  },
  async run({ args }) {
    const count = parseLineCount(args.lines)
    const config = loadCliConfig()
    const path = config.logPath

    if (!existsSync(path)) {
      return success(
        { path, lines: [] },
        `No activity log yet at ${path}; start the daemon first`,
      )
    }

    const tail = await readLastLines(path, count)

    // JSON output is a single document, so it never follows
    if (getOutputFormat() === 'json' || !args.follow) {
      return success({ path, lines: tail.lines }, tail.lines.join('\n'))
    }

    for (const line of tail.lines) console.log(line)
    info(`--- following ${path} (Ctrl+C to stop) ---`)

    const controller = new AbortController()
    const onSignal = () => controller.abort()
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
    try {
      await followFile(path, (line) => console.log(line), {
        offset: tail.size,
        signal: controller.signal,
      })
    } finally {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
    }
  },
})
