/**
 * Reading the end of an append-only text file, and following it as it grows
 */
import { open, stat } from 'node:fs/promises'
import { waitFor } from '../daemon/daemon-utils'

const CHUNK_SIZE = 64 * 1024
const NEWLINE = 0x0a

export interface TailResult {
  lines: string[]
  /** Byte offset just past the data that was read */
  size: number
}

/**
 * Read the last `count` lines of a file, scanning backwards in chunks
 */
export async function readLastLines(path: string, count: number): Promise<TailResult> {
  const handle = await open(path, 'r')
  try {
    const { size } = await handle.stat()
    if (count <= 0 || size === 0) return { lines: [], size }

    let position = size
    const chunks: Buffer[] = []
    let newlines = 0
    while (position > 0 && newlines <= count) {
      const length = Math.min(CHUNK_SIZE, position)
      position -= length
      const buffer = Buffer.alloc(length)
      await handle.read(buffer, 0, length, position)
      for (const byte of buffer) {
        if (byte === NEWLINE) newlines++
      }
      chunks.unshift(buffer)
    }

    // Decode once so multi-byte characters split across chunks stay intact
    const lines = Buffer.concat(chunks).toString('utf-8').split('\n')
    if (lines[lines.length - 1] === '') lines.pop()
    return { lines: lines.slice(-count), size }
  } finally {
    await handle.close()
  }
}

export interface FollowOptions {
  /** Offset to start from, usually TailResult.size */
  offset: number
  signal: AbortSignal
  pollMs?: number
}

/**
 * Poll the file for appended data and emit complete lines until the signal aborts.
 * A file that shrinks is treated as rotated and read again from the start.
 */
export async function followFile(
  path: string,
  onLine: (line: string) => void,
  options: FollowOptions,
): Promise<void> {
  const pollMs = options.pollMs ?? 500
  let offset = options.offset
  let pending = ''

  while (!options.signal.aborted) {
    const { size } = await stat(path)
    if (size < offset) {
      offset = 0
      pending = ''
    }

    if (size > offset) {
      const handle = await open(path, 'r')
      try {
        const buffer = Buffer.alloc(size - offset)
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, offset)
        offset += bytesRead
        pending += buffer.toString('utf-8', 0, bytesRead)
      } finally {
        await handle.close()
      }

      const lines = pending.split('\n')
      pending = lines.pop() ?? ''
      for (const line of lines) onLine(line)
    }

    await waitFor(pollMs, options.signal)
  }
}
