/**
 * Circular buffer implementation for maintaining recent logs in memory
 */

import type { LogEntry, RingBufferOptions } from '../types'

export class RingBuffer {
  private buffer: (LogEntry | undefined)[]
  private writeIndex: number = 0
  private size: number
  private count: number = 0

  constructor(options: RingBufferOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Ring buffer size must be a positive integer, got ${options.size}`)
    }
    this.size = options.size
    this.buffer = new Array<LogEntry | undefined>(this.size)
  }

  /**
   * Add a log entry to the buffer
   */
  push(entry: LogEntry): void {
    this.buffer[this.writeIndex] = entry
    this.writeIndex = (this.writeIndex + 1) % this.size
    this.count = Math.min(this.count + 1, this.size)
  }

  /**
   * Get all entries in chronological order
   */
  getAll(): LogEntry[] {
    const entries: LogEntry[] = []
    // Until the buffer wraps, the oldest entry sits at index 0
    const first = this.count < this.size ? 0 : this.writeIndex

    for (let i = 0; i < this.count; i++) {
      const entry = this.buffer[(first + i) % this.size]
      if (entry) entries.push(entry)
    }

    return entries
  }
}
