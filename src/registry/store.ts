import type { ChecksumEntry, ChecksumRecord } from './types.js'

export interface ChecksumStoreOptions {
  now?: () => number
}

/**
 * Expiring fileID -> checksum map shared by every registry connection.
 *
 * Each method runs to completion on the event loop, so register, query and
 * sweep never interleave. Expiry is lazy: a record past `expiresAt` is dropped
 * by the query that finds it, or by `sweep()` when periodic sweeping is on.
 * Nothing else bounds the map's size.
 */
export class ChecksumStore {
  private records: Map<string, ChecksumRecord> = new Map()
  private now: () => number
  private sweepTimer: ReturnType<typeof setInterval> | null = null

  constructor(options: ChecksumStoreOptions = {}) {
    this.now = options.now ?? Date.now
  }

  register(fileID: string, ttlSeconds: number, length: number, checksum: string): ChecksumRecord {
    const record: ChecksumRecord = {
      fileID,
      checksum,
      length,
      expiresAt: this.now() + ttlSeconds * 1000
    }
    this.records.set(fileID, record)
    return record
  }

  query(fileID: string): ChecksumEntry | null {
    const record = this.records.get(fileID)
    if (!record) return null

    if (this.now() > record.expiresAt) {
      this.records.delete(fileID)
      return null
    }

    return { length: record.length, checksum: record.checksum }
  }

  sweep(): number {
    const now = this.now()
    let removed = 0
    for (const [fileID, record] of this.records) {
      if (now > record.expiresAt) {
        this.records.delete(fileID)
        removed++
      }
    }
    return removed
  }

  size(): number {
    return this.records.size
  }

  startSweeping(intervalMs: number): void {
    this.stopSweeping()
    if (intervalMs <= 0) return

    this.sweepTimer = setInterval(() => {
      const removed = this.sweep()
      if (removed > 0) {
        console.log(`Registry: swept ${removed} expired checksum(s)`)
      }
    }, intervalMs)
    this.sweepTimer.unref()
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  destroy(): void {
    this.stopSweeping()
    this.records.clear()
  }
}
