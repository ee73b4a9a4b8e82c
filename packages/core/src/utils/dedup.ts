/**
 * Redelivery filter for chat messages: remembers message keys for a while
 * and reports repeats. Bounded; the oldest key is evicted first.
 */

export interface DedupOptions {
  maxEntries?: number
  ttlMs?: number
  now?: () => number
}

export class DedupCache {
  private readonly seen = new Map<string, number>()
  private readonly maxEntries: number
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(options: DedupOptions = {}) {
    this.maxEntries = options.maxEntries ?? 2000
    this.ttlMs = options.ttlMs ?? 10 * 60_000
    this.now = options.now ?? Date.now
  }

  /** True when `key` was seen within the TTL; otherwise records it */
  isDuplicate(key: string): boolean {
    const now = this.now()
    const seenAt = this.seen.get(key)
    if (seenAt !== undefined && now - seenAt < this.ttlMs) return true
    this.seen.delete(key)

    if (this.seen.size >= this.maxEntries) {
      for (const [k, at] of this.seen) {
        if (now - at >= this.ttlMs) this.seen.delete(k)
      }
    }
    while (this.seen.size >= this.maxEntries) {
      const oldest = this.seen.keys().next()
      if (oldest.done) break
      this.seen.delete(oldest.value)
    }

    this.seen.set(key, now)
    return false
  }

  get size(): number {
    return this.seen.size
  }
}
