/**
 * Render Cache - LRU cache of rendered content keyed by fingerprint and width
 */
import { DEFAULT_CACHE_SIZE } from '../core/config'
import type { Fingerprint } from '../effect/types'
import type { RenderedContent } from './types'

interface CacheEntry {
  rendered: RenderedContent
  formatId: string
}

export interface CacheStats {
  entryCount: number
  maxEntries: number
  hitCount: number
  missCount: number
}

const keyOf = (fingerprint: Fingerprint, width: number) => `${fingerprint}@${width}`

/**
 * RenderCache maps (fingerprint, terminal width) to a rendering and the
 * format it was rendered as.
 * Map insertion order is the recency order: a hit moves the entry to the back,
 * eviction takes from the front.
 */
export class RenderCache {
  private cache = new Map<string, CacheEntry>()
  private maxSize: number
  private hitCount = 0
  private missCount = 0

  constructor(maxSize = DEFAULT_CACHE_SIZE) {
    this.maxSize = Math.max(1, maxSize)
  }

  /** A rendering made as another format counts as a miss */
  get(fingerprint: Fingerprint, width: number, formatId: string): RenderedContent | null {
    const key = keyOf(fingerprint, width)
    const entry = this.cache.get(key)
    if (!entry || entry.formatId !== formatId) {
      this.missCount++
      return null
    }
    this.hitCount++
    this.cache.delete(key)
    this.cache.set(key, entry)
    return entry.rendered
  }

  put(
    fingerprint: Fingerprint,
    width: number,
    formatId: string,
    rendered: RenderedContent
  ): void {
    const key = keyOf(fingerprint, width)
    this.cache.delete(key)
    this.cache.set(key, { rendered, formatId })
    this.prune()
  }

  /** Drop every width's rendering of a fingerprint */
  invalidate(fingerprint: Fingerprint): void {
    const prefix = `${fingerprint}@`
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key)
      }
    }
  }

  clear(): void {
    this.cache.clear()
    this.hitCount = 0
    this.missCount = 0
  }

  get size(): number {
    return this.cache.size
  }

  stats(): CacheStats {
    return {
      entryCount: this.cache.size,
      maxEntries: this.maxSize,
      hitCount: this.hitCount,
      missCount: this.missCount,
    }
  }

  private prune(): void {
    if (this.cache.size > this.maxSize) {
      const excess = this.cache.size - this.maxSize
      const iterator = this.cache.keys()
      for (let i = 0; i < excess; i++) {
        const key = iterator.next().value
        if (key !== undefined) {
          this.cache.delete(key)
        }
      }
    }
  }
}
