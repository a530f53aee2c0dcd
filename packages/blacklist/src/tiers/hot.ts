/**
 * ホットティア
 * プロセス内のTTL付きキャッシュ。再起動で失われる。
 */
import { RevocationFact } from '../types.js'
import { StorageTier, globToRegExp } from './tier.js'

interface HotEntry {
  value: RevocationFact
  expiresAt: number // ミリ秒
}

export interface HotTierConfig {
  /** 最大保持件数。超えた場合は最も古いエントリから破棄する */
  maxEntries: number
}

export class HotTier implements StorageTier<RevocationFact> {
  readonly name = 'hot' as const
  private entries = new Map<string, HotEntry>()

  constructor(private config: HotTierConfig = { maxEntries: 10000 }) {}

  async get(key: string): Promise<RevocationFact | null> {
    const entry = this.entries.get(key)
    if (!entry) return null

    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key)
      return null
    }
    return entry.value
  }

  async put(key: string, value: RevocationFact, ttlSeconds: number): Promise<void> {
    // 上書き時は挿入順を更新する
    this.entries.delete(key)

    if (this.entries.size >= this.config.maxEntries) {
      this.evictExpired()
    }
    while (this.entries.size >= this.config.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }

    this.entries.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 })
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key)
  }

  async deleteMatching(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern)
    let count = 0
    for (const key of this.entries.keys()) {
      if (regex.test(key)) {
        this.entries.delete(key)
        count++
      }
    }
    return count
  }

  /**
   * 保持件数（期限切れを含む）
   */
  size(): number {
    return this.entries.size
  }

  /**
   * キャッシュを空にする
   */
  clear(): void {
    this.entries.clear()
  }

  private evictExpired(): void {
    const now = Date.now()
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
      }
    }
  }
}
