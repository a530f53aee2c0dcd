/**
 * メンバーシップティア
 *
 * トークン単位の失効を {キー, 失効期限(UNIX秒)} で保持する厳密な期限付き集合。
 * 登録済みかつ期限内のキーは必ず見つかる（偽陰性なし）。
 * 期限切れのエントリは読み取り時か CleanupWorker の一括掃除で削除される。
 */
import { RevocationRecord } from '../types.js'
import { nowInSeconds } from '../utils/time.js'
import { SweepableTier, globToRegExp } from './tier.js'

export interface MembershipEntry {
  key: string
  expiresAtEpochSeconds: number
  /** ヒット時に上位ティアへ昇格させるためのレコード */
  record: RevocationRecord
}

export class MembershipTier implements SweepableTier<RevocationRecord> {
  readonly name = 'membership' as const
  private entries = new Map<string, MembershipEntry>()

  async get(key: string): Promise<RevocationRecord | null> {
    const entry = this.entries.get(key)
    if (!entry) return null

    if (nowInSeconds() >= entry.expiresAtEpochSeconds) {
      this.entries.delete(key)
      return null
    }
    return entry.record
  }

  async put(key: string, record: RevocationRecord, ttlSeconds: number): Promise<void> {
    this.insert({
      key,
      expiresAtEpochSeconds: nowInSeconds() + ttlSeconds,
      record,
    })
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key)
  }

  async deleteMatching(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern)
    const keys = [...this.entries.keys()].filter((key) => regex.test(key))
    for (const key of keys) {
      this.entries.delete(key)
    }
    return keys.length
  }

  /**
   * エントリをそのまま登録する（運用ツール・テスト用）
   */
  insert(entry: MembershipEntry): void {
    this.entries.set(entry.key, entry)
  }

  size(): number {
    return this.entries.size
  }

  sweepExpired(nowMs: number = Date.now()): number {
    const now = nowInSeconds(nowMs)
    const expired = [...this.entries.values()]
      .filter((entry) => entry.expiresAtEpochSeconds <= now)
      .map((entry) => entry.key)

    for (const key of expired) {
      this.entries.delete(key)
    }
    return expired.length
  }
}
