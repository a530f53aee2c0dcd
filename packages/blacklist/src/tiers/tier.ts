/**
 * ストレージティアの共通インターフェース
 * 実装: ホットキャッシュ、メンバーシップ集合、Redis
 */
import { TierTimeoutError } from '../errors.js'
import { TierName } from '../types.js'

export interface StorageTier<V> {
  readonly name: TierName
  /** キーの値を取得する。存在しない・期限切れの場合は null */
  get(key: string): Promise<V | null>
  /** TTL（秒）付きで値を保存する */
  put(key: string, value: V, ttlSeconds: number): Promise<void>
  /** キーを削除する */
  delete(key: string): Promise<void>
  /** globパターン（例: "user:*"）に一致するキーを削除し、削除件数を返す */
  deleteMatching(pattern: string): Promise<number>
}

/**
 * 期限切れエントリの一括削除に対応したティア
 */
export interface SweepableTier<V> extends StorageTier<V> {
  /** 現在保持しているエントリ数（期限切れを含む） */
  size(): number
  /** 期限切れのエントリを削除し、削除件数を返す */
  sweepExpired(nowMs?: number): number
}

/**
 * globパターンを正規表現に変換する
 * @param pattern `*` と `?` を含むパターン
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.')
  return new RegExp(`^${source}$`)
}

/**
 * ティア操作にタイムアウトを付ける
 * @param tier ティア名
 * @param timeoutMs タイムアウト（ミリ秒）。0以下なら無制限
 * @param operation 実行する操作
 */
export async function withTimeout<T>(
  tier: TierName,
  timeoutMs: number,
  operation: () => Promise<T>,
): Promise<T> {
  if (timeoutMs <= 0) return operation()

  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TierTimeoutError(tier, timeoutMs)), timeoutMs)
  })

  try {
    return await Promise.race([operation(), timeout])
  } finally {
    clearTimeout(timer)
  }
}
