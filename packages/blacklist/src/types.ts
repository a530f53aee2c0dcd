/**
 * 失効理由（閉じた列挙）
 * これ以外の値はティアへの書き込み前に拒否される。
 */
export const REVOCATION_REASONS = [
  'logout',
  'password_change',
  'security_breach',
  'admin_action',
  'session_revoked',
  'account_deleted',
  'token_refresh',
] as const

export type RevocationReason = (typeof REVOCATION_REASONS)[number]

/**
 * 失効理由として有効な値かどうかを判定する
 * @param value 検査する値
 */
export function isRevocationReason(value: unknown): value is RevocationReason {
  return typeof value === 'string' && (REVOCATION_REASONS as readonly string[]).includes(value)
}

/**
 * 監査用の付加情報
 */
export type RevocationMetadata = Record<string, string | number | boolean | null>

/**
 * トークン単位の失効レコード
 * 一度作成されたら更新されない。ティアのTTLで消滅する。
 */
export interface RevocationRecord {
  kind: 'token'
  /** JWT ID、または生トークンのハッシュ */
  identifier: string
  /** 失効理由 */
  reason: RevocationReason
  /** 失効日時 */
  revokedAt: Date
  /** 監査用のユーザーID（任意） */
  userId?: string
  /** 有効期間（秒） */
  ttl: number
}

/**
 * ユーザー単位の一括失効マーカー
 * revokedBefore より前に発行されたトークンはすべて無効。
 */
export interface UserRevocationMarker {
  kind: 'user'
  /** ユーザーID */
  userId: string
  /** この日時より前に発行されたトークンを失効とする */
  revokedBefore: Date
  /** 失効理由 */
  reason: RevocationReason
  /** 有効期間（秒） */
  ttl: number
}

export type RevocationFact = RevocationRecord | UserRevocationMarker

/**
 * ストレージティア名（速い順）
 */
export type TierName = 'hot' | 'membership' | 'durable'

/**
 * ティアごとの書き込み結果
 */
export interface TierWriteOutcome {
  tier: TierName
  ok: boolean
  error?: string
}

/**
 * revoke系操作の結果
 * ホットティアへの書き込みが成功したときだけ返される。
 */
export interface RevocationOutcome {
  /** 保存に使用したキー */
  key: string
  tiers: TierWriteOutcome[]
}

export interface RevokeOptions {
  reason?: string
  /** 有効期間（秒）。省略時はリフレッシュトークンの有効期限 */
  ttl?: number
  userId?: string
  metadata?: RevocationMetadata
}

export interface RevokeAllOptions {
  reason?: string
  metadata?: RevocationMetadata
}

export interface CheckOptions {
  /** ユーザー単位の一括失効も確認する（デフォルト: true） */
  checkUserMarker?: boolean
}

/**
 * 全ティアに到達できないときの判定方針
 * - open: 失効していないとみなす
 * - closed: 失効しているとみなす
 */
export type FailurePolicy = 'open' | 'closed'

/**
 * 失効チェックでヒットした場所
 */
export type CheckSource = TierName | 'user_marker' | 'miss' | 'degraded'

export interface BlacklistStats {
  revocationCount: number
  uptimeSeconds: number
  membershipTierSize: number
  lastCleanup: Date | null
  startedAt: Date
}

export interface CleanupResult {
  removed: number
  ranAt: Date
}
