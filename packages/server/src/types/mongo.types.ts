import { AuditAction, RevocationMetadata, RevocationReason } from 'token-blacklist'

/**
 * 監査ログのドキュメント定義
 * 失効操作の記録。保存期間を過ぎるとTTLインデックスで削除される。
 */
export interface AuditLogDocument {
  /** 操作種別 */
  action: AuditAction
  /** 対象ユーザーID */
  user_id: string
  /** 失効理由 */
  reason: RevocationReason
  /** 付加情報（IPアドレス、操作者など） */
  metadata: RevocationMetadata
  /** 操作日時 */
  created_at: Date
  /** 有効期限 */
  expires_at: Date
}
