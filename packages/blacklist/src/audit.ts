/**
 * 監査ログの出力先
 * 失効処理は監査の失敗を呼び出し元に伝えない。
 */
import { RevocationMetadata, RevocationReason } from './types.js'

export type AuditAction = 'token_revoked' | 'mass_token_revocation'

export interface AuditEvent {
  action: AuditAction
  userId: string
  reason: RevocationReason
  metadata: RevocationMetadata
  timestamp: Date
}

export interface AuditSink {
  log(event: AuditEvent): Promise<void>
}

/**
 * 何も記録しない監査先（監査ストアを持たない構成用）
 */
export const noopAuditSink: AuditSink = {
  async log(): Promise<void> {},
}
