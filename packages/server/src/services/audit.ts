/**
 * 失効操作の監査ログをMongoDBに記録する
 */
import { AuditEvent, AuditSink } from 'token-blacklist'
import { insertAuditLog } from '../db/mongo.js'

export const mongoAuditSink: AuditSink = {
  async log(event: AuditEvent): Promise<void> {
    await insertAuditLog({
      action: event.action,
      user_id: event.userId,
      reason: event.reason,
      metadata: event.metadata,
      created_at: event.timestamp,
    })
  },
}
