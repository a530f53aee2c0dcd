import { Collection, Db, MongoClient } from 'mongodb'
import { errorMessage, parseTimeToSeconds } from 'token-blacklist'
import { AuditLogDocument } from '../types/mongo.types.js'
import logger from '../utils/logger.js'

/**
 * 監査ログの保存期間（秒）
 */
const AUDIT_LOG_RETENTION = parseTimeToSeconds(process.env.AUDIT_LOG_RETENTION || '90d')

let client: MongoClient | null = null
let db: Db | null = null

// 型安全なコレクション定義
export let AuditLogs: Collection<AuditLogDocument>

/**
 * MongoDBに接続し、コレクションを初期化
 */
export async function connectToMongo(): Promise<void> {
  const uri = process.env.MONGODB_URI
  if (!uri) {
    throw new Error('MONGODB_URI is not set in .env')
  }

  client = new MongoClient(uri)
  await client.connect()
  db = client.db()

  AuditLogs = db.collection('audit_logs')

  /**
   * 監査ログコレクションのインデックス作成
   * - user_id     ユーザーごとの履歴検索
   * - created_at  期間検索
   * - expires_at  経過時間で自動削除
   */
  try {
    await AuditLogs.createIndex({ user_id: 1 })
    await AuditLogs.createIndex({ created_at: -1 })
    await AuditLogs.createIndex({ expires_at: 1 }, { expireAfterSeconds: 0 })
  } catch (error) {
    logger.warn(`Failed to create index for audit_logs: ${errorMessage(error)}`)
  }
}

/**
 * DBインスタンスを取得
 */
export function getDb(): Db | null {
  return db
}

/**
 * データベース接続を閉じる
 */
export async function closeConnection(): Promise<void> {
  if (client) {
    await client.close()
    logger.info('Disconnected from MongoDB')
    client = null
    db = null
  }
}

/**
 * 監査ログを登録
 * @param doc 監査ログ（日時を除く）
 * @param retention 保存期間（秒）
 */
export async function insertAuditLog(
  doc: Omit<AuditLogDocument, 'expires_at'>,
  retention = AUDIT_LOG_RETENTION,
): Promise<void> {
  ensureMongoConnected()

  await AuditLogs.insertOne({
    ...doc,
    expires_at: new Date(doc.created_at.getTime() + retention * 1000),
  })
}

/**
 * MongoDBが接続されていることを確認
 * @throws Error if MongoDB is not connected
 */
export function ensureMongoConnected() {
  if (!db) throw new Error('MongoDB not connected')
}
