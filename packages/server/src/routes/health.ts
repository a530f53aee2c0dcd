import { Router } from 'express'
import { errorMessage } from 'token-blacklist'
import { getDb } from '../db/mongo.js'
import { getRedisClient } from '../db/redis.js'
import logger from '../utils/logger.js'

const router = Router()

// Mongo接続確認
async function checkMongoConnection(): Promise<boolean> {
  const db = getDb()
  if (!db) return false

  try {
    await db.admin().ping()
    return true
  } catch (error) {
    logger.warn(`MongoDB ping failed: ${errorMessage(error)}`)
    return false
  }
}

// Redis接続確認
async function checkRedisConnection(): Promise<boolean> {
  const redis = getRedisClient()
  if (!redis) return false

  try {
    return (await redis.ping()) === 'PONG'
  } catch (error) {
    logger.warn(`Redis ping failed: ${errorMessage(error)}`)
    return false
  }
}

// ヘルスチェックエンドポイント
router.get('/', async (req, res) => {
  const [mongoStatus, redisStatus] = await Promise.all([checkMongoConnection(), checkRedisConnection()])
  const healthy = mongoStatus && redisStatus

  res.status(healthy ? 200 : 503).json({
    status: healthy ? 'OK' : 'DEGRADED',
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '1.0.0',
    uptime: process.uptime(),
    database: mongoStatus ? 'connected' : 'disconnected',
    redis: redisStatus ? 'connected' : 'disconnected',
    memory: process.memoryUsage(),
    environment: process.env.NODE_ENV || 'development',
  })
})

export default router
