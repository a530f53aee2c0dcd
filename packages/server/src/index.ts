// 最初に環境変数を読み込む
import 'dotenv/config'
import { Server } from 'http'
import {
  DurableTier,
  HotTier,
  MembershipTier,
  TokenBlacklist,
  buildBlacklistConfig,
  errorMessage,
  validateBlacklistConfig,
} from 'token-blacklist'
import { createApp } from './app.js'
import { closeConnection as closeMongoConnection, connectToMongo } from './db/mongo.js'
import { closeConnection as closeRedisConnection, connectToRedis } from './db/redis.js'
import { mongoAuditSink } from './services/audit.js'
import { createAccessTokenVerifier } from './utils/jwt.js'
import logger from './utils/logger.js'
import { RevocationMetrics } from './utils/metrics.js'

const PORT = process.env.PORT || 3000

let blacklist: TokenBlacklist | null = null
let server: Server | null = null

/**
 * 起動に必要な環境変数を検証する
 */
function validateEnvironment(): string[] {
  const problems = validateBlacklistConfig(process.env)
  for (const name of ['JWT_SECRET', 'SERVICE_API_KEY', 'MONGODB_URI']) {
    if (!process.env[name]) problems.push(`${name} environment variable is required`)
  }
  if (!process.env.REDIS_URL && !process.env.REDIS_CLUSTER_HOSTS) {
    problems.push('REDIS_URL or REDIS_CLUSTER_HOSTS environment variable is required')
  }
  return problems
}

// サーバー起動
async function startServer(): Promise<void> {
  const problems = validateEnvironment()
  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }

  const jwtSecret = process.env.JWT_SECRET ?? ''
  const serviceApiKey = process.env.SERVICE_API_KEY ?? ''
  const config = buildBlacklistConfig(process.env)

  await connectToMongo()
  logger.info('MongoDB connected')
  const redis = await connectToRedis()

  const verify = createAccessTokenVerifier(jwtSecret)
  blacklist = new TokenBlacklist({
    tiers: {
      hot: new HotTier({ maxEntries: config.hotMaxEntries }),
      membership: new MembershipTier(),
      durable: new DurableTier(redis, { keyPrefix: config.redisKeyPrefix }),
    },
    config,
    verify,
    logger,
    audit: mongoAuditSink,
  })
  const metrics = new RevocationMetrics().attach(blacklist.telemetry)
  blacklist.start()
  logger.info(`Revocation failure policy: ${config.failurePolicy}`)

  const app = createApp({ blacklist, metrics, verify, serviceApiKey })
  server = app.listen(PORT, () => {
    logger.info(`Server running on http://localhost:${PORT}`)
    logger.info(`API endpoints:`)
    logger.info(`  GET  /health - Health check`)
    logger.info(`  POST /revocation/revoke - Revoke a token`)
    logger.info(`  POST /revocation/revoke-jti - Revoke a token by jti`)
    logger.info(`  POST /revocation/revoke-user - Revoke all tokens of a user`)
    logger.info(`  POST /revocation/check - Check a token`)
    logger.info(`  GET  /revocation/stats - Revocation statistics`)
    logger.info(`  POST /auth/logout - Revoke the presented access token`)
  })
}

// 未処理のプロミス拒否をキャッチ
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${errorMessage(reason)}`)
})
// 未処理の例外をキャッチ
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`, { stack: error.stack })
  process.exit(1)
})

// グレースフルシャットダウン
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`)
  blacklist?.stop()
  try {
    const current = server
    if (current) {
      await new Promise<void>((resolve, reject) => current.close((error) => (error ? reject(error) : resolve())))
    }
    await closeRedisConnection()
    await closeMongoConnection()
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`)
  }
  process.exit(0)
}
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'))
process.on('SIGINT', () => void gracefulShutdown('SIGINT'))

/**
 * アプリケーションの起動
 */
startServer().catch((error: unknown) => {
  logger.error(`Failed to start server: ${errorMessage(error)}`)
  process.exit(1)
})
