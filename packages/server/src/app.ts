import express, { NextFunction, Request, Response } from 'express'
import { TokenBlacklist, errorMessage } from 'token-blacklist'
import { createAuthRouter } from './routes/auth.js'
import healthRoutes from './routes/health.js'
import { createRevocationRouter } from './routes/revocation.js'
import { sendError } from './utils/http.js'
import { AccessTokenVerifier } from './utils/jwt.js'
import logger from './utils/logger.js'
import { RevocationMetrics } from './utils/metrics.js'

export interface AppDependencies {
  blacklist: TokenBlacklist
  metrics: RevocationMetrics
  verify: AccessTokenVerifier
  serviceApiKey: string
}

/**
 * Expressアプリケーションを組み立てる
 */
export function createApp({ blacklist, metrics, verify, serviceApiKey }: AppDependencies): express.Express {
  const app = express()

  // ログミドルウェア
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.path} - ${req.ip}`)
    next()
  })

  app.use(express.json({ limit: '1mb' }))

  // ルート設定
  app.use('/health', healthRoutes)
  app.use('/revocation', createRevocationRouter({ blacklist, metrics, serviceApiKey }))
  app.use('/auth', createAuthRouter({ blacklist, verify }))

  // 404ハンドラー
  app.use(/.*/, (req, res) => {
    logger.warn(`404 - ${req.method} ${req.originalUrl}`)
    sendError(res, 404, 'not_found', 'Endpoint not found')
  })

  // エラーハンドラー
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      sendError(res, 400, 'invalid_request', 'Malformed JSON body')
      return
    }
    logger.error(`Error: ${errorMessage(err)}`)
    sendError(res, 500, 'server_error', 'Internal server error')
  })

  return app
}
