/**
 * 管理API用のAPIキー認証
 * x-api-key ヘッダーを定数時間で比較する。
 */
import crypto from 'crypto'
import { NextFunction, Request, RequestHandler, Response } from 'express'
import logger from '../utils/logger.js'
import { sendError } from '../utils/http.js'

function safeEqual(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest()
  const right = crypto.createHash('sha256').update(b).digest()
  return crypto.timingSafeEqual(left, right)
}

/**
 * APIキー認証ミドルウェアを作成する
 * @param apiKey 正しいAPIキー
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.get('x-api-key')
    if (!provided || !safeEqual(provided, apiKey)) {
      logger.warn(`Rejected admin request without valid API key: ${req.method} ${req.originalUrl} - ${req.ip}`)
      sendError(res, 401, 'unauthorized', 'Valid x-api-key header is required')
      return
    }
    next()
  }
}
