/**
 * 認証済みユーザー向けのセッション操作
 */
import { Request, Response } from 'express'
import { TokenBlacklist } from 'token-blacklist'
import { authContext } from '../middleware/requireActiveToken.js'
import { sendRevocationError } from '../utils/http.js'
import logger from '../utils/logger.js'

/**
 * ログアウト処理のハンドラを作成する
 * 提示されたアクセストークンを失効させる。
 * @param blacklist 失効リスト
 */
export function createLogoutHandler(blacklist: TokenBlacklist) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { token, claims } = authContext(res)
      // アクセストークンの残り有効期間だけ保持する
      const ttl = claims.exp !== undefined ? Math.max(1, claims.exp - Math.floor(Date.now() / 1000)) : undefined
      await blacklist.revoke(token, {
        reason: 'logout',
        ttl,
        userId: claims.sub,
        metadata: { ip: req.ip ?? null },
      })
      logger.info(`User ${claims.sub} logged out`)
      res.json({ status: 'ok', message: 'token revoked' })
    } catch (error) {
      sendRevocationError(res, error, '/auth/logout')
    }
  }
}

/**
 * 検証済みセッション情報を返す
 */
export function handleSession(_req: Request, res: Response): void {
  const { claims } = authContext(res)
  res.json({
    sub: claims.sub,
    jti: claims.jti ?? null,
    issued_at: new Date(claims.iat * 1000).toISOString(),
    expires_at: claims.exp !== undefined ? new Date(claims.exp * 1000).toISOString() : null,
  })
}
