/**
 * 認証ゲート
 * 署名検証に成功したアクセストークンについて、失効していないことを確認する。
 */
import { NextFunction, Request, RequestHandler, Response } from 'express'
import { TokenBlacklist, errorMessage } from 'token-blacklist'
import { sendError, bearerToken } from '../utils/http.js'
import { AccessTokenClaims, AccessTokenVerifier, isAccessTokenClaims } from '../utils/jwt.js'
import logger from '../utils/logger.js'

export interface AuthContext {
  token: string
  claims: AccessTokenClaims
}

/**
 * 失効していないアクセストークンを要求するミドルウェアを作成する
 * 検証済みのトークンとクレームは res.locals に格納する。
 * @param blacklist 失効リスト
 * @param verify アクセストークンの検証関数
 */
export function requireActiveToken(blacklist: TokenBlacklist, verify: AccessTokenVerifier): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req.get('authorization'))
    if (!token) {
      sendError(res, 401, 'invalid_token', 'Missing bearer token')
      return
    }

    let claims: AccessTokenClaims | null
    try {
      claims = verify(token)
    } catch (error) {
      logger.debug(`Access token verification failed: ${errorMessage(error)}`)
      claims = null
    }
    if (!claims) {
      sendError(res, 401, 'invalid_token', 'Token is invalid or expired')
      return
    }

    try {
      if (await blacklist.isRevoked(token)) {
        logger.info(`Rejected revoked token for user ${claims.sub}`)
        sendError(res, 401, 'token_revoked', 'Token has been revoked')
        return
      }
    } catch (error) {
      logger.error(`Revocation check error: ${errorMessage(error)}`)
      sendError(res, 503, 'temporarily_unavailable', 'Revocation status could not be determined')
      return
    }

    res.locals.token = token
    res.locals.claims = claims
    next()
  }
}

/**
 * requireActiveToken が格納した認証情報を取り出す
 */
export function authContext(res: Response): AuthContext {
  const { token, claims } = res.locals
  if (typeof token !== 'string' || !isAccessTokenClaims(claims)) {
    throw new Error('requireActiveToken must run before this handler')
  }
  return { token, claims }
}
