import { Router } from 'express'
import { TokenBlacklist } from 'token-blacklist'
import { requireActiveToken } from '../middleware/requireActiveToken.js'
import { createLogoutHandler, handleSession } from '../services/auth.js'
import { AccessTokenVerifier } from '../utils/jwt.js'

export interface AuthRouterOptions {
  blacklist: TokenBlacklist
  verify: AccessTokenVerifier
}

/**
 * アクセストークンで保護されたセッションAPI
 */
export function createAuthRouter({ blacklist, verify }: AuthRouterOptions): Router {
  const router = Router()
  const gate = requireActiveToken(blacklist, verify)

  router.post('/logout', gate, createLogoutHandler(blacklist))
  router.get('/session', gate, handleSession)

  return router
}
