import { Router } from 'express'
import { TokenBlacklist } from 'token-blacklist'
import { requireApiKey } from '../middleware/requireApiKey.js'
import { createRevocationHandlers } from '../services/revocation.js'
import { RevocationMetrics } from '../utils/metrics.js'

export interface RevocationRouterOptions {
  blacklist: TokenBlacklist
  metrics: RevocationMetrics
  serviceApiKey: string
}

/**
 * 失効管理API（サービス間連携用）
 */
export function createRevocationRouter({ blacklist, metrics, serviceApiKey }: RevocationRouterOptions): Router {
  const router = Router()
  const handlers = createRevocationHandlers(blacklist, metrics)

  router.use(requireApiKey(serviceApiKey))

  router.post('/revoke', handlers.revoke)
  router.post('/revoke-jti', handlers.revokeJti)
  router.post('/revoke-user', handlers.revokeUser)
  router.post('/check', handlers.check)
  router.get('/check/:jti', handlers.checkJti)
  router.get('/users/:userId', handlers.userStatus)
  router.get('/stats', handlers.stats)
  router.post('/cleanup', handlers.cleanup)

  return router
}
