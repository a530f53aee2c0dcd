/**
 * 失効管理APIのハンドラ
 */
import { Request, RequestHandler, Response } from 'express'
import { TokenBlacklist } from 'token-blacklist'
import { parseMetadata, parseOptionalPositive, sendError, sendRevocationError } from '../utils/http.js'
import logger from '../utils/logger.js'
import { RevocationMetrics } from '../utils/metrics.js'

export interface RevocationHandlers {
  revoke: RequestHandler
  revokeJti: RequestHandler
  revokeUser: RequestHandler
  check: RequestHandler
  checkJti: RequestHandler
  userStatus: RequestHandler
  stats: RequestHandler
  cleanup: RequestHandler
}

function optionalString(value: unknown): string | undefined | null {
  if (value === undefined) return undefined
  return typeof value === 'string' && value.length > 0 ? value : null
}

/**
 * 失効操作の共通オプションを検証する
 * 不正な場合はレスポンスを返して null
 */
function parseRevokeBody(req: Request, res: Response) {
  const { reason, ttl, user_id, metadata }: Record<string, unknown> = req.body ?? {}

  // 値の検証は TokenBlacklist が行う
  if (reason !== undefined && typeof reason !== 'string') {
    sendError(res, 400, 'invalid_reason', 'reason must be a string')
    return null
  }
  const parsedTtl = parseOptionalPositive(ttl)
  if (parsedTtl === null) {
    sendError(res, 400, 'invalid_request', 'ttl must be a positive number of seconds')
    return null
  }
  const userId = optionalString(user_id)
  if (userId === null) {
    sendError(res, 400, 'invalid_request', 'user_id must be a non-empty string')
    return null
  }
  const parsedMetadata = parseMetadata(metadata)
  if (parsedMetadata === null) {
    sendError(res, 400, 'invalid_request', 'metadata must be an object of primitive values')
    return null
  }

  return { reason, ttl: parsedTtl, userId, metadata: parsedMetadata }
}

/**
 * 失効管理APIのハンドラを作成する
 * @param blacklist 失効リスト
 * @param metrics 運用カウンタ
 */
export function createRevocationHandlers(blacklist: TokenBlacklist, metrics: RevocationMetrics): RevocationHandlers {
  return {
    // POST /revoke { token, reason?, ttl?, user_id?, metadata? }
    async revoke(req, res) {
      const token = optionalString(req.body?.token)
      if (!token) {
        sendError(res, 400, 'invalid_request', 'Missing token')
        return
      }
      const options = parseRevokeBody(req, res)
      if (!options) return

      try {
        const outcome = await blacklist.revoke(token, options)
        res.json({ status: 'ok', key: outcome.key, tiers: outcome.tiers })
      } catch (error) {
        sendRevocationError(res, error, 'Token revocation')
      }
    },

    // POST /revoke-jti { jti, reason?, ttl?, user_id?, metadata? }
    async revokeJti(req, res) {
      const jti = optionalString(req.body?.jti)
      if (!jti) {
        sendError(res, 400, 'invalid_request', 'Missing jti')
        return
      }
      const options = parseRevokeBody(req, res)
      if (!options) return

      try {
        const outcome = await blacklist.revokeByIdentifier(jti, options)
        res.json({ status: 'ok', key: outcome.key, tiers: outcome.tiers })
      } catch (error) {
        sendRevocationError(res, error, 'Token revocation by jti')
      }
    },

    // POST /revoke-user { user_id, reason?, metadata? }
    async revokeUser(req, res) {
      const userId = optionalString(req.body?.user_id)
      if (!userId) {
        sendError(res, 400, 'invalid_request', 'Missing user_id')
        return
      }
      // マーカーの有効期間はサーバー設定で決まる
      if (req.body?.ttl !== undefined) {
        sendError(res, 400, 'invalid_request', 'ttl is not supported for user revocation')
        return
      }
      const options = parseRevokeBody(req, res)
      if (!options) return

      try {
        const outcome = await blacklist.revokeAllForUser(userId, {
          reason: options.reason,
          metadata: options.metadata,
        })
        const revokedBefore = await blacklist.userRevokedBefore(userId)
        logger.info(`Mass revocation requested for user ${userId}`)
        res.json({
          status: 'ok',
          key: outcome.key,
          tiers: outcome.tiers,
          revoked_before: revokedBefore ? revokedBefore.toISOString() : null,
        })
      } catch (error) {
        sendRevocationError(res, error, 'User revocation')
      }
    },

    // POST /check { token, check_user_marker? }
    async check(req, res) {
      const token = optionalString(req.body?.token)
      if (!token) {
        sendError(res, 400, 'invalid_request', 'Missing token')
        return
      }
      const checkUserMarker: unknown = req.body?.check_user_marker
      if (checkUserMarker !== undefined && typeof checkUserMarker !== 'boolean') {
        sendError(res, 400, 'invalid_request', 'check_user_marker must be a boolean')
        return
      }

      try {
        const revoked = await blacklist.isRevoked(token, { checkUserMarker })
        res.json({ revoked })
      } catch (error) {
        sendRevocationError(res, error, 'Revocation check')
      }
    },

    // GET /check/:jti
    async checkJti(req, res) {
      try {
        const revoked = await blacklist.isRevokedByIdentifier(req.params.jti)
        res.json({ jti: req.params.jti, revoked })
      } catch (error) {
        sendRevocationError(res, error, 'Revocation check by jti')
      }
    },

    // GET /users/:userId
    async userStatus(req, res) {
      try {
        const revokedBefore = await blacklist.userRevokedBefore(req.params.userId)
        res.json({
          user_id: req.params.userId,
          revoked_before: revokedBefore ? revokedBefore.toISOString() : null,
        })
      } catch (error) {
        sendRevocationError(res, error, 'User revocation lookup')
      }
    },

    // GET /stats
    stats(_req, res) {
      const stats = blacklist.stats()
      res.json({
        revocation_count: stats.revocationCount,
        uptime_seconds: stats.uptimeSeconds,
        membership_tier_size: stats.membershipTierSize,
        last_cleanup: stats.lastCleanup ? stats.lastCleanup.toISOString() : null,
        started_at: stats.startedAt.toISOString(),
        metrics: metrics.snapshot(),
      })
    },

    // POST /cleanup
    async cleanup(_req, res) {
      try {
        const result = await blacklist.cleanup()
        logger.info(`Manual cleanup removed ${result.removed} entries`)
        res.json({ removed: result.removed, ran_at: result.ranAt.toISOString() })
      } catch (error) {
        sendRevocationError(res, error, 'Cleanup')
      }
    },
  }
}
