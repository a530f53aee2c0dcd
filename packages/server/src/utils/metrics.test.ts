import { RevocationTelemetry } from 'token-blacklist'
import { describe, expect, it } from 'vitest'
import { RevocationMetrics } from './metrics.js'

describe('RevocationMetrics', () => {
  it('初期値はすべて0', () => {
    expect(new RevocationMetrics().snapshot()).toEqual({
      revocations: {},
      massRevocations: 0,
      checks: 0,
      revokedChecks: 0,
      checksBySource: { hot: 0, membership: 0, durable: 0, user_marker: 0, miss: 0, degraded: 0 },
      tierFailures: { hot: 0, membership: 0, durable: 0 },
      cleanupRuns: 0,
      cleanupRemoved: 0,
      averageCheckMs: 0,
    })
  })

  it('テレメトリイベントを集計する', () => {
    const telemetry = new RevocationTelemetry()
    const metrics = new RevocationMetrics().attach(telemetry)

    telemetry.emit('token_revoked', { count: 1, reason: 'logout', byIdentifier: false })
    telemetry.emit('token_revoked', { count: 1, reason: 'logout', byIdentifier: true })
    telemetry.emit('token_revoked', { count: 1, reason: 'admin_action', userId: 'u1', byIdentifier: true })
    telemetry.emit('mass_revocation', { reason: 'password_change', userId: 'u1' })
    telemetry.emit('token_check', { durationMs: 2, revoked: true, source: 'hot' })
    telemetry.emit('token_check', { durationMs: 4, revoked: false, source: 'miss' })
    telemetry.emit('tier_failure', { tier: 'durable', operation: 'read', message: 'timeout' })
    telemetry.emit('cleanup', { removed: 3, durationMs: 1 })

    const snapshot = metrics.snapshot()
    expect(snapshot.revocations).toEqual({ logout: 2, admin_action: 1 })
    expect(snapshot.massRevocations).toBe(1)
    expect(snapshot.checks).toBe(2)
    expect(snapshot.revokedChecks).toBe(1)
    expect(snapshot.checksBySource.hot).toBe(1)
    expect(snapshot.checksBySource.miss).toBe(1)
    expect(snapshot.tierFailures).toEqual({ hot: 0, membership: 0, durable: 1 })
    expect(snapshot.cleanupRuns).toBe(1)
    expect(snapshot.cleanupRemoved).toBe(3)
    expect(snapshot.averageCheckMs).toBe(3)
  })
})
