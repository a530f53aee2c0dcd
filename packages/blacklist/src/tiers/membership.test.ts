import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RevocationRecord } from '../types.js'
import { MembershipTier } from './membership.js'

const NOW = new Date('2025-06-01T00:00:00.000Z')
const NOW_SECONDS = NOW.getTime() / 1000

function record(identifier: string): RevocationRecord {
  return { kind: 'token', identifier, reason: 'session_revoked', revokedAt: NOW, ttl: 60 }
}

describe('MembershipTier', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(NOW)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('登録したキーは期限内なら必ず見つかる', async () => {
    const tier = new MembershipTier()
    for (let i = 0; i < 1000; i++) {
      await tier.put(`jti-${i}`, record(`jti-${i}`), 60)
    }
    for (let i = 0; i < 1000; i++) {
      expect(await tier.get(`jti-${i}`)).not.toBeNull()
    }
    expect(await tier.get('jti-1000')).toBeNull()
  })

  it('失効期限をUNIX秒で保持する', async () => {
    const tier = new MembershipTier()
    await tier.put('a', record('a'), 60)
    vi.advanceTimersByTime(59_000)
    expect(await tier.get('a')).not.toBeNull()
    vi.advanceTimersByTime(1_000)
    expect(await tier.get('a')).toBeNull()
    expect(tier.size()).toBe(0)
  })

  it('sweepExpiredは期限切れのエントリだけを削除する', () => {
    const tier = new MembershipTier()
    tier.insert({ key: 'old', expiresAtEpochSeconds: NOW_SECONDS - 1, record: record('old') })
    tier.insert({ key: 'edge', expiresAtEpochSeconds: NOW_SECONDS, record: record('edge') })
    tier.insert({ key: 'live', expiresAtEpochSeconds: NOW_SECONDS + 1, record: record('live') })

    expect(tier.sweepExpired()).toBe(2)
    expect(tier.size()).toBe(1)
  })

  it('パターン削除', async () => {
    const tier = new MembershipTier()
    await tier.put('session-1', record('session-1'), 60)
    await tier.put('session-2', record('session-2'), 60)
    await tier.put('other', record('other'), 60)
    expect(await tier.deleteMatching('session-?')).toBe(2)
    expect(tier.size()).toBe(1)
  })
})
