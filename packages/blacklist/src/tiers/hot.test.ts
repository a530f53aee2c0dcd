import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RevocationRecord } from '../types.js'
import { HotTier } from './hot.js'

function record(identifier: string): RevocationRecord {
  return { kind: 'token', identifier, reason: 'logout', revokedAt: new Date(), ttl: 60 }
}

describe('HotTier', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('保存した値を取得できる', async () => {
    const tier = new HotTier()
    const value = record('a')
    await tier.put('a', value, 60)
    expect(await tier.get('a')).toBe(value)
    expect(await tier.get('b')).toBeNull()
  })

  it('TTLを過ぎた値は返さず削除する', async () => {
    const tier = new HotTier()
    await tier.put('a', record('a'), 10)

    vi.advanceTimersByTime(9_999)
    expect(await tier.get('a')).not.toBeNull()

    vi.advanceTimersByTime(1)
    expect(await tier.get('a')).toBeNull()
    expect(tier.size()).toBe(0)
  })

  it('上限を超えると最も古いエントリを破棄する', async () => {
    const tier = new HotTier({ maxEntries: 2 })
    await tier.put('a', record('a'), 60)
    await tier.put('b', record('b'), 60)
    await tier.put('c', record('c'), 60)

    expect(tier.size()).toBe(2)
    expect(await tier.get('a')).toBeNull()
    expect(await tier.get('b')).not.toBeNull()
    expect(await tier.get('c')).not.toBeNull()
  })

  it('上限到達時は期限切れのエントリを先に破棄する', async () => {
    const tier = new HotTier({ maxEntries: 2 })
    await tier.put('a', record('a'), 60)
    await tier.put('short', record('short'), 1)
    vi.advanceTimersByTime(1_000)
    await tier.put('c', record('c'), 60)

    expect(await tier.get('a')).not.toBeNull()
    expect(await tier.get('c')).not.toBeNull()
  })

  it('上書きすると挿入順が新しくなる', async () => {
    const tier = new HotTier({ maxEntries: 2 })
    await tier.put('a', record('a'), 60)
    await tier.put('b', record('b'), 60)
    await tier.put('a', record('a'), 60)
    await tier.put('c', record('c'), 60)

    expect(await tier.get('a')).not.toBeNull()
    expect(await tier.get('b')).toBeNull()
  })

  it('削除とパターン削除', async () => {
    const tier = new HotTier()
    await tier.put('user:u1', record('x'), 60)
    await tier.put('user:u2', record('y'), 60)
    await tier.put('jti-1', record('z'), 60)

    await tier.delete('jti-1')
    expect(await tier.get('jti-1')).toBeNull()

    expect(await tier.deleteMatching('user:*')).toBe(2)
    expect(tier.size()).toBe(0)
  })
})
