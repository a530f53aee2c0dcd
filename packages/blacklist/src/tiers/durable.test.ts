import { Redis } from 'ioredis'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { PayloadDecodeError } from '../errors.js'
import { RevocationRecord, UserRevocationMarker } from '../types.js'
import { DurableTier } from './durable.js'
import { globToRegExp } from './tier.js'

// ioredisのモック（キーと値はMapで保持する）
const { mockRedis, store } = vi.hoisted(() => {
  const store = new Map<string, string>()
  const mockRedis = {
    get: vi.fn(),
    set: vi.fn(),
    del: vi.fn(),
    scan: vi.fn(),
    unlink: vi.fn(),
  }
  return { mockRedis, store }
})

vi.mock('ioredis', () => ({
  Redis: vi.fn(function () {
    return mockRedis
  }),
  Cluster: class {},
}))

const record: RevocationRecord = {
  kind: 'token',
  identifier: 'jti-1',
  reason: 'logout',
  revokedAt: new Date('2025-01-01T00:00:00.000Z'),
  userId: 'u1',
  ttl: 600,
}

const marker: UserRevocationMarker = {
  kind: 'user',
  userId: 'u1',
  revokedBefore: new Date('2025-01-02T00:00:00.000Z'),
  reason: 'password_change',
  ttl: 2592000,
}

describe('DurableTier', () => {
  let tier: DurableTier

  beforeEach(() => {
    store.clear()
    vi.clearAllMocks()
    mockRedis.get.mockImplementation(async (key: string) => store.get(key) ?? null)
    mockRedis.set.mockImplementation(async (key: string, value: string) => {
      store.set(key, value)
      return 'OK'
    })
    mockRedis.del.mockImplementation(async (key: string) => (store.delete(key) ? 1 : 0))
    mockRedis.scan.mockImplementation(async (_cursor: string, _match: string, pattern: string) => {
      const regex = globToRegExp(pattern)
      return ['0', [...store.keys()].filter((key) => regex.test(key))]
    })
    mockRedis.unlink.mockImplementation(async (...keys: string[]) => {
      return keys.filter((key) => store.delete(key)).length
    })
    tier = new DurableTier(new Redis())
  })

  it('プレフィックス付きキーにEX付きで保存する', async () => {
    await tier.put('jti-1', record, 600)
    expect(mockRedis.set).toHaveBeenCalledWith(
      'token_blacklist:jti-1',
      JSON.stringify({
        kind: 'token',
        identifier: 'jti-1',
        reason: 'logout',
        revoked_at: '2025-01-01T00:00:00.000Z',
        ttl: 600,
        user_id: 'u1',
      }),
      'EX',
      600,
    )
  })

  it('保存したレコードを取得できる', async () => {
    await tier.put('jti-1', record, 600)
    expect(await tier.get('jti-1')).toEqual(record)
  })

  it('保存したマーカーを取得できる', async () => {
    await tier.put('user:u1', marker, marker.ttl)
    expect(await tier.get('user:u1')).toEqual(marker)
  })

  it('存在しないキーはnull', async () => {
    expect(await tier.get('missing')).toBeNull()
  })

  it('端数のTTLは切り上げ、1秒未満は1秒にする', async () => {
    await tier.put('a', record, 1.2)
    await tier.put('b', record, 0)
    expect(mockRedis.set).toHaveBeenNthCalledWith(1, 'token_blacklist:a', expect.any(String), 'EX', 2)
    expect(mockRedis.set).toHaveBeenNthCalledWith(2, 'token_blacklist:b', expect.any(String), 'EX', 1)
  })

  it('不正なペイロードはPayloadDecodeError', async () => {
    store.set('token_blacklist:broken', '{not json')
    await expect(tier.get('broken')).rejects.toBeInstanceOf(PayloadDecodeError)
  })

  it('削除できる', async () => {
    await tier.put('jti-1', record, 600)
    await tier.delete('jti-1')
    expect(mockRedis.del).toHaveBeenCalledWith('token_blacklist:jti-1')
    expect(await tier.get('jti-1')).toBeNull()
  })

  it('パターンに一致するキーだけをSCANとUNLINKで削除する', async () => {
    await tier.put('user:u1', marker, 60)
    await tier.put('user:u2', { ...marker, userId: 'u2' }, 60)
    await tier.put('jti-1', record, 60)

    expect(await tier.deleteMatching('user:*')).toBe(2)
    expect(mockRedis.scan).toHaveBeenCalledWith('0', 'MATCH', 'token_blacklist:user:*', 'COUNT', 100)
    expect(await tier.get('jti-1')).toEqual(record)
    expect(await tier.get('user:u1')).toBeNull()
  })

  it('Redisのエラーはそのまま伝播する', async () => {
    mockRedis.get.mockRejectedValueOnce(new Error('Connection is closed.'))
    await expect(tier.get('jti-1')).rejects.toThrow('Connection is closed.')
  })
})
