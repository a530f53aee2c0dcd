import { describe, expect, it } from 'vitest'
import { PayloadDecodeError } from '../errors.js'
import { decodeFact, encodeFact } from './codec.js'

describe('encodeFact', () => {
  it('ユーザーIDがないレコードはuser_idを含めない', () => {
    const encoded = encodeFact({
      kind: 'token',
      identifier: 'jti-1',
      reason: 'token_refresh',
      revokedAt: new Date('2025-03-01T12:00:00.000Z'),
      ttl: 60,
    })
    expect(encoded).toBe(
      '{"kind":"token","identifier":"jti-1","reason":"token_refresh","revoked_at":"2025-03-01T12:00:00.000Z","ttl":60}',
    )
  })

  it('マーカーはrevoked_beforeをISO-8601で保存する', () => {
    const encoded = encodeFact({
      kind: 'user',
      userId: 'u1',
      revokedBefore: new Date('2025-03-01T12:00:00.000Z'),
      reason: 'security_breach',
      ttl: 86400,
    })
    expect(encoded).toBe(
      '{"kind":"user","user_id":"u1","revoked_before":"2025-03-01T12:00:00.000Z","reason":"security_breach","ttl":86400}',
    )
  })
})

describe('decodeFact', () => {
  it('レコードを復元する', () => {
    const fact = decodeFact(
      '{"kind":"token","identifier":"jti-1","reason":"logout","revoked_at":"2025-03-01T12:00:00.000Z","ttl":60,"user_id":"u1"}',
    )
    expect(fact).toEqual({
      kind: 'token',
      identifier: 'jti-1',
      reason: 'logout',
      revokedAt: new Date('2025-03-01T12:00:00.000Z'),
      userId: 'u1',
      ttl: 60,
    })
  })

  it.each([
    ['not json', 'payload is not valid JSON'],
    ['[1,2]', 'payload is not an object'],
    ['{"kind":"token","identifier":"x","reason":"bogus","revoked_at":"2025-01-01T00:00:00Z","ttl":1}', 'unknown reason: bogus'],
    ['{"kind":"token","identifier":"x","reason":"logout","revoked_at":"2025-01-01T00:00:00Z"}', 'ttl is missing'],
    ['{"kind":"token","reason":"logout","revoked_at":"2025-01-01T00:00:00Z","ttl":1}', 'identifier is missing'],
    ['{"kind":"token","identifier":"x","reason":"logout","revoked_at":"yesterday","ttl":1}', 'revoked_at is not a valid date'],
    ['{"kind":"user","reason":"logout","revoked_before":"2025-01-01T00:00:00Z","ttl":1}', 'user_id is missing'],
    ['{"kind":"user","user_id":"u1","reason":"logout","ttl":1}', 'revoked_before is missing'],
    ['{"kind":"session","reason":"logout","ttl":1}', 'unknown kind: session'],
  ])('不正なペイロード %s', (raw, message) => {
    expect(() => decodeFact(raw)).toThrow(new PayloadDecodeError(message))
  })
})
