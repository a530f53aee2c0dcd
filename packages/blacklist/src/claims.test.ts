import crypto from 'crypto'
import jwt from 'jsonwebtoken'
import { describe, expect, it, vi } from 'vitest'
import { createClaimsExtractor, hashCredential } from './claims.js'

const SECRET = 'test-secret'

function verifyWithSecret(credential: string) {
  const payload = jwt.verify(credential, SECRET)
  return typeof payload === 'string' ? null : payload
}

describe('hashCredential', () => {
  it('SHA-256の先頭32文字を返す', () => {
    const expected = crypto.createHash('sha256').update('tok-a').digest('hex').slice(0, 32)
    expect(hashCredential('tok-a')).toBe(expected)
    expect(hashCredential('tok-a')).toHaveLength(32)
  })

  it('同じ入力には同じ識別子を返す', () => {
    expect(hashCredential('opaque')).toBe(hashCredential('opaque'))
    expect(hashCredential('opaque')).not.toBe(hashCredential('opaque2'))
  })
})

describe('extractIdentifier', () => {
  it('検証済みトークンのjtiを返す', () => {
    const token = jwt.sign({ sub: 'u1', jti: 'jti-verified' }, SECRET)
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractIdentifier(token)).toBe('jti-verified')
  })

  it('期限切れトークンでも検証なしデコードでjtiを取り出す', () => {
    const past = Math.floor(Date.now() / 1000) - 3600
    const token = jwt.sign({ sub: 'u1', jti: 'jti-expired', iat: past - 60, exp: past }, SECRET)
    const verify = vi.fn(verifyWithSecret)
    const extractor = createClaimsExtractor(verify)

    expect(extractor.extractIdentifier(token)).toBe('jti-expired')
    expect(verify).toHaveBeenCalledWith(token)
  })

  it('署名の異なるトークンでもjtiを取り出す', () => {
    const token = jwt.sign({ jti: 'jti-foreign' }, 'other-secret')
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractIdentifier(token)).toBe('jti-foreign')
  })

  it('JWTでない文字列はハッシュ識別子になる', () => {
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractIdentifier('tok-a')).toBe(hashCredential('tok-a'))
  })

  it('jtiを持たないトークンはハッシュ識別子になる', () => {
    const token = jwt.sign({ sub: 'u1' }, SECRET)
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractIdentifier(token)).toBe(hashCredential(token))
  })

  it('マーカーのキーと同じ形のjtiはハッシュ識別子になる', () => {
    const token = jwt.sign({ sub: 'u1', jti: 'user:alice' }, SECRET)
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractIdentifier(token)).toBe(hashCredential(token))
  })

  it('検証関数なしでも動作する', () => {
    const token = jwt.sign({ jti: 'jti-plain' }, SECRET)
    expect(createClaimsExtractor().extractIdentifier(token)).toBe('jti-plain')
  })
})

describe('extractClaims', () => {
  it('subとiatを返す', () => {
    const token = jwt.sign({ sub: 'u1', iat: 1_700_000_000 }, SECRET)
    const extractor = createClaimsExtractor(verifyWithSecret)
    expect(extractor.extractClaims(token)).toEqual({ subject: 'u1', issuedAt: 1_700_000_000 })
  })

  it('subがない場合はnull', () => {
    const token = jwt.sign({ jti: 'x' }, SECRET)
    expect(createClaimsExtractor(verifyWithSecret).extractClaims(token)).toBeNull()
  })

  it('iatがない場合はnull', () => {
    const token = jwt.sign({ sub: 'u1' }, SECRET, { noTimestamp: true })
    expect(createClaimsExtractor(verifyWithSecret).extractClaims(token)).toBeNull()
  })

  it('デコードできない文字列はnull', () => {
    expect(createClaimsExtractor(verifyWithSecret).extractClaims('not-a-token')).toBeNull()
  })
})
