/**
 * 永続ティア用のシリアライズ
 * 日時はISO-8601文字列で保存する。
 */
import { PayloadDecodeError } from '../errors.js'
import { RevocationFact, isRevocationReason } from '../types.js'

interface StoredRecord {
  kind: 'token'
  identifier: string
  reason: string
  revoked_at: string
  user_id?: string
  ttl: number
}

interface StoredMarker {
  kind: 'user'
  user_id: string
  revoked_before: string
  reason: string
  ttl: number
}

/**
 * 失効情報を保存用の文字列に変換する
 */
export function encodeFact(fact: RevocationFact): string {
  if (fact.kind === 'token') {
    const stored: StoredRecord = {
      kind: 'token',
      identifier: fact.identifier,
      reason: fact.reason,
      revoked_at: fact.revokedAt.toISOString(),
      ttl: fact.ttl,
    }
    if (fact.userId !== undefined) stored.user_id = fact.userId
    return JSON.stringify(stored)
  }

  const stored: StoredMarker = {
    kind: 'user',
    user_id: fact.userId,
    revoked_before: fact.revokedBefore.toISOString(),
    reason: fact.reason,
    ttl: fact.ttl,
  }
  return JSON.stringify(stored)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseDate(value: unknown, field: string): Date {
  if (typeof value !== 'string') throw new PayloadDecodeError(`${field} is missing`)
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) throw new PayloadDecodeError(`${field} is not a valid date`)
  return date
}

/**
 * 保存された文字列を失効情報に戻す
 * @throws PayloadDecodeError 形式が不正な場合
 */
export function decodeFact(raw: string): RevocationFact {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new PayloadDecodeError('payload is not valid JSON')
  }
  if (!isObject(parsed)) throw new PayloadDecodeError('payload is not an object')

  const { kind, reason, ttl } = parsed
  if (!isRevocationReason(reason)) throw new PayloadDecodeError(`unknown reason: ${String(reason)}`)
  if (typeof ttl !== 'number') throw new PayloadDecodeError('ttl is missing')

  if (kind === 'token') {
    if (typeof parsed.identifier !== 'string') throw new PayloadDecodeError('identifier is missing')
    const userId = parsed.user_id
    return {
      kind: 'token',
      identifier: parsed.identifier,
      reason,
      revokedAt: parseDate(parsed.revoked_at, 'revoked_at'),
      ...(typeof userId === 'string' ? { userId } : {}),
      ttl,
    }
  }

  if (kind === 'user') {
    if (typeof parsed.user_id !== 'string') throw new PayloadDecodeError('user_id is missing')
    return {
      kind: 'user',
      userId: parsed.user_id,
      revokedBefore: parseDate(parsed.revoked_before, 'revoked_before'),
      reason,
      ttl,
    }
  }

  throw new PayloadDecodeError(`unknown kind: ${String(kind)}`)
}
