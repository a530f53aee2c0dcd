/**
 * 失効サブシステムのエラー定義
 */
import { REVOCATION_REASONS, TierName } from './types.js'

export class InvalidReasonError extends Error {
  statusCode = 400
  code = 'INVALID_REASON'
  details?: Record<string, unknown>

  constructor(reason: unknown) {
    super(`Invalid revocation reason: ${String(reason)}. Must be one of ${REVOCATION_REASONS.join(', ')}`)
    this.name = 'InvalidReasonError'
    this.details = { reason: String(reason) }
  }
}

export class TierWriteError extends Error {
  statusCode = 503
  code = 'TIER_WRITE_FAILED'
  details?: Record<string, unknown>

  constructor(
    public readonly tier: TierName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${tier} tier write failed: ${message}`, options)
    this.name = 'TierWriteError'
    this.details = { tier }
  }
}

export class TierReadError extends Error {
  statusCode = 503
  code = 'TIER_READ_FAILED'
  details?: Record<string, unknown>

  constructor(
    public readonly tier: TierName,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${tier} tier read failed: ${message}`, options)
    this.name = 'TierReadError'
    this.details = { tier }
  }
}

export class TierTimeoutError extends Error {
  code = 'TIER_TIMEOUT'

  constructor(
    public readonly tier: TierName,
    public readonly timeoutMs: number,
  ) {
    super(`${tier} tier did not respond within ${timeoutMs}ms`)
    this.name = 'TierTimeoutError'
  }
}

export class PayloadDecodeError extends Error {
  code = 'PAYLOAD_DECODE_FAILED'

  constructor(message: string) {
    super(message)
    this.name = 'PayloadDecodeError'
  }
}

/**
 * unknownなエラーからメッセージを取り出す
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
