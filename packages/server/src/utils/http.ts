/**
 * HTTPレスポンスの共通処理
 */
import { Response } from 'express'
import { InvalidReasonError, RevocationMetadata, TierWriteError, errorMessage } from 'token-blacklist'
import logger from './logger.js'

/**
 * エラーレスポンスを返す
 * @param res レスポンス
 * @param status HTTPステータス
 * @param error エラーコード
 * @param description 説明
 */
export function sendError(res: Response, status: number, error: string, description: string): void {
  res.status(status).json({ error, error_description: description })
}

/**
 * 失効処理の例外をHTTPレスポンスに変換する
 * 5xxの説明には内部の詳細を含めない。
 * @param res レスポンス
 * @param error 発生した例外
 * @param context ログ用の処理名
 */
export function sendRevocationError(res: Response, error: unknown, context: string): void {
  if (error instanceof InvalidReasonError) {
    sendError(res, 400, 'invalid_reason', error.message)
    return
  }
  if (error instanceof RangeError) {
    sendError(res, 400, 'invalid_request', error.message)
    return
  }
  if (error instanceof TierWriteError) {
    logger.error(`${context} failed: ${error.message}`)
    sendError(res, 503, 'revocation_failed', 'Revocation could not be recorded, retry the request')
    return
  }
  logger.error(`${context} error: ${errorMessage(error)}`)
  sendError(res, 500, 'server_error', 'Internal server error')
}

/**
 * リクエストのmetadataを検証する
 * 値が文字列・数値・真偽値・nullのオブジェクトのみ受け付ける。
 * @returns 省略時は空オブジェクト、不正な場合は null
 */
export function parseMetadata(value: unknown): RevocationMetadata | null {
  if (value === undefined) return {}
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null

  const metadata: RevocationMetadata = {}
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null || typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      metadata[key] = entry
    } else {
      return null
    }
  }
  return metadata
}

/**
 * 任意の正の数値（TTLなど）を検証する
 * @returns 省略時は undefined、不正な場合は null
 */
export function parseOptionalPositive(value: unknown): number | undefined | null {
  if (value === undefined) return undefined
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null
}

/**
 * Authorizationヘッダーからベアラートークンを取り出す
 */
export function bearerToken(header: string | undefined): string | null {
  if (!header) return null
  const [scheme, token] = header.split(' ')
  return scheme.toLowerCase() === 'bearer' && token ? token : null
}
