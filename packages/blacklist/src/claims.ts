/**
 * トークンから失効管理用の識別子とクレームを取り出す
 *
 * 取り出しは信頼度の高い順に3段階で試みる。
 *   1. 認証サブシステムが提供する検証付きデコード
 *   2. 検証なしのペイロードデコード（期限切れトークンなど）
 *   3. 生トークン文字列のハッシュ（jti がない、またはマーカーのキーと衝突する場合も）
 *
 * 2の結果はセキュリティ境界ではない。失効の記帳にのみ使用し、
 * 認証・認可の判断に再利用してはならない。
 */
import crypto from 'crypto'
import jwt from 'jsonwebtoken'

/**
 * 検証済みトークンのクレーム
 */
export interface TokenClaims {
  jti?: unknown
  sub?: unknown
  iat?: unknown
}

/**
 * 検証付きデコード関数
 * 検証に失敗した場合は例外を投げるか null を返す。
 */
export type VerifyCredential = (credential: string) => TokenClaims | null

/**
 * 一括失効チェックに使うクレーム
 */
export interface SubjectClaims {
  subject: string
  /** 発行時刻（UNIX秒） */
  issuedAt: number
}

export interface ClaimsExtractor {
  extractIdentifier(credential: string): string
  extractClaims(credential: string): SubjectClaims | null
}

/**
 * ハッシュ識別子の長さ（16進数の文字数）
 */
const HASH_IDENTIFIER_LENGTH = 32

/**
 * ユーザー単位マーカーのキープレフィックス
 * この形の jti はトークンの識別子として使わない。
 */
export const USER_KEY_PREFIX = 'user:'

/**
 * 生トークン文字列から決定的な識別子を作る
 * @param credential トークン文字列
 */
export function hashCredential(credential: string): string {
  return crypto
    .createHash('sha256')
    .update(credential)
    .digest('hex')
    .slice(0, HASH_IDENTIFIER_LENGTH)
}

/**
 * 検証なしでペイロードを読む
 * 構造的にJWTでなければ null
 */
function decodeUnverified(credential: string): TokenClaims | null {
  try {
    return jwt.decode(credential, { json: true })
  } catch {
    return null
  }
}

/**
 * クレーム抽出器を作成する
 * @param verify 検証付きデコード関数（省略時は検証なしデコードのみ）
 */
export function createClaimsExtractor(verify?: VerifyCredential): ClaimsExtractor {
  const decodeClaims = (credential: string): TokenClaims | null => {
    if (verify) {
      try {
        const claims = verify(credential)
        if (claims) return claims
      } catch {
        // 期限切れ・署名不一致は検証なしデコードへ
      }
    }
    return decodeUnverified(credential)
  }

  return {
    extractIdentifier(credential: string): string {
      const claims = decodeClaims(credential)
      if (
        claims &&
        typeof claims.jti === 'string' &&
        claims.jti.length > 0 &&
        !claims.jti.startsWith(USER_KEY_PREFIX)
      ) {
        return claims.jti
      }
      return hashCredential(credential)
    },

    extractClaims(credential: string): SubjectClaims | null {
      const claims = decodeClaims(credential)
      if (!claims) return null
      const { sub, iat } = claims
      if (typeof sub !== 'string' || sub.length === 0) return null
      if (typeof iat !== 'number' || !Number.isFinite(iat)) return null
      return { subject: sub, issuedAt: iat }
    },
  }
}
