/**
 * アクセストークン（JWT）の検証
 * 発行は認証サービスの責務。ここでは署名と有効期限の確認のみ行う。
 */
import jwt from 'jsonwebtoken'

/**
 * 検証済みアクセストークンのクレーム
 */
export interface AccessTokenClaims {
  /** ユーザーID */
  sub: string
  /** JWT ID */
  jti?: string
  /** 発行時刻（UNIX秒） */
  iat: number
  /** 有効期限（UNIX秒） */
  exp?: number
}

export type AccessTokenVerifier = (token: string) => AccessTokenClaims | null

export function isAccessTokenClaims(value: unknown): value is AccessTokenClaims {
  if (typeof value !== 'object' || value === null) return false
  const sub = 'sub' in value ? value.sub : undefined
  const jti = 'jti' in value ? value.jti : undefined
  const iat = 'iat' in value ? value.iat : undefined
  const exp = 'exp' in value ? value.exp : undefined
  return (
    typeof sub === 'string' &&
    typeof iat === 'number' &&
    (jti === undefined || typeof jti === 'string') &&
    (exp === undefined || typeof exp === 'number')
  )
}

/**
 * アクセストークンの検証関数を作成する
 * 署名不正・期限切れは例外を投げる。必須クレームが欠けている場合は null。
 * @param secret JWTの秘密鍵
 */
export function createAccessTokenVerifier(secret: string): AccessTokenVerifier {
  return (token: string) => {
    const payload = jwt.verify(token, secret, { algorithms: ['HS256'] })
    return isAccessTokenClaims(payload) ? payload : null
  }
}
