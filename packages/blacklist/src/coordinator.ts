/**
 * トークン失効の調停役
 *
 * 失効の事実を ホット → メンバーシップ → 永続 の3ティアに記録し、
 * 速いティアから順に照会する。遅いティアでヒットした事実は速いティアへ昇格させる。
 * 書き込みはホットティアだけが必須で、他はベストエフォート。
 */
import { ClaimsExtractor, USER_KEY_PREFIX, VerifyCredential, createClaimsExtractor } from './claims.js'
import { CleanupWorker } from './cleanup.js'
import { BlacklistConfig, defaultBlacklistConfig } from './config.js'
import { AuditAction, AuditSink, noopAuditSink } from './audit.js'
import { InvalidReasonError, TierReadError, TierWriteError, errorMessage } from './errors.js'
import { RevocationTelemetry } from './telemetry.js'
import { StorageTier, SweepableTier, withTimeout } from './tiers/tier.js'
import {
  BlacklistStats,
  CheckOptions,
  CheckSource,
  CleanupResult,
  RevocationFact,
  RevocationMetadata,
  RevocationOutcome,
  RevocationReason,
  RevocationRecord,
  RevokeAllOptions,
  RevokeOptions,
  TierName,
  TierWriteOutcome,
  UserRevocationMarker,
  isRevocationReason,
} from './types.js'
import defaultLogger, { Logger } from './utils/logger.js'
import { nowInSeconds } from './utils/time.js'

export interface BlacklistTiers {
  hot: StorageTier<RevocationFact>
  membership: SweepableTier<RevocationRecord>
  durable: StorageTier<RevocationFact>
}

export interface TokenBlacklistOptions {
  tiers: BlacklistTiers
  config?: Partial<BlacklistConfig>
  /** 認証サブシステムの検証付きデコード */
  verify?: VerifyCredential
  /** verify より優先されるクレーム抽出器 */
  claims?: ClaimsExtractor
  logger?: Logger
  telemetry?: RevocationTelemetry
  audit?: AuditSink
}

interface TokenLookup {
  record: RevocationRecord | null
  source: CheckSource
  /** 全ティアが応答しなかった */
  degraded: boolean
}

interface MarkerLookup {
  marker: UserRevocationMarker | null
  degraded: boolean
}


export function userMarkerKey(userId: string): string {
  return `${USER_KEY_PREFIX}${userId}`
}

export class TokenBlacklist {
  readonly telemetry: RevocationTelemetry
  private tiers: BlacklistTiers
  private config: BlacklistConfig
  private claims: ClaimsExtractor
  private logger: Logger
  private audit: AuditSink
  private worker: CleanupWorker
  private writeQueue: Promise<void> = Promise.resolve()
  private revocationCount = 0
  private startedAt = new Date()

  constructor(options: TokenBlacklistOptions) {
    this.tiers = options.tiers
    this.config = {
      ...defaultBlacklistConfig,
      ...options.config,
      timeoutsMs: { ...defaultBlacklistConfig.timeoutsMs, ...options.config?.timeoutsMs },
    }
    this.claims = options.claims ?? createClaimsExtractor(options.verify)
    this.logger = options.logger ?? defaultLogger
    this.telemetry = options.telemetry ?? new RevocationTelemetry(this.logger)
    this.audit = options.audit ?? noopAuditSink
    this.worker = new CleanupWorker(this.tiers.membership, { logger: this.logger, telemetry: this.telemetry })
  }

  /**
   * トークンを失効させる
   * @param credential トークン文字列（JWTまたは任意の文字列）
   * @throws InvalidReasonError 理由が不正な場合（書き込み前）
   * @throws TierWriteError ホットティアに書き込めなかった場合
   */
  async revoke(credential: string, options: RevokeOptions = {}): Promise<RevocationOutcome> {
    const reason = this.validateReason(options.reason ?? 'logout')
    const ttl = this.validateTtl(options.ttl)
    const identifier = this.claims.extractIdentifier(credential)
    return this.serialize(() => this.recordRevocation(identifier, reason, ttl, options, false))
  }

  /**
   * 識別子（jti）が既知のトークンを失効させる
   */
  async revokeByIdentifier(jti: string, options: RevokeOptions = {}): Promise<RevocationOutcome> {
    const reason = this.validateReason(options.reason ?? 'logout')
    const ttl = this.validateTtl(options.ttl)
    if (!jti) throw new RangeError('Token identifier must not be empty')
    if (jti.startsWith(USER_KEY_PREFIX)) {
      throw new RangeError(`Token identifier must not start with "${USER_KEY_PREFIX}" (got "${jti}")`)
    }
    return this.serialize(() => this.recordRevocation(jti, reason, ttl, options, true))
  }

  /**
   * ユーザーの既存トークンをすべて失効させる
   * 現在時刻より前に発行されたトークンが対象。監査は必須。
   */
  async revokeAllForUser(userId: string, options: RevokeAllOptions = {}): Promise<RevocationOutcome> {
    const reason = this.validateReason(options.reason ?? 'security_breach')
    if (!userId) throw new RangeError('User id must not be empty')

    return this.serialize(async () => {
      const key = userMarkerKey(userId)
      const ttl = this.config.defaultTtlSeconds
      const marker: UserRevocationMarker = {
        kind: 'user',
        userId,
        revokedBefore: new Date(),
        reason,
        ttl,
      }

      await this.writeHot(key, marker, ttl)
      const durable = await this.attemptWrite('durable', () => this.tiers.durable.put(key, marker, ttl))
      const tiers: TierWriteOutcome[] = [{ tier: 'hot', ok: true }, durable]

      this.logger.info(`All tokens revoked for user ${userId}`, { reason })
      this.telemetry.emit('mass_revocation', { reason, userId })
      await this.writeAudit('mass_token_revocation', userId, reason, options.metadata)

      return { key, tiers }
    })
  }

  /**
   * トークンが失効しているかを判定する
   */
  async isRevoked(credential: string, options: CheckOptions = {}): Promise<boolean> {
    const started = Date.now()
    const identifier = this.claims.extractIdentifier(credential)
    const lookup = await this.lookupToken(identifier)

    let revoked = lookup.record !== null
    let source = lookup.source
    let degraded = lookup.degraded

    if (!revoked && (options.checkUserMarker ?? true)) {
      const claims = this.claims.extractClaims(credential)
      if (claims) {
        const markerLookup = await this.lookupMarker(claims.subject)
        degraded = degraded || markerLookup.degraded
        if (markerLookup.marker && claims.issuedAt * 1000 < markerLookup.marker.revokedBefore.getTime()) {
          revoked = true
          source = 'user_marker'
        }
      }
    }

    if (!revoked && degraded) {
      revoked = this.config.failurePolicy === 'closed'
      source = 'degraded'
      this.logger.warn(`Revocation check degraded, failure policy ${this.config.failurePolicy} applied`)
    }

    this.telemetry.emit('token_check', { durationMs: Date.now() - started, revoked, source })
    return revoked
  }

  /**
   * 識別子（jti）で失効を判定する（ユーザー単位の一括失効は見ない）
   */
  async isRevokedByIdentifier(jti: string): Promise<boolean> {
    const started = Date.now()
    const lookup = await this.lookupToken(jti)

    let revoked = lookup.record !== null
    let source = lookup.source
    if (!revoked && lookup.degraded) {
      revoked = this.config.failurePolicy === 'closed'
      source = 'degraded'
      this.logger.warn(`Revocation check degraded, failure policy ${this.config.failurePolicy} applied`)
    }

    this.telemetry.emit('token_check', { durationMs: Date.now() - started, revoked, source })
    return revoked
  }

  /**
   * ユーザーの一括失効時刻を返す（なければ null）
   */
  async userRevokedBefore(userId: string): Promise<Date | null> {
    const { marker } = await this.lookupMarker(userId)
    return marker ? marker.revokedBefore : null
  }

  stats(): BlacklistStats {
    return {
      revocationCount: this.revocationCount,
      uptimeSeconds: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
      membershipTierSize: this.tiers.membership.size(),
      lastCleanup: this.worker.lastCleanupAt,
      startedAt: this.startedAt,
    }
  }

  /**
   * メンバーシップティアの期限切れエントリを掃除する
   */
  async cleanup(): Promise<CleanupResult> {
    return this.worker.run()
  }

  /**
   * 定期掃除を開始する
   */
  start(): void {
    this.worker.start(this.config.cleanupIntervalSeconds)
  }

  stop(): void {
    this.worker.stop()
  }

  private validateReason(reason: string): RevocationReason {
    if (!isRevocationReason(reason)) throw new InvalidReasonError(reason)
    return reason
  }

  private validateTtl(ttl: number | undefined): number {
    if (ttl === undefined) return this.config.defaultTtlSeconds
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw new RangeError(`TTL must be a positive number of seconds (got ${ttl})`)
    }
    return ttl
  }

  /**
   * 状態を変更する処理を1つずつ実行する
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task)
    // 後続のタスクは前のタスクの成否に関わらず実行する
    this.writeQueue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async recordRevocation(
    identifier: string,
    reason: RevocationReason,
    ttl: number,
    options: RevokeOptions,
    byIdentifier: boolean,
  ): Promise<RevocationOutcome> {
    const record: RevocationRecord = {
      kind: 'token',
      identifier,
      reason,
      revokedAt: new Date(),
      ttl,
      ...(options.userId ? { userId: options.userId } : {}),
    }

    await this.writeHot(identifier, record, ttl)
    const rest = await Promise.all([
      this.attemptWrite('membership', () => this.tiers.membership.put(identifier, record, ttl)),
      this.attemptWrite('durable', () => this.tiers.durable.put(identifier, record, ttl)),
    ])

    this.revocationCount++
    this.logger.info(`Token revoked`, { identifier, reason })
    this.telemetry.emit('token_revoked', { count: 1, reason, userId: options.userId, byIdentifier })

    const { userId } = options
    if (userId) {
      void this.writeAudit('token_revoked', userId, reason, options.metadata)
    }

    return { key: identifier, tiers: [{ tier: 'hot', ok: true }, ...rest] }
  }

  private async writeHot(key: string, fact: RevocationFact, ttl: number): Promise<void> {
    try {
      await withTimeout('hot', this.config.timeoutsMs.hot, () => this.tiers.hot.put(key, fact, ttl))
    } catch (error) {
      const message = errorMessage(error)
      this.logger.error(`Hot tier write failed for ${key}: ${message}`)
      this.telemetry.emit('tier_failure', { tier: 'hot', operation: 'write', message })
      throw new TierWriteError('hot', message, { cause: error })
    }
  }

  private async attemptWrite(tier: TierName, write: () => Promise<void>): Promise<TierWriteOutcome> {
    try {
      await withTimeout(tier, this.config.timeoutsMs[tier], write)
      return { tier, ok: true }
    } catch (error) {
      const message = errorMessage(error)
      this.logger.warn(`${tier} tier write failed: ${message}`)
      this.telemetry.emit('tier_failure', { tier, operation: 'write', message })
      return { tier, ok: false, error: message }
    }
  }

  /**
   * ティアから読み取る。失敗は undefined（ミスの null と区別する）
   */
  private async attemptRead<V>(tier: StorageTier<V>, key: string): Promise<V | null | undefined> {
    try {
      return await withTimeout(tier.name, this.config.timeoutsMs[tier.name], () => tier.get(key))
    } catch (error) {
      const message = errorMessage(error)
      this.logger.warn(new TierReadError(tier.name, message, { cause: error }).message)
      this.telemetry.emit('tier_failure', { tier: tier.name, operation: 'read', message })
      return undefined
    }
  }

  private async lookupToken(identifier: string): Promise<TokenLookup> {
    const { hot, membership, durable } = this.tiers
    let failures = 0

    const fromHot = await this.attemptRead(hot, identifier)
    if (fromHot === undefined) failures++
    else if (fromHot?.kind === 'token') {
      this.logger.debug(`Hot tier hit for ${identifier}`)
      return { record: fromHot, source: 'hot', degraded: false }
    }

    const fromMembership = await this.attemptRead(membership, identifier)
    if (fromMembership === undefined) failures++
    else if (fromMembership) {
      await this.promote(identifier, fromMembership, ['hot'])
      return { record: fromMembership, source: 'membership', degraded: false }
    }

    const fromDurable = await this.attemptRead(durable, identifier)
    if (fromDurable === undefined) failures++
    else if (fromDurable?.kind === 'token') {
      await this.promote(identifier, fromDurable, ['hot', 'membership'])
      return { record: fromDurable, source: 'durable', degraded: false }
    }

    return { record: null, source: 'miss', degraded: failures === 3 }
  }

  private async lookupMarker(userId: string): Promise<MarkerLookup> {
    const key = userMarkerKey(userId)
    let failures = 0

    const fromHot = await this.attemptRead(this.tiers.hot, key)
    if (fromHot === undefined) failures++
    else if (fromHot?.kind === 'user') return { marker: fromHot, degraded: false }

    const fromDurable = await this.attemptRead(this.tiers.durable, key)
    if (fromDurable === undefined) failures++
    else if (fromDurable?.kind === 'user') {
      await this.promote(key, fromDurable, ['hot'])
      return { marker: fromDurable, degraded: false }
    }

    return { marker: null, degraded: failures === 2 }
  }

  /**
   * 遅いティアでヒットした事実を速いティアへ残り時間で書き込む
   * 昇格の失敗は判定結果に影響しない。
   */
  private async promote(key: string, fact: RevocationFact, targets: Array<'hot' | 'membership'>): Promise<void> {
    const ttl = remainingTtl(fact)
    if (ttl <= 0) return

    const record = fact.kind === 'token' ? fact : null
    for (const target of targets) {
      let outcome: TierWriteOutcome | null = null
      if (target === 'hot') {
        outcome = await this.attemptWrite('hot', () => this.tiers.hot.put(key, fact, ttl))
      } else if (record) {
        outcome = await this.attemptWrite('membership', () => this.tiers.membership.put(key, record, ttl))
      }
      if (outcome?.ok) this.logger.debug(`Promoted ${key} into ${target} tier`, { ttl })
    }
  }

  private async writeAudit(
    action: AuditAction,
    userId: string,
    reason: RevocationReason,
    metadata: RevocationMetadata = {},
  ): Promise<void> {
    try {
      await this.audit.log({ action, userId, reason, metadata, timestamp: new Date() })
    } catch (error) {
      this.logger.warn(`Audit log write failed for ${action}: ${errorMessage(error)}`)
    }
  }
}

/**
 * 事実の残り有効期間（秒）
 */
function remainingTtl(fact: RevocationFact): number {
  const createdAt = fact.kind === 'token' ? fact.revokedAt : fact.revokedBefore
  return nowInSeconds(createdAt.getTime()) + fact.ttl - nowInSeconds()
}
