/**
 * 失効サブシステムの設定
 * 環境変数から組み立てる。テストでは env を差し替える。
 */
import { FailurePolicy, TierName } from './types.js'
import { parseTimeToSeconds } from './utils/time.js'

export interface BlacklistConfig {
  /** 失効レコード・マーカーの既定TTL（秒） */
  defaultTtlSeconds: number
  /** 掃除間隔（秒） */
  cleanupIntervalSeconds: number
  /** 全ティア不達時の判定方針 */
  failurePolicy: FailurePolicy
  /** ホットティアの最大件数 */
  hotMaxEntries: number
  /** ティアごとのタイムアウト（ミリ秒） */
  timeoutsMs: Record<TierName, number>
  /** Redisキーのプレフィックス */
  redisKeyPrefix: string
}

export type Env = Record<string, string | undefined>

export const defaultBlacklistConfig: BlacklistConfig = {
  defaultTtlSeconds: 30 * 86400,
  cleanupIntervalSeconds: 3600,
  failurePolicy: 'open',
  hotMaxEntries: 10000,
  timeoutsMs: { hot: 5, membership: 5, durable: 50 },
  redisKeyPrefix: 'token_blacklist:',
}

/**
 * タイマーに渡せる最大の掃除間隔（秒）
 * これを超える遅延はNodeが1msに切り詰める。
 */
export const MAX_CLEANUP_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000)

const DURATION_PATTERN = /^(\d+|(\d+[dhms])+)$/
const INTEGER_PATTERN = /^\d+$/

function intFromEnv(value: string | undefined, fallback: number): number {
  return value && INTEGER_PATTERN.test(value) ? parseInt(value, 10) : fallback
}

/**
 * 環境変数から設定を組み立てる
 * 読めない値は既定値になる。起動時は先に validateBlacklistConfig で検査すること。
 */
export function buildBlacklistConfig(env: Env = process.env): BlacklistConfig {
  const defaults = defaultBlacklistConfig
  return {
    defaultTtlSeconds: parseTimeToSeconds(env.REFRESH_TOKEN_EXPIRATION || '30d'),
    cleanupIntervalSeconds: parseTimeToSeconds(env.BLACKLIST_CLEANUP_INTERVAL || '1h'),
    failurePolicy: env.BLACKLIST_FAILURE_POLICY === 'closed' ? 'closed' : 'open',
    hotMaxEntries: intFromEnv(env.BLACKLIST_HOT_MAX_ENTRIES, defaults.hotMaxEntries),
    timeoutsMs: {
      hot: intFromEnv(env.BLACKLIST_HOT_TIMEOUT_MS, defaults.timeoutsMs.hot),
      membership: intFromEnv(env.BLACKLIST_MEMBERSHIP_TIMEOUT_MS, defaults.timeoutsMs.membership),
      durable: intFromEnv(env.BLACKLIST_DURABLE_TIMEOUT_MS, defaults.timeoutsMs.durable),
    },
    redisKeyPrefix: env.BLACKLIST_REDIS_PREFIX || defaults.redisKeyPrefix,
  }
}

/**
 * 環境変数を検証し、問題点の一覧を返す（問題がなければ空配列）
 */
export function validateBlacklistConfig(env: Env = process.env): string[] {
  const problems: string[] = []

  for (const name of ['REFRESH_TOKEN_EXPIRATION', 'BLACKLIST_CLEANUP_INTERVAL']) {
    const value = env[name]
    if (value && (!DURATION_PATTERN.test(value) || parseTimeToSeconds(value) === 0)) {
      problems.push(`${name} must be a positive duration such as "30d" or "1h" (got "${value}")`)
    }
  }

  const interval = env.BLACKLIST_CLEANUP_INTERVAL
  if (interval && DURATION_PATTERN.test(interval) && parseTimeToSeconds(interval) > MAX_CLEANUP_INTERVAL_SECONDS) {
    problems.push(
      `BLACKLIST_CLEANUP_INTERVAL must be at most ${MAX_CLEANUP_INTERVAL_SECONDS} seconds (got "${interval}")`,
    )
  }

  const policy = env.BLACKLIST_FAILURE_POLICY
  if (policy && policy !== 'open' && policy !== 'closed') {
    problems.push(`BLACKLIST_FAILURE_POLICY must be "open" or "closed" (got "${policy}")`)
  }

  const maxEntries = env.BLACKLIST_HOT_MAX_ENTRIES
  if (maxEntries && (!INTEGER_PATTERN.test(maxEntries) || parseInt(maxEntries, 10) < 1)) {
    problems.push(`BLACKLIST_HOT_MAX_ENTRIES must be a positive integer (got "${maxEntries}")`)
  }

  for (const name of ['BLACKLIST_HOT_TIMEOUT_MS', 'BLACKLIST_MEMBERSHIP_TIMEOUT_MS', 'BLACKLIST_DURABLE_TIMEOUT_MS']) {
    const value = env[name]
    if (value && !INTEGER_PATTERN.test(value)) {
      problems.push(`${name} must be a non-negative integer (got "${value}")`)
    }
  }

  return problems
}
