import { describe, expect, it } from 'vitest'
import { buildBlacklistConfig, defaultBlacklistConfig, validateBlacklistConfig } from './config.js'

describe('buildBlacklistConfig', () => {
  it('環境変数が空なら既定値', () => {
    expect(buildBlacklistConfig({})).toEqual(defaultBlacklistConfig)
  })

  it('環境変数を読み取る', () => {
    const config = buildBlacklistConfig({
      REFRESH_TOKEN_EXPIRATION: '7d',
      BLACKLIST_CLEANUP_INTERVAL: '30m',
      BLACKLIST_FAILURE_POLICY: 'closed',
      BLACKLIST_HOT_MAX_ENTRIES: '500',
      BLACKLIST_HOT_TIMEOUT_MS: '2',
      BLACKLIST_MEMBERSHIP_TIMEOUT_MS: '3',
      BLACKLIST_DURABLE_TIMEOUT_MS: '100',
      BLACKLIST_REDIS_PREFIX: 'revoked:',
    })
    expect(config).toEqual({
      defaultTtlSeconds: 604800,
      cleanupIntervalSeconds: 1800,
      failurePolicy: 'closed',
      hotMaxEntries: 500,
      timeoutsMs: { hot: 2, membership: 3, durable: 100 },
      redisKeyPrefix: 'revoked:',
    })
  })

  it('数値として読めない値は既定値', () => {
    const config = buildBlacklistConfig({ BLACKLIST_HOT_MAX_ENTRIES: 'lots', BLACKLIST_DURABLE_TIMEOUT_MS: '-1' })
    expect(config.hotMaxEntries).toBe(10000)
    expect(config.timeoutsMs.durable).toBe(50)
  })
})

describe('validateBlacklistConfig', () => {
  it('未設定・正しい値なら問題なし', () => {
    expect(validateBlacklistConfig({})).toEqual([])
    expect(
      validateBlacklistConfig({
        REFRESH_TOKEN_EXPIRATION: '1d2h',
        BLACKLIST_CLEANUP_INTERVAL: '600',
        BLACKLIST_FAILURE_POLICY: 'open',
        BLACKLIST_HOT_TIMEOUT_MS: '0',
      }),
    ).toEqual([])
  })

  it('不正な値をすべて報告する', () => {
    const problems = validateBlacklistConfig({
      REFRESH_TOKEN_EXPIRATION: 'forever',
      BLACKLIST_CLEANUP_INTERVAL: '0s',
      BLACKLIST_FAILURE_POLICY: 'maybe',
      BLACKLIST_HOT_MAX_ENTRIES: '0',
      BLACKLIST_DURABLE_TIMEOUT_MS: 'fast',
    })
    expect(problems).toEqual([
      'REFRESH_TOKEN_EXPIRATION must be a positive duration such as "30d" or "1h" (got "forever")',
      'BLACKLIST_CLEANUP_INTERVAL must be a positive duration such as "30d" or "1h" (got "0s")',
      'BLACKLIST_FAILURE_POLICY must be "open" or "closed" (got "maybe")',
      'BLACKLIST_HOT_MAX_ENTRIES must be a positive integer (got "0")',
      'BLACKLIST_DURABLE_TIMEOUT_MS must be a non-negative integer (got "fast")',
    ])
  })

  it('タイマーの上限を超える掃除間隔を報告する', () => {
    expect(validateBlacklistConfig({ BLACKLIST_CLEANUP_INTERVAL: '30d' })).toEqual([
      'BLACKLIST_CLEANUP_INTERVAL must be at most 2147483 seconds (got "30d")',
    ])
    expect(validateBlacklistConfig({ BLACKLIST_CLEANUP_INTERVAL: '24d' })).toEqual([])
  })
})
