/**
 * 期限切れエントリの定期掃除
 * メンバーシップティアだけを対象とする。他のティアはTTLで自然に消える。
 */
import { MAX_CLEANUP_INTERVAL_SECONDS } from './config.js'
import { errorMessage } from './errors.js'
import { RevocationTelemetry } from './telemetry.js'
import { SweepableTier } from './tiers/tier.js'
import { CleanupResult, RevocationRecord } from './types.js'
import defaultLogger, { Logger } from './utils/logger.js'

export interface CleanupWorkerOptions {
  logger?: Logger
  telemetry?: RevocationTelemetry
}

export class CleanupWorker {
  private timer: NodeJS.Timeout | null = null
  private logger: Logger
  private telemetry?: RevocationTelemetry
  lastCleanupAt: Date | null = null

  constructor(
    private tier: SweepableTier<RevocationRecord>,
    options: CleanupWorkerOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger
    this.telemetry = options.telemetry
  }

  /**
   * 1回掃除する
   */
  run(): CleanupResult {
    const started = Date.now()
    const removed = this.tier.sweepExpired(started)
    const ranAt = new Date(started)
    this.lastCleanupAt = ranAt

    const durationMs = Date.now() - started
    this.logger.debug(`Blacklist cleanup removed ${removed} expired entries`, { durationMs })
    this.telemetry?.emit('cleanup', { removed, durationMs })
    return { removed, ranAt }
  }

  /**
   * 定期実行を開始する（二重起動は無視）
   * @param intervalSeconds 実行間隔（秒）
   */
  start(intervalSeconds: number): void {
    if (this.timer) return
    if (intervalSeconds > MAX_CLEANUP_INTERVAL_SECONDS) {
      this.logger.warn(
        `Blacklist cleanup interval ${intervalSeconds}s exceeds the timer limit, using ${MAX_CLEANUP_INTERVAL_SECONDS}s`,
      )
      intervalSeconds = MAX_CLEANUP_INTERVAL_SECONDS
    }

    this.timer = setInterval(() => {
      try {
        this.run()
      } catch (error) {
        this.logger.error(`Blacklist cleanup failed: ${errorMessage(error)}`)
      }
    }, intervalSeconds * 1000)
    this.timer.unref()
    this.logger.info(`Blacklist cleanup scheduled every ${intervalSeconds}s`)
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  get running(): boolean {
    return this.timer !== null
  }
}
