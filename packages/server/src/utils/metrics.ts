/**
 * 失効サブシステムの運用カウンタ
 * テレメトリイベントを購読して集計する。
 */
import { CheckSource, RevocationTelemetry, TierName } from 'token-blacklist'

export interface MetricsSnapshot {
  revocations: Record<string, number>
  massRevocations: number
  checks: number
  revokedChecks: number
  checksBySource: Record<CheckSource, number>
  tierFailures: Record<TierName, number>
  cleanupRuns: number
  cleanupRemoved: number
  /** 失効チェックの平均所要時間（ミリ秒） */
  averageCheckMs: number
}

export class RevocationMetrics {
  private revocations: Record<string, number> = {}
  private massRevocations = 0
  private checks = 0
  private revokedChecks = 0
  private checkDurationTotalMs = 0
  private checksBySource: Record<CheckSource, number> = {
    hot: 0,
    membership: 0,
    durable: 0,
    user_marker: 0,
    miss: 0,
    degraded: 0,
  }
  private tierFailures: Record<TierName, number> = { hot: 0, membership: 0, durable: 0 }
  private cleanupRuns = 0
  private cleanupRemoved = 0

  /**
   * テレメトリの購読を開始する
   */
  attach(telemetry: RevocationTelemetry): this {
    telemetry
      .on('token_revoked', ({ count, reason }) => {
        this.revocations[reason] = (this.revocations[reason] ?? 0) + count
      })
      .on('mass_revocation', () => {
        this.massRevocations++
      })
      .on('token_check', ({ durationMs, revoked, source }) => {
        this.checks++
        if (revoked) this.revokedChecks++
        this.checkDurationTotalMs += durationMs
        this.checksBySource[source]++
      })
      .on('tier_failure', ({ tier }) => {
        this.tierFailures[tier]++
      })
      .on('cleanup', ({ removed }) => {
        this.cleanupRuns++
        this.cleanupRemoved += removed
      })
    return this
  }

  snapshot(): MetricsSnapshot {
    return {
      revocations: { ...this.revocations },
      massRevocations: this.massRevocations,
      checks: this.checks,
      revokedChecks: this.revokedChecks,
      checksBySource: { ...this.checksBySource },
      tierFailures: { ...this.tierFailures },
      cleanupRuns: this.cleanupRuns,
      cleanupRemoved: this.cleanupRemoved,
      averageCheckMs: this.checks > 0 ? this.checkDurationTotalMs / this.checks : 0,
    }
  }
}
