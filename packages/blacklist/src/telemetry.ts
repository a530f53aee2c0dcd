/**
 * 失効サブシステムのテレメトリ
 * 観測専用。リスナーの例外は記録するだけで制御フローに影響させない。
 */
import { EventEmitter } from 'events'
import { errorMessage } from './errors.js'
import { CheckSource, RevocationReason, TierName } from './types.js'
import defaultLogger, { Logger } from './utils/logger.js'

export interface TelemetryEvents {
  token_revoked: { count: number; reason: RevocationReason; userId?: string; byIdentifier: boolean }
  token_check: { durationMs: number; revoked: boolean; source: CheckSource }
  mass_revocation: { reason: RevocationReason; userId: string }
  tier_failure: { tier: TierName; operation: 'read' | 'write'; message: string }
  cleanup: { removed: number; durationMs: number }
}

export type TelemetryEventName = keyof TelemetryEvents

export class RevocationTelemetry {
  private emitter = new EventEmitter()

  constructor(private logger: Logger = defaultLogger) {}

  on<K extends TelemetryEventName>(event: K, listener: (payload: TelemetryEvents[K]) => void): this {
    this.emitter.on(event, listener)
    return this
  }

  off<K extends TelemetryEventName>(event: K, listener: (payload: TelemetryEvents[K]) => void): this {
    this.emitter.off(event, listener)
    return this
  }

  emit<K extends TelemetryEventName>(event: K, payload: TelemetryEvents[K]): void {
    try {
      this.emitter.emit(event, payload)
    } catch (error) {
      this.logger.warn(`Telemetry listener for ${event} failed: ${errorMessage(error)}`)
    }
  }
}
