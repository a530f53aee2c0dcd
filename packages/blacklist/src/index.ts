export { noopAuditSink } from './audit.js'
export type { AuditAction, AuditEvent, AuditSink } from './audit.js'
export { USER_KEY_PREFIX, createClaimsExtractor, hashCredential } from './claims.js'
export type { ClaimsExtractor, SubjectClaims, TokenClaims, VerifyCredential } from './claims.js'
export { CleanupWorker } from './cleanup.js'
export type { CleanupWorkerOptions } from './cleanup.js'
export { buildBlacklistConfig, defaultBlacklistConfig, validateBlacklistConfig } from './config.js'
export type { BlacklistConfig, Env } from './config.js'
export { TokenBlacklist, userMarkerKey } from './coordinator.js'
export type { BlacklistTiers, TokenBlacklistOptions } from './coordinator.js'
export {
  InvalidReasonError,
  PayloadDecodeError,
  TierReadError,
  TierTimeoutError,
  TierWriteError,
  errorMessage,
} from './errors.js'
export { RevocationTelemetry } from './telemetry.js'
export type { TelemetryEventName, TelemetryEvents } from './telemetry.js'
export * from './tiers/index.js'
export { REVOCATION_REASONS, isRevocationReason } from './types.js'
export type {
  BlacklistStats,
  CheckOptions,
  CheckSource,
  CleanupResult,
  FailurePolicy,
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
} from './types.js'
export { lineFormat } from './utils/logger.js'
export type { Logger } from './utils/logger.js'
export { nowInSeconds, parseTimeToSeconds } from './utils/time.js'
