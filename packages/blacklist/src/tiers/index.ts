export { decodeFact, encodeFact } from './codec.js'
export { DurableTier } from './durable.js'
export type { DurableTierConfig, RedisClient } from './durable.js'
export { HotTier } from './hot.js'
export type { HotTierConfig } from './hot.js'
export { MembershipTier } from './membership.js'
export type { MembershipEntry } from './membership.js'
export { globToRegExp, withTimeout } from './tier.js'
export type { StorageTier, SweepableTier } from './tier.js'
