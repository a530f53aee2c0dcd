/**
 * 永続ティア（Redis）
 * 複数インスタンス・再起動をまたいで失効情報を共有する。TTLはRedisに任せる。
 */
import { Cluster, Redis } from 'ioredis'
import { RevocationFact } from '../types.js'
import { decodeFact, encodeFact } from './codec.js'
import { StorageTier } from './tier.js'

export type RedisClient = Redis | Cluster

export interface DurableTierConfig {
  /** Redisキーのプレフィックス */
  keyPrefix: string
  /** SCANの1回あたりの取得件数 */
  scanCount: number
}

const defaultConfig: DurableTierConfig = {
  keyPrefix: 'token_blacklist:',
  scanCount: 100,
}

export class DurableTier implements StorageTier<RevocationFact> {
  readonly name = 'durable' as const
  private config: DurableTierConfig

  constructor(
    private redis: RedisClient,
    config: Partial<DurableTierConfig> = {},
  ) {
    this.config = { ...defaultConfig, ...config }
  }

  async get(key: string): Promise<RevocationFact | null> {
    const val = await this.redis.get(this.redisKey(key))
    return val ? decodeFact(val) : null
  }

  async put(key: string, value: RevocationFact, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.redisKey(key), encodeFact(value), 'EX', Math.max(1, Math.ceil(ttlSeconds)))
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.redisKey(key))
  }

  /**
   * パターンに一致するキーを SCAN + UNLINK で削除する
   * クラスタ構成では全マスターノードを走査する。
   */
  async deleteMatching(pattern: string): Promise<number> {
    const nodes = this.redis instanceof Cluster ? this.redis.nodes('master') : [this.redis]
    let removed = 0
    for (const node of nodes) {
      removed += await this.deleteMatchingOnNode(node, this.redisKey(pattern))
    }
    return removed
  }

  private async deleteMatchingOnNode(node: Redis, pattern: string): Promise<number> {
    let cursor = '0'
    let removed = 0
    do {
      const [next, keys] = await node.scan(cursor, 'MATCH', pattern, 'COUNT', this.config.scanCount)
      if (keys.length > 0) {
        removed += await node.unlink(...keys)
      }
      cursor = next
    } while (cursor !== '0')
    return removed
  }

  private redisKey(key: string): string {
    return `${this.config.keyPrefix}${key}`
  }
}
