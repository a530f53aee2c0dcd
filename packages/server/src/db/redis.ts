/**
 * Redisクライアントの初期化
 * 失効情報の永続ティアとして使用する。単一ノードとクラスタの両方に対応。
 */
import { Cluster, Redis } from 'ioredis'
import { RedisClient } from 'token-blacklist'
import logger from '../utils/logger.js'

let redis: RedisClient | null = null

/**
 * "host:port,host:port" 形式のクラスタノード定義を解析する
 * @param hosts REDIS_CLUSTER_HOSTS の値
 */
export function parseClusterHosts(hosts: string): Array<{ host: string; port: number }> {
  return hosts
    .split(',')
    .map((h) => h.trim())
    .filter((h) => h.length > 0)
    .map((h) => {
      const [host, port] = h.split(':')
      return { host, port: Number(port || 6379) }
    })
}

/**
 * Redisに接続
 * REDIS_CLUSTER_HOSTS があればクラスタ、なければ REDIS_URL の単一ノードに接続する。
 */
export async function connectToRedis(): Promise<RedisClient> {
  const hosts = process.env.REDIS_CLUSTER_HOSTS
  const url = process.env.REDIS_URL

  const onError = (error: Error) => {
    logger.error(`Redis error: ${error.message}`)
  }

  if (hosts) {
    const cluster = new Cluster(parseClusterHosts(hosts))
    cluster.on('error', onError)
    redis = cluster
    logger.info('Connecting to Redis Cluster')
  } else if (url) {
    const single = new Redis(url)
    single.on('error', onError)
    redis = single
    logger.info('Connecting to Redis')
  } else {
    throw new Error('REDIS_URL or REDIS_CLUSTER_HOSTS is not set in .env')
  }

  return redis
}

/**
 * Redisクライアントを取得
 */
export function getRedisClient(): RedisClient | null {
  return redis
}

/**
 * Redisの接続を閉じる
 */
export async function closeConnection(): Promise<void> {
  if (redis) {
    await redis.quit()
    logger.info('Disconnected from Redis')
    redis = null
  }
}
