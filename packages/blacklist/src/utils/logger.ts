import winston from 'winston'

const level = process.env.LOG_LEVEL || 'info'

/**
 * ログ1行の整形
 * 例: 2025/01/01 12:00:00 [INFO ] Token revoked {"reason":"logout"}
 */
export const lineFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  // ログレベルを5文字で統一
  const paddedLevel = level.toUpperCase().padEnd(5, ' ')
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
  return `${timestamp} [${paddedLevel}] ${message}${metaStr}`
})

/**
 * 失効サブシステムの既定ロガー
 * サーバー側ではファイル出力付きのロガーを注入する。
 */
const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    lineFormat,
  ),
  transports: [new winston.transports.Console()],
})

export type Logger = winston.Logger

export default logger
