import fs from 'fs'
import path from 'path'
import { lineFormat } from 'token-blacklist'
import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'

const logDir = process.env.LOG_DIR || 'logs'
const retentionDays = parseInt(process.env.LOG_RETENTION_DAYS || '14', 10)
const level = process.env.LOG_LEVEL || 'info'
const fileLevel = process.env.LOG_FILE_LEVEL || level
const consoleLevel = process.env.LOG_CONSOLE_LEVEL || level

// ログディレクトリが存在しない場合は作成
const logDirPath = path.resolve(process.cwd(), logDir)
if (!fs.existsSync(logDirPath)) {
  fs.mkdirSync(logDirPath, { recursive: true })
}

const transport = new DailyRotateFile({
  dirname: logDirPath,
  filename: 'revocation-%DATE%.log',
  datePattern: 'YYYY-MM-DD',
  zippedArchive: true,
  maxSize: '20m',
  maxFiles: `${retentionDays}d`,
  auditFile: path.join(logDirPath, 'audit.json'),
  createSymlink: true,
  symlinkName: 'revocation-current.log',
  level: fileLevel,
})

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    lineFormat,
  ),
  transports: [
    transport,
    new winston.transports.Console({
      level: consoleLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY/MM/DD HH:mm:ss' }),
        lineFormat,
        winston.format.colorize({ all: true }),
      ),
    }),
  ],
})

// ファイル作成・ローテーション時のイベントハンドラ
transport.on('new', (filename: string) => {
  logger.info(`New log file created: ${filename}`)
})
transport.on('rotate', (oldFilename: string, newFilename: string) => {
  logger.info(`Log rotated from ${oldFilename} to ${newFilename}`)
})

logger.info(`Log directory: ${logDirPath}`)
logger.info(`Log retention: ${retentionDays} days`)
logger.debug(`Log levels: file=${fileLevel}, console=${consoleLevel}`)

export default logger
