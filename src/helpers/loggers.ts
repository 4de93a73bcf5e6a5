import { createLogger, transports, format } from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import moment from 'moment-timezone'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf, colorize } = format
const logsFolder = config.logsDir

const customTimestamp = () => moment().tz(config.logTimezone).format('YYYY-MM-DD HH:mm:ss')

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label}] ${message}`
})

const fileTransports = config.logToFile
  ? [
      new DailyRotateFile({
        filename: `${logsFolder}/docking-pipeline-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: '14d'
      }),
      new DailyRotateFile({
        level: 'error',
        filename: `${logsFolder}/docking-pipeline-error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: '30d'
      })
    ]
  : []

const logger = createLogger({
  level: config.logLevel,
  format: combine(
    label({ label: 'docking-pipeline' }),
    timestamp({ format: customTimestamp }),
    logFormat
  ),
  transports: [...fileTransports, new transports.Console({ format: combine(colorize(), logFormat) })]
})

export { logger }
