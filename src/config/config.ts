import dotenv from 'dotenv'
import moment from 'moment-timezone'
import { fileURLToPath } from 'node:url'
dotenv.config()

const defaultTemplateDir = fileURLToPath(new URL('../../templates', import.meta.url))

export const config = {
  logsDir: process.env.LOGS_DIR ?? './logs',
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logTimezone: process.env.LOG_TIMEZONE ?? moment.tz.guess(),
  logToFile: process.env.LOG_TO_FILE !== 'false',
  templateDir: process.env.TEMPLATE_DIR ?? defaultTemplateDir
}
