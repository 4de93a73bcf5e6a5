#!/usr/bin/env node
import { logger } from './helpers/loggers.js'
import { main } from './main.js'

const exitCode = await main(process.argv.slice(2))

// Let the file transports flush before exiting
logger.on('finish', () => process.exit(exitCode))
logger.end()
