import fs from 'fs-extra'
import path from 'node:path'
import type { DockingConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { artifacts, listArtifacts } from '../../helpers/files.js'
import type { ResultsReport } from '../../types/index.js'

export const reportedArtifacts = [
  artifacts.receptorPdbqt,
  artifacts.ligandPdbqt,
  artifacts.resultPdbqt,
  artifacts.dockingLog
] as const

/** Print the docking log and the artifacts that exist. Never fails the run. */
export const reportResults = async (config: DockingConfig): Promise<ResultsReport> => {
  const logFile = path.join(config.workDir, artifacts.dockingLog)
  let log: string | null = null

  if (await fs.pathExists(logFile)) {
    try {
      log = await fs.readFile(logFile, 'utf8')
      logger.info(log)
    } catch (error) {
      logger.warn(`Could not read ${artifacts.dockingLog}: ${error}`)
    }
  } else {
    logger.warn(`Log file not found, check ${artifacts.resultPdbqt} file.`)
  }

  const found = await listArtifacts(config.workDir, reportedArtifacts)
  logger.info('Created files:')
  for (const { file, bytes } of found) {
    logger.info(`  ${file.padEnd(25)}  (${bytes} bytes)`)
  }

  return { log, artifacts: found }
}
