import fs from 'fs-extra'
import path from 'node:path'
import type { DockingConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { artifacts } from '../../helpers/files.js'
import { formatFixed } from '../../helpers/format.js'
import { captureCommand, commandFailure, formatCommand } from '../../helpers/runCommand.js'
import type { Command, SearchVolume, StepResult } from '../../types/index.js'

export const buildDockingArgs = (volume: SearchVolume, config: DockingConfig): string[] => {
  const { center, size } = volume
  return [
    '--receptor',
    artifacts.receptorPdbqt,
    '--ligand',
    artifacts.ligandPdbqt,
    '--center_x',
    formatFixed(center.x, 3),
    '--center_y',
    formatFixed(center.y, 3),
    '--center_z',
    formatFixed(center.z, 3),
    '--size_x',
    formatFixed(size.x, 3),
    '--size_y',
    formatFixed(size.y, 3),
    '--size_z',
    formatFixed(size.z, 3),
    '--exhaustiveness',
    String(config.exhaustiveness),
    '--num_modes',
    String(config.numModes),
    '--out',
    artifacts.resultPdbqt
  ]
}

/**
 * Run AutoDock Vina inside the search volume. Recent Vina releases dropped
 * `--log`, so stdout and stderr are captured and written to the log file here,
 * before the exit code is looked at.
 */
export const runDocking = async (
  volume: SearchVolume,
  config: DockingConfig
): Promise<StepResult> => {
  const command: Command = {
    bin: config.tools.vina,
    args: buildDockingArgs(volume, config),
    cwd: config.workDir
  }
  logger.info('>> Starting Vina docking')
  logger.info(`Command: ${formatCommand(command)}`)

  const result = await captureCommand(command)
  let output = result.stdout + result.stderr
  if (result.spawnError) {
    output += `${result.spawnError.message}\n`
  }
  logger.info(output)

  const logFile = path.join(config.workDir, artifacts.dockingLog)
  await fs.outputFile(logFile, output, 'utf8')

  const failure = commandFailure(command, result)
  if (failure) {
    return {
      ok: false,
      error: { ...failure, hints: [...failure.hints, `See ${artifacts.dockingLog}`] }
    }
  }

  logger.info('OK')
  logger.info('Docking completed!')
  return { ok: true, value: undefined }
}
