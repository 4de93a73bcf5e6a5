import type { DockingConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { artifacts, findEmptyOutputs } from '../../helpers/files.js'
import { runCommand } from '../../helpers/runCommand.js'
import type { Command, StepResult } from '../../types/index.js'

export const LIGAND_PH = 7.4

// -xr keeps the receptor rigid (no rotatable bonds written)
export const receptorConversion = (config: DockingConfig): Command => ({
  bin: config.tools.obabel,
  args: [artifacts.receptorPdb, '-O', artifacts.receptorPdbqt, '-xr'],
  cwd: config.workDir
})

export const ligandConversion = (config: DockingConfig): Command => ({
  bin: config.tools.obabel,
  args: [artifacts.ligandRefPdb, '-O', artifacts.ligandPdbqt, '-h', '-p', String(LIGAND_PH)],
  cwd: config.workDir
})

/** PDB -> PDBQT for receptor and ligand with Open Babel. */
export const convertFormats = async (config: DockingConfig): Promise<StepResult> => {
  const receptor = await runCommand(receptorConversion(config), 'Receptor PDB -> PDBQT')
  if (!receptor.ok) return receptor

  const ligand = await runCommand(
    ligandConversion(config),
    `Ligand PDB -> PDBQT (pH ${LIGAND_PH})`
  )
  if (!ligand.ok) return ligand

  const empty = await findEmptyOutputs(config.workDir, [
    artifacts.receptorPdbqt,
    artifacts.ligandPdbqt
  ])
  if (empty.length > 0) {
    return {
      ok: false,
      error: {
        kind: 'missing-output',
        message: `${empty.join(', ')} could not be created!`,
        hints: ['Is Open Babel installed?']
      }
    }
  }

  logger.info('PDBQT files are ready.')
  return { ok: true, value: undefined }
}
