import fs from 'fs-extra'
import path from 'node:path'
import Handlebars from 'handlebars'
import { config as envConfig } from '../../config/config.js'
import type { DockingConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { artifacts, findEmptyOutputs } from '../../helpers/files.js'
import { runCommand } from '../../helpers/runCommand.js'
import type { StepResult } from '../../types/index.js'

interface PrepScriptParams {
  pdbId: string
  chain: string
  ligandResn: string
  receptorFile: string
  ligandFile: string
}

const readTemplate = async (templateName: string): Promise<string> => {
  const templateFile = path.join(envConfig.templateDir, `${templateName}.handlebars`)
  return fs.readFile(templateFile, 'utf8')
}

export const renderPrepScript = async (config: DockingConfig): Promise<string> => {
  const params: PrepScriptParams = {
    pdbId: config.pdbId,
    chain: config.chain,
    ligandResn: config.ligandResn,
    receptorFile: artifacts.receptorPdb,
    ligandFile: artifacts.ligandRefPdb
  }
  const templ = Handlebars.compile<PrepScriptParams>(await readTemplate('prepare.pml'), {
    noEscape: true
  })
  return templ(params)
}

/**
 * Fetch the structure with PyMOL, strip water, add hydrogens and save the
 * receptor chain and the reference ligand as separate PDB files.
 */
export const prepareStructures = async (config: DockingConfig): Promise<StepResult> => {
  const scriptFile = path.join(config.workDir, artifacts.prepScript)
  logger.info(`Write Input File: ${scriptFile}`)
  await fs.outputFile(scriptFile, await renderPrepScript(config))

  const ran = await runCommand(
    { bin: config.tools.pymol, args: ['-c', artifacts.prepScript], cwd: config.workDir },
    'Preparing protein with PyMOL'
  )
  if (!ran.ok) return ran

  const empty = await findEmptyOutputs(config.workDir, [
    artifacts.receptorPdb,
    artifacts.ligandRefPdb
  ])
  if (empty.length > 0) {
    return {
      ok: false,
      error: {
        kind: 'missing-output',
        message: `${empty.join(', ')} could not be created or is empty!`,
        hints: ['Is the PDB ID correct? Is the ligand residue name correct?']
      }
    }
  }

  logger.info('Protein and ligand PDB files are ready.')
  return { ok: true, value: undefined }
}
