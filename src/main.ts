import { logger } from './helpers/loggers.js'
import { ConfigError, loadDockingConfig } from './config/docking-config.js'
import { runDockingPipeline } from './services/pipelines/docking-pipeline.js'

const usage = `Usage: docking-pipeline [config.yaml]

Settings come from the optional YAML file, then from the environment
(PDB_ID, CHAIN, LIGAND_RESN, PADDING, EXHAUSTIVENESS, NUM_MODES, WORK_DIR,
PYMOL, OBABEL, VINA).`

export const main = async (argv: string[]): Promise<number> => {
  const [configFile] = argv
  if (configFile === '-h' || configFile === '--help') {
    logger.info(usage)
    return 0
  }

  try {
    const config = await loadDockingConfig({ file: configFile })
    return await runDockingPipeline(config)
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message)
    } else {
      logger.error(`Pipeline aborted: ${error instanceof Error ? error.stack : error}`)
    }
    return 1
  }
}
