import type { DockingConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { artifacts } from '../../helpers/files.js'
import { prepareStructures } from '../functions/structure-prep.js'
import { calculateGrid } from '../functions/grid-box.js'
import { convertFormats } from '../functions/format-conversion.js'
import { runDocking } from '../functions/docking.js'
import { reportResults } from '../functions/results.js'
import { writeRunSummary } from '../functions/run-summary.js'
import type {
  PipelineError,
  ResultsReport,
  SearchVolume,
  StepResult
} from '../../types/index.js'

export interface PipelineSteps {
  prepareStructures: (config: DockingConfig) => Promise<StepResult>
  calculateGrid: (config: DockingConfig) => Promise<StepResult<SearchVolume>>
  convertFormats: (config: DockingConfig) => Promise<StepResult>
  runDocking: (volume: SearchVolume, config: DockingConfig) => Promise<StepResult>
  reportResults: (config: DockingConfig) => Promise<ResultsReport>
}

export const defaultSteps: PipelineSteps = {
  prepareStructures,
  calculateGrid,
  convertFormats,
  runDocking,
  reportResults
}

const banner = (step: number, title: string) => {
  logger.info('='.repeat(55))
  logger.info(`STEP ${step}: ${title}`)
  logger.info('='.repeat(55))
}

const stopPipeline = (error: PipelineError): number => {
  logger.error(`[ERROR] ${error.message}`)
  for (const hint of error.hints) {
    logger.error(`  - ${hint}`)
  }
  logger.error('Pipeline stopped')
  return 1
}

const logNextSteps = () => {
  logger.info('Next steps:')
  logger.info(`  1. Check binding affinity scores in ${artifacts.dockingLog}`)
  logger.info(`  2. Open ${artifacts.resultPdbqt} in PyMOL to visualize poses`)
  logger.info(`  3. Load the best pose together with ${artifacts.receptorPdb} and analyze`)
}

/**
 * Prepare -> grid -> convert -> dock -> report. The first failing step ends
 * the run; files already written stay on disk.
 *
 * @returns process exit status, 0 on success and 1 on any failure
 */
export const runDockingPipeline = async (
  config: DockingConfig,
  steps: PipelineSteps = defaultSteps
): Promise<number> => {
  const startedAt = new Date()
  logger.info(
    `Docking ${config.ligandResn} into ${config.pdbId} chain ${config.chain} in ${config.workDir}`
  )

  banner(1, 'Preparing protein and ligand (PyMOL)')
  const prepared = await steps.prepareStructures(config)
  if (!prepared.ok) return stopPipeline(prepared.error)

  banner(2, 'Calculating automatic grid (ligand coordinates)')
  const grid = await steps.calculateGrid(config)
  if (!grid.ok) return stopPipeline(grid.error)

  banner(3, 'Converting formats (Open Babel)')
  const converted = await steps.convertFormats(config)
  if (!converted.ok) return stopPipeline(converted.error)

  banner(4, 'Running docking (AutoDock Vina)')
  const docked = await steps.runDocking(grid.value, config)
  if (!docked.ok) return stopPipeline(docked.error)

  banner(5, 'Results')
  const report = await steps.reportResults(config)

  // Docking already succeeded, so a failed summary does not fail the run
  try {
    const summaryFile = await writeRunSummary(config, {
      startedAt,
      finishedAt: new Date(),
      searchVolume: grid.value,
      artifacts: report.artifacts
    })
    logger.info(`Run summary written to ${summaryFile}`)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(`Could not write run summary: ${message}`)
  }

  logNextSteps()
  return 0
}
