import fs from 'fs-extra'
import path from 'node:path'
import YAML from 'yaml'
import type { DockingConfig } from '../../config/docking-config.js'
import { artifacts } from '../../helpers/files.js'
import type { ArtifactEntry, SearchVolume } from '../../types/index.js'

export interface RunSummary {
  startedAt: Date
  finishedAt: Date
  searchVolume: SearchVolume
  artifacts: ArtifactEntry[]
}

/** Record what was run and what it produced, as YAML next to the artifacts. */
export const writeRunSummary = async (
  config: DockingConfig,
  summary: RunSummary
): Promise<string> => {
  const filePath = path.join(config.workDir, artifacts.runSummary)

  const doc = {
    config: { ...config, tools: { ...config.tools } },
    search_volume: summary.searchVolume,
    artifacts: summary.artifacts,
    started_at: summary.startedAt.toISOString(),
    finished_at: summary.finishedAt.toISOString()
  }

  // Avoids line wrapping to keep paths intact.
  const yamlText = YAML.stringify(doc, {
    sortMapEntries: true,
    lineWidth: 0
  })

  const tmpPath = `${filePath}.tmp`
  await fs.writeFile(tmpPath, yamlText, 'utf8')
  await fs.rename(tmpPath, filePath)

  return filePath
}
