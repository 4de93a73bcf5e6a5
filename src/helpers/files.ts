import fs from 'fs-extra'
import path from 'node:path'
import type { ArtifactEntry } from '../types/index.js'

// Fixed artifact names, relative to the run's working directory
export const artifacts = {
  prepScript: 'prepare.pml',
  receptorPdb: 'receptor.pdb',
  ligandRefPdb: 'ligand_ref.pdb',
  receptorPdbqt: 'receptor.pdbqt',
  ligandPdbqt: 'ligand.pdbqt',
  resultPdbqt: 'result.pdbqt',
  dockingLog: 'result_log.txt',
  runSummary: 'run_summary.yaml'
} as const

/** Size in bytes, or `null` when the file does not exist. */
export const fileSize = async (file: string): Promise<number | null> => {
  if (!(await fs.pathExists(file))) return null
  const stats = await fs.stat(file)
  return stats.size
}

/** Names of the files in `dir` that are missing or empty. */
export const findEmptyOutputs = async (dir: string, files: string[]): Promise<string[]> => {
  const empty: string[] = []
  for (const file of files) {
    const size = await fileSize(path.join(dir, file))
    if (!size) empty.push(file)
  }
  return empty
}

export const listArtifacts = async (
  dir: string,
  files: readonly string[]
): Promise<ArtifactEntry[]> => {
  const found: ArtifactEntry[] = []
  for (const file of files) {
    const bytes = await fileSize(path.join(dir, file))
    if (bytes !== null) found.push({ file, bytes })
  }
  return found
}
