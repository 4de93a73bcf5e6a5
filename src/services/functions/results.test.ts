import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'
import { defaultConfig } from '../../config/docking-config.js'
import { logger } from '../../helpers/loggers.js'
import { reportResults } from './results.js'

describe('reportResults', () => {
  let workDir: string

  beforeEach(async () => {
    vi.clearAllMocks()
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'results-'))
  })

  afterEach(async () => {
    await fs.remove(workDir)
  })

  it('prints the log and lists the artifacts in a fixed order', async () => {
    await fs.writeFile(path.join(workDir, 'result_log.txt'), 'mode | affinity\n1 -7.2\n')
    await fs.writeFile(path.join(workDir, 'result.pdbqt'), 'MODEL 1\n')
    await fs.writeFile(path.join(workDir, 'receptor.pdbqt'), 'ATOM\n')

    const report = await reportResults({ ...defaultConfig(), workDir })

    expect(report).toEqual({
      log: 'mode | affinity\n1 -7.2\n',
      artifacts: [
        { file: 'receptor.pdbqt', bytes: 5 },
        { file: 'result.pdbqt', bytes: 8 },
        { file: 'result_log.txt', bytes: 23 }
      ]
    })
    expect(logger.info).toHaveBeenCalledWith('mode | affinity\n1 -7.2\n')
    expect(logger.info).toHaveBeenCalledWith('  receptor.pdbqt             (5 bytes)')
  })

  it('still lists artifacts when the log is missing', async () => {
    await fs.writeFile(path.join(workDir, 'ligand.pdbqt'), 'abc')

    const report = await reportResults({ ...defaultConfig(), workDir })

    expect(report).toEqual({ log: null, artifacts: [{ file: 'ligand.pdbqt', bytes: 3 }] })
    expect(logger.warn).toHaveBeenCalledWith('Log file not found, check result.pdbqt file.')
    expect(logger.info).toHaveBeenCalledWith('  ligand.pdbqt               (3 bytes)')
  })

  it('lists nothing in an empty directory', async () => {
    const report = await reportResults({ ...defaultConfig(), workDir })
    expect(report).toEqual({ log: null, artifacts: [] })
  })
})
