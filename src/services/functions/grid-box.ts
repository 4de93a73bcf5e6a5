import fs from 'fs-extra'
import path from 'node:path'
import { logger } from '../../helpers/loggers.js'
import { artifacts } from '../../helpers/files.js'
import { formatFixed } from '../../helpers/format.js'
import type { DockingConfig } from '../../config/docking-config.js'
import type { SearchVolume, StepResult, Vec3 } from '../../types/index.js'

// Smallest edge the search box may have on any axis, in Angstrom
export const MIN_BOX_SIZE = 15.0

const axes = ['x', 'y', 'z'] as const
type Axis = (typeof axes)[number]

const decimalRe = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

// PDB coordinate fields, 0-indexed [start, end): columns 31-38, 39-46, 47-54
const coordinateColumns: Record<Axis, [number, number]> = {
  x: [30, 38],
  y: [38, 46],
  z: [46, 54]
}

const byAxis = (fn: (axis: Axis) => number): Vec3 => ({
  x: fn('x'),
  y: fn('y'),
  z: fn('z')
})

const parseField = (line: string, axis: Axis): number | null => {
  const [start, end] = coordinateColumns[axis]
  const field = line.slice(start, end).trim()
  return decimalRe.test(field) ? Number(field) : null
}

/**
 * Collect x/y/z from every ATOM and HETATM record. Records whose coordinate
 * fields are short or not decimal numbers are skipped without notice.
 */
export const parseAtomCoordinates = (text: string): Vec3[] => {
  const coords: Vec3[] = []
  for (const line of text.split(/\r?\n/)) {
    if (!line.startsWith('ATOM') && !line.startsWith('HETATM')) continue
    const x = parseField(line, 'x')
    const y = parseField(line, 'y')
    const z = parseField(line, 'z')
    if (x === null || y === null || z === null) continue
    coords.push({ x, y, z })
  }
  return coords
}

/**
 * Center is the mean position; each edge is the coordinate span plus padding on
 * both sides, never smaller than MIN_BOX_SIZE.
 */
export const computeSearchVolume = (
  coords: Vec3[],
  padding: number
): StepResult<SearchVolume> => {
  if (coords.length === 0) {
    return {
      ok: false,
      error: { kind: 'no-coordinates', message: 'No atom coordinates found', hints: [] }
    }
  }

  const min = byAxis((axis) =>
    coords.reduce((lo, c) => Math.min(lo, c[axis]), Infinity)
  )
  const max = byAxis((axis) =>
    coords.reduce((hi, c) => Math.max(hi, c[axis]), -Infinity)
  )
  const center = byAxis(
    (axis) => coords.reduce((sum, c) => sum + c[axis], 0) / coords.length
  )
  const size = byAxis((axis) =>
    Math.max(max[axis] - min[axis] + 2 * padding, MIN_BOX_SIZE)
  )

  return { ok: true, value: { center, size } }
}

const formatVec3 = (v: Vec3): string =>
  `X=${formatFixed(v.x, 2)}  Y=${formatFixed(v.y, 2)}  Z=${formatFixed(v.z, 2)}`

export const calculateGrid = async (
  config: DockingConfig
): Promise<StepResult<SearchVolume>> => {
  const ligandFile = path.join(config.workDir, artifacts.ligandRefPdb)
  if (!(await fs.pathExists(ligandFile))) {
    return {
      ok: false,
      error: {
        kind: 'missing-output',
        message: `${artifacts.ligandRefPdb} does not exist`,
        hints: ['Run the structure preparation step first.']
      }
    }
  }

  const coords = parseAtomCoordinates(await fs.readFile(ligandFile, 'utf8'))
  const result = computeSearchVolume(coords, config.padding)
  if (!result.ok) {
    return {
      ok: false,
      error: {
        ...result.error,
        message: `No coordinates found in ${artifacts.ligandRefPdb}!`,
        hints: [`Is the ligand residue name correct? (${config.ligandResn})`]
      }
    }
  }

  const { center, size } = result.value
  logger.info(`Atom count     : ${coords.length}`)
  logger.info(`Grid center    : ${formatVec3(center)}`)
  logger.info(`Grid size      : ${formatVec3(size)}`)
  return result
}
