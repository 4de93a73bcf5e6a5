import fs from 'fs-extra'
import path from 'node:path'
import YAML from 'yaml'
import { z } from 'zod'

// Keeps the padded box size finite
export const MAX_PADDING = 1000

const ToolsSchema = z.object({
  pymol: z.string().min(1),
  obabel: z.string().min(1),
  vina: z.string().min(1)
})

// Identifier and selectors end up inside the generated PyMOL script, so they are
// restricted to characters that cannot start a new command or selection clause.
const DockingConfigSchema = z.object({
  pdbId: z.string().regex(/^[A-Za-z0-9_]+$/, 'PDB ID must be alphanumeric.'),
  chain: z
    .string()
    .regex(/^[A-Za-z0-9]$/, 'Chain must be a single alphanumeric character.'),
  ligandResn: z
    .string()
    .regex(
      /^[A-Za-z0-9]{1,3}$/,
      'Ligand residue name must be 1 to 3 alphanumeric characters.'
    ),
  padding: z.coerce
    .number()
    .finite()
    .positive()
    .max(MAX_PADDING, `Padding must be at most ${MAX_PADDING} Angstrom.`),
  exhaustiveness: z.coerce.number().int().positive(),
  numModes: z.coerce.number().int().positive(),
  workDir: z.string().min(1),
  tools: ToolsSchema
})

const PartialConfigSchema = DockingConfigSchema.omit({ tools: true })
  .partial()
  .extend({ tools: ToolsSchema.partial().optional() })
  .strict()

type DockingConfigValues = z.infer<typeof DockingConfigSchema>
type PartialDockingConfig = z.infer<typeof PartialConfigSchema>

export type DockingConfig = Readonly<Omit<DockingConfigValues, 'tools'>> & {
  readonly tools: Readonly<DockingConfigValues['tools']>
}

export interface LoadConfigOptions {
  file?: string
  env?: NodeJS.ProcessEnv
  overrides?: PartialDockingConfig
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(source: string, issues: string[]) {
    super(`Invalid configuration (${source}): ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const defaultConfig = (): DockingConfigValues => ({
  pdbId: '1stp',
  chain: 'A',
  ligandResn: 'BTN',
  padding: 10.0,
  exhaustiveness: 8,
  numModes: 9,
  workDir: process.cwd(),
  tools: {
    pymol: 'pymol',
    obabel: 'obabel',
    vina: process.platform === 'win32' ? 'vina.exe' : 'vina'
  }
})

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )

const envVariables = {
  pdbId: 'PDB_ID',
  chain: 'CHAIN',
  ligandResn: 'LIGAND_RESN',
  padding: 'PADDING',
  exhaustiveness: 'EXHAUSTIVENESS',
  numModes: 'NUM_MODES',
  workDir: 'WORK_DIR'
} as const

const toolEnvVariables = {
  pymol: 'PYMOL',
  obabel: 'OBABEL',
  vina: 'VINA'
} as const

const parsePartial = (raw: unknown, source: string): PartialDockingConfig => {
  const parsed = PartialConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error))
  }
  return parsed.data
}

const readConfigFile = async (file: string): Promise<PartialDockingConfig> => {
  const text = await fs.readFile(file, 'utf8')
  const raw: unknown = YAML.parse(text)
  return parsePartial(raw ?? {}, file)
}

const pickEnv = (
  env: NodeJS.ProcessEnv,
  names: Record<string, string>
): Record<string, string> => {
  const picked: Record<string, string> = {}
  for (const [key, name] of Object.entries(names)) {
    const value = env[name]
    if (value !== undefined) picked[key] = value
  }
  return picked
}

const fromEnv = (env: NodeJS.ProcessEnv): PartialDockingConfig => {
  const tools = pickEnv(env, toolEnvVariables)
  const raw = {
    ...pickEnv(env, envVariables),
    ...(Object.keys(tools).length > 0 ? { tools } : {})
  }
  return parsePartial(raw, 'environment')
}

const mergeLayer = (
  base: DockingConfigValues,
  layer: PartialDockingConfig
): DockingConfigValues => ({
  pdbId: layer.pdbId ?? base.pdbId,
  chain: layer.chain ?? base.chain,
  ligandResn: layer.ligandResn ?? base.ligandResn,
  padding: layer.padding ?? base.padding,
  exhaustiveness: layer.exhaustiveness ?? base.exhaustiveness,
  numModes: layer.numModes ?? base.numModes,
  workDir: layer.workDir ?? base.workDir,
  tools: {
    pymol: layer.tools?.pymol ?? base.tools.pymol,
    obabel: layer.tools?.obabel ?? base.tools.obabel,
    vina: layer.tools?.vina ?? base.tools.vina
  }
})

/**
 * Build the run configuration. Later sources win: defaults, YAML file,
 * environment, explicit overrides.
 */
const loadDockingConfig = async (
  options: LoadConfigOptions = {}
): Promise<DockingConfig> => {
  const { file, env = process.env, overrides = {} } = options

  const layers: PartialDockingConfig[] = [
    file ? await readConfigFile(file) : {},
    fromEnv(env),
    parsePartial(overrides, 'overrides')
  ]
  const merged = layers.reduce(mergeLayer, defaultConfig())

  const parsed = DockingConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigError('merged', formatIssues(parsed.error))
  }

  const { tools, ...values } = parsed.data
  return Object.freeze({
    ...values,
    workDir: path.resolve(values.workDir),
    tools: Object.freeze({ ...tools })
  })
}

export { loadDockingConfig, defaultConfig }
