export type Vec3 = {
  x: number
  y: number
  z: number
}

export type SearchVolume = {
  center: Vec3
  size: Vec3
}

export type PipelineErrorKind =
  | 'command-failed'
  | 'command-error'
  | 'missing-output'
  | 'no-coordinates'

export interface PipelineError {
  kind: PipelineErrorKind
  message: string
  hints: string[]
  command?: string
  exitCode?: number | null
}

export type StepResult<T = void> = { ok: true; value: T } | { ok: false; error: PipelineError }

export interface Command {
  bin: string
  args: string[]
  cwd: string
}

export interface CaptureResult {
  code: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  spawnError?: Error
}

export interface ArtifactEntry {
  file: string
  bytes: number
}

export interface ResultsReport {
  log: string | null
  artifacts: ArtifactEntry[]
}
