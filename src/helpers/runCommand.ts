// src/helpers/runCommand.ts
import { spawn } from 'node:child_process'
import { logger } from './loggers.js'
import type {
  CaptureResult,
  Command,
  PipelineError,
  StepResult
} from '../types/index.js'

const quoteArg = (arg: string): string =>
  arg === '' || /[\s"'\\]/.test(arg) ? JSON.stringify(arg) : arg

export const formatCommand = (command: Command): string =>
  [command.bin, ...command.args].map(quoteArg).join(' ')

const spawnCommand = (command: Command, capture: boolean): Promise<CaptureResult> =>
  new Promise<CaptureResult>((resolve) => {
    let stdout = ''
    let stderr = ''
    let settled = false

    const settle = (result: CaptureResult) => {
      if (settled) return
      settled = true
      resolve(result)
    }

    const child = spawn(command.bin, command.args, {
      cwd: command.cwd,
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit'
    })

    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk
    })
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk
    })

    child.on('error', (error) => {
      settle({ code: null, signal: null, stdout, stderr, spawnError: error })
    })

    child.on('close', (code, signal) => {
      settle({ code, signal, stdout, stderr })
    })
  })

/**
 * Run an external executable with its output streamed to this process.
 * Prints the description and the command line first, then `OK` on exit code 0.
 */
export const runCommand = async (
  command: Command,
  description?: string
): Promise<StepResult> => {
  if (description) {
    logger.info(`>> ${description}`)
  }
  const line = formatCommand(command)
  logger.info(`Command: ${line}`)

  const result = await spawnCommand(command, false)
  const failure = commandFailure(command, result)
  if (failure) {
    return { ok: false, error: failure }
  }
  logger.info('OK')
  return { ok: true, value: undefined }
}

/**
 * Run an external executable and collect stdout and stderr separately.
 * Never rejects: a process that cannot be started resolves with `spawnError`.
 */
export const captureCommand = (command: Command): Promise<CaptureResult> =>
  spawnCommand(command, true)

export const commandFailure = (
  command: Command,
  result: CaptureResult
): PipelineError | undefined => {
  const line = formatCommand(command)
  if (result.spawnError) {
    return {
      kind: 'command-error',
      message: `Could not start command (${result.spawnError.message}): ${line}`,
      hints: [`Is ${command.bin} installed and on the PATH?`],
      command: line,
      exitCode: null
    }
  }
  if (result.code !== 0) {
    const code = result.code ?? result.signal
    return {
      kind: 'command-failed',
      message: `The following command failed (code ${code}): ${line}`,
      hints: [],
      command: line,
      exitCode: result.code
    }
  }
  return undefined
}
