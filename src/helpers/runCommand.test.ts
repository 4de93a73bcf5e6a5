import { describe, it, expect, beforeEach, vi } from 'vitest'
import os from 'node:os'
import { logger } from './loggers.js'
import { captureCommand, commandFailure, formatCommand, runCommand } from './runCommand.js'

// Child processes are short-lived copies of the Node binary running the tests
const nodeScript = (script: string) => ({
  bin: process.execPath,
  args: ['-e', script],
  cwd: os.tmpdir()
})

describe('formatCommand', () => {
  it('joins plain arguments with spaces', () => {
    expect(
      formatCommand({ bin: 'obabel', args: ['receptor.pdb', '-O', 'receptor.pdbqt'], cwd: '.' })
    ).toBe('obabel receptor.pdb -O receptor.pdbqt')
  })

  it('quotes arguments containing whitespace', () => {
    expect(formatCommand({ bin: 'vina', args: ['--out', 'my result.pdbqt'], cwd: '.' })).toBe(
      'vina --out "my result.pdbqt"'
    )
  })
})

describe('runCommand', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('prints the description and OK when the command exits 0', async () => {
    const result = await runCommand(nodeScript('process.exit(0)'), 'Doing nothing')

    expect(result).toEqual({ ok: true, value: undefined })
    expect(logger.info).toHaveBeenCalledWith('>> Doing nothing')
    expect(logger.info).toHaveBeenLastCalledWith('OK')
  })

  it('returns a command-failed error on a nonzero exit', async () => {
    const result = await runCommand(nodeScript('process.exit(1)'))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('command-failed')
      expect(result.error.exitCode).toBe(1)
      expect(result.error.message).toMatch(/^The following command failed \(code 1\): /)
    }
    expect(logger.info).not.toHaveBeenCalledWith('OK')
  })

  it('returns a command-error when the executable does not exist', async () => {
    const result = await runCommand({
      bin: 'no-such-docking-tool-on-path',
      args: [],
      cwd: os.tmpdir()
    })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('command-error')
      expect(result.error.hints).toEqual([
        'Is no-such-docking-tool-on-path installed and on the PATH?'
      ])
    }
  })
})

describe('captureCommand', () => {
  it('collects stdout and stderr separately', async () => {
    const result = await captureCommand(
      nodeScript(
        "process.stdout.write('scores\\n'); process.stderr.write('warning\\n'); process.exitCode = 3"
      )
    )

    expect(result.code).toBe(3)
    expect(result.stdout).toBe('scores\n')
    expect(result.stderr).toBe('warning\n')
    expect(result.spawnError).toBeUndefined()
  })

  it('resolves with spawnError instead of rejecting', async () => {
    const result = await captureCommand({
      bin: 'no-such-docking-tool-on-path',
      args: [],
      cwd: os.tmpdir()
    })

    expect(result.code).toBeNull()
    expect(result.spawnError).toBeInstanceOf(Error)
  })
})

describe('commandFailure', () => {
  const command = { bin: 'vina', args: ['--help'], cwd: '.' }

  it('is undefined for exit code 0', () => {
    expect(
      commandFailure(command, { code: 0, signal: null, stdout: '', stderr: '' })
    ).toBeUndefined()
  })

  it('names the signal when the process was killed', () => {
    expect(
      commandFailure(command, { code: null, signal: 'SIGKILL', stdout: '', stderr: '' })
    ).toEqual({
      kind: 'command-failed',
      message: 'The following command failed (code SIGKILL): vina --help',
      hints: [],
      command: 'vina --help',
      exitCode: null
    })
  })
})
