import { beforeEach, describe, expect, it, jest } from '@jest/globals'
import * as core from '../__fixtures__/core'
import * as exec from '../__fixtures__/exec'
import { TIME_OUTPUT, readReport } from '../__fixtures__/reports'

jest.mock('@actions/core', () => require('../__fixtures__/core'))
jest.mock('@actions/exec', () => require('../__fixtures__/exec'))

import { parseMeasurements, run } from '../src/main'

function mockInputs(inputs: Record<string, string>): void {
  core.getInput.mockImplementation((name: string) => inputs[name] ?? '')
}

describe('main', () => {
  beforeEach(() => {
    exec.getExecOutput.mockReset()
    exec.getExecOutput.mockImplementation(async (commandLine: string) => {
      switch (commandLine) {
        case 'ms_print':
          return exec.execOutput(readReport('ms_print.txt'))
        case 'bash':
          return exec.execOutput('', TIME_OUTPUT)
        default:
          return exec.execOutput('')
      }
    })
    core.summary.addRaw.mockReset()
    core.summary.write.mockReset()
    core.summary.write.mockResolvedValue(undefined)
  })

  it('runs all four measurements and prints the results', async () => {
    mockInputs({ 'zkllvm-template-path': '/opt/zkllvm-template', 'working-directory': '/tmp/bench' })
    await run()

    expect(core.setFailed).not.toHaveBeenCalled()
    expect(core.warning).not.toHaveBeenCalled()
    expect(core.startGroup.mock.calls.map(call => call[0])).toEqual([
      'Measuring assigner-memory...',
      'Measuring assigner-time...',
      'Measuring proof-memory...',
      'Measuring proof-time...'
    ])
    expect(core.endGroup).toHaveBeenCalledTimes(4)
    expect(core.setOutput).toHaveBeenCalledWith('assigner-time-s', 62.5)
    expect(core.setOutput).toHaveBeenCalledWith('proof-time-s', 62.5)
    expect(core.setOutput).toHaveBeenCalledWith('proof-memory-gb', 530_616 / 1e9)
    expect(core.info).toHaveBeenCalledWith(
      'Assigner:\n  Memory: 0.00 GB\n  Time: 62.50 s\nProof:\n  Memory: 0.00 GB\n  Time: 62.50 s'
    )
    expect(core.summary.addRaw).not.toHaveBeenCalled()
  })

  it('writes a job summary when enabled', async () => {
    mockInputs({ 'zkllvm-template-path': '/opt/zkllvm-template', 'job-summary': 'true' })
    await run()

    expect(core.summary.addRaw).toHaveBeenCalledTimes(1)
    expect(core.summary.addRaw.mock.calls[0][0].startsWith('## zkLLVM Benchmark Results\n\n<table>')).toBe(true)
    expect(core.summary.write).toHaveBeenCalled()
  })

  it('warns about incomplete results when only some measurements run', async () => {
    mockInputs({ 'zkllvm-template-path': '/opt/zkllvm-template', measurements: 'assigner-time' })
    await run()

    expect(exec.getExecOutput).toHaveBeenCalledTimes(1)
    expect(core.warning).toHaveBeenCalledWith(
      'Benchmark results are incomplete. Missing: assigner-memory, proof-memory, proof-time'
    )
    expect(core.setFailed).not.toHaveBeenCalled()
  })

  it('continues after a failed measurement and fails at the end', async () => {
    exec.getExecOutput.mockImplementation(async (commandLine: string) => {
      if (commandLine === 'bash') {
        return exec.execOutput('', 'bash: assigner: command not found\n', 127)
      }
      return exec.execOutput(commandLine === 'ms_print' ? readReport('ms_print.txt') : '')
    })
    mockInputs({
      'zkllvm-template-path': '/opt/zkllvm-template',
      measurements: 'assigner-time, proof-memory'
    })
    await run()

    expect(core.error.mock.calls.map(call => call[0])).toEqual([
      expect.stringMatching(/^Measuring assigner-time failed: '.*' exited with a non-zero code: 127$/)
    ])
    expect(core.setOutput).toHaveBeenCalledWith('proof-memory-gb', 530_616 / 1e9)
    expect(core.setFailed).toHaveBeenCalledWith('Failed measurements: assigner-time')
  })

  it('fails before running anything on an unknown measurement', async () => {
    mockInputs({ 'zkllvm-template-path': '/opt/zkllvm-template', measurements: 'assigner-memory,gpu-time' })
    await run()

    expect(exec.getExecOutput).not.toHaveBeenCalled()
    expect(core.setFailed).toHaveBeenCalledWith(
      "Unsupported measurement: 'gpu-time'. Supported measurements are: assigner-memory, assigner-time, proof-memory, proof-time"
    )
  })
})

describe('parseMeasurements', () => {
  it('defaults to every slot', () => {
    expect(parseMeasurements('')).toEqual(['assigner-memory', 'assigner-time', 'proof-memory', 'proof-time'])
  })

  it('keeps the requested order and drops duplicates', () => {
    expect(parseMeasurements('proof-time, assigner-memory,proof-time')).toEqual(['proof-time', 'assigner-memory'])
  })
})
