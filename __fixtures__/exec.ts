import type * as exec from '@actions/exec'
import { jest } from '@jest/globals'

export const getExecOutput = jest.fn<typeof exec.getExecOutput>()

export function execOutput(stdout: string, stderr = '', exitCode = 0): exec.ExecOutput {
  return { exitCode, stdout, stderr }
}
