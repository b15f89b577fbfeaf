import * as core from '@actions/core'
import {getExecOutput} from '@actions/exec'
import {ExecutionError} from './errors'

export interface ExecResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface RunOptions {
  cwd?: string
  /** Return a non-zero exit status to the caller instead of failing */
  ignoreReturnCode?: boolean
  /** Do not echo the command's output while it runs */
  silent?: boolean
}

export function toCommandString(commandLine: string, args: string[] = []): string {
  return [commandLine].concat(args).join(' ')
}

/**
 * Runs a command to completion and captures its output. A missing executable
 * always fails; a non-zero exit fails unless `ignoreReturnCode` is set.
 */
export async function exec(
  commandLine: string,
  args: string[] = [],
  options: RunOptions = {}
): Promise<ExecResult> {
  const command = toCommandString(commandLine, args)
  core.debug(`Running '${command}'${options.cwd ? ` in ${options.cwd}` : ''}`)
  let output: ExecResult
  try {
    output = await getExecOutput(commandLine, args, {
      cwd: options.cwd,
      silent: options.silent,
      ignoreReturnCode: true
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ExecutionError(command, `could not be run: ${reason}`)
  }
  if (output.exitCode !== 0 && !options.ignoreReturnCode) {
    throw new ExecutionError(
      command,
      `exited with a non-zero code: ${output.exitCode}`,
      output.exitCode
    )
  }
  return {
    exitCode: output.exitCode,
    stdout: output.stdout,
    stderr: output.stderr
  }
}
