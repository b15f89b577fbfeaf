import {ParseResult, malformed, parsed} from '../definitions/metrics'

const REAL_LINE = /^\s*real\b(.*)$/gim
const DURATION = /^\s*(\d+)m(\d+(?:\.\d+)?)s\s*$/i

/**
 * Reads the elapsed seconds from the `real` line of a shell `time` block,
 * e.g. `real\t1m2.500s` gives 62.5. The block is printed after everything
 * the timed command wrote, so the last `real` line wins.
 */
export function parseElapsedSeconds(output: string): ParseResult<number> {
  const lines = [...output.matchAll(REAL_LINE)]
  const line = lines[lines.length - 1]
  if (line === undefined) {
    return malformed("no 'real' line in timing output")
  }
  const duration = DURATION.exec(line[1])
  if (!duration) {
    return malformed(`unexpected duration '${line[1].trim()}'`)
  }
  const minutes = parseInt(duration[1], 10)
  const seconds = parseFloat(duration[2])
  return parsed(minutes * 60 + seconds)
}
