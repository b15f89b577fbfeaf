import { readFileSync } from 'fs'
import { join } from 'path'

export function readReport(name: string): string {
  return readFileSync(join(__dirname, 'reports', name), 'utf8')
}

// total(B) of the snapshot rows in ms_print.txt
export const MS_PRINT_TOTAL_BYTES = 73_744 + 153_464 + 153_464 + 149_944

export const TIME_OUTPUT = 'real\t1m2.500s\nuser\t0m58.120s\nsys\t0m1.030s\n'
