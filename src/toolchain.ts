import * as c from './constants'
import {join, resolve} from 'path'

export interface TargetCommand {
  executable: string
  args: string[]
}

export interface ToolchainOptions {
  assigner?: string
  proofGenerator?: string
  curve?: string
}

export interface Toolchain {
  assigner: TargetCommand
  proofGenerator: TargetCommand
}

/** Build artifacts of a compiled zkllvm-template circuit. */
export interface CircuitArtifacts {
  circuit: string
  constraints: string
  assignmentTable: string
  input: string
  proof: string
}

export function resolveArtifacts(templatePath: string): CircuitArtifacts {
  const root = resolve(templatePath)
  const buildSrc = join(root, 'build', 'src')
  return {
    circuit: join(buildSrc, 'template.ll'),
    constraints: join(buildSrc, 'template.crct'),
    assignmentTable: join(buildSrc, 'template.tbl'),
    input: join(root, 'src', 'main-input.json'),
    proof: join(root, 'build', 'proof.bin')
  }
}

export function createToolchain(
  artifacts: CircuitArtifacts,
  options: ToolchainOptions = {}
): Toolchain {
  return {
    assigner: {
      executable: options.assigner || c.DEFAULT_ASSIGNER,
      args: [
        '-b',
        artifacts.circuit,
        '-p',
        artifacts.input,
        '-c',
        artifacts.constraints,
        '-t',
        artifacts.assignmentTable,
        '-e',
        options.curve || c.DEFAULT_CURVE
      ]
    },
    proofGenerator: {
      executable: options.proofGenerator || c.DEFAULT_PROOF_GENERATOR,
      args: [
        '--circuit',
        artifacts.constraints,
        '--assignment',
        artifacts.assignmentTable,
        '--proof',
        artifacts.proof
      ]
    }
  }
}
