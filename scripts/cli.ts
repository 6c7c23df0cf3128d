import { readFileSync } from 'fs'
import { z } from 'zod'
import { parseFastaLines } from '../src/parseFasta.ts'
import type { AssemblyFailure, Reconstruction } from '../src/types.ts'

export const USAGE = [
  'Usage: reconstruct.ts [-h] [--json] <input.fasta>',
  '            -h: Print usage information',
  '        --json: Print the result as JSON',
  '   input.fasta: File containing input sequence data',
].join('\n')

const reconstructArgsSchema = z.object({
  help: z.boolean(),
  json: z.boolean(),
  input: z.string().min(1),
})

export type ReconstructArgs = z.infer<typeof reconstructArgsSchema>

// Returns undefined when usage should be printed instead of running
export function parseReconstructArgs(
  argv: string[],
): ReconstructArgs | undefined {
  const flags = argv.filter(a => a.startsWith('-'))
  const positional = argv.filter(a => !a.startsWith('-'))
  const help = flags.includes('-h') || flags.includes('--help')
  const unknown = flags.filter(
    f => f !== '-h' && f !== '--help' && f !== '--json',
  )
  if (help || unknown.length > 0 || positional.length !== 1) {
    return undefined
  }

  const parsed = reconstructArgsSchema.safeParse({
    help,
    json: flags.includes('--json'),
    input: positional[0],
  })
  return parsed.success ? parsed.data : undefined
}

const failureDetails: Record<AssemblyFailure, string> = {
  EMPTY_INPUT: 'no sequences in input',
  NO_UNIQUE_ROOT: 'no unique starting sequence',
  NO_UNIQUE_TERMINAL: 'no unique ending sequence',
  NO_HAMILTONIAN_PATH: 'no ordering uses every sequence once',
}

export function describeFailure(reason: AssemblyFailure) {
  return `ERROR: Unable to reconstruct a unique chromosome (${failureDetails[reason]})`
}

export function formatReconstruction(result: Reconstruction, json: boolean) {
  if (!result.ok) {
    return describeFailure(result.reason)
  }
  if (json) {
    return JSON.stringify(
      {
        chromosome: result.chromosome,
        length: result.chromosome.length,
        fragments: result.placements,
      },
      null,
      2,
    )
  }
  return [
    'The reconstructed chromosome is:',
    result.chromosome,
    `Length: ${result.chromosome.length}`,
  ].join('\n')
}

// Returns undefined when the file cannot be read
export function readFastaFile(path: string) {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (e) {
    console.error(`ERROR: Unable to parse FASTA file "${path}": ${e}`)
    return undefined
  }
  return parseFastaLines(content.split('\n'))
}
