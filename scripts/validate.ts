import { existsSync, readdirSync, statSync } from 'fs'
import { join } from 'path'
import { readFastaFile } from './cli.ts'
import { assembleChromosome } from '../src/reconstruct.ts'
import { validateChromosome } from '../src/validate.ts'

// Reconstructs every FASTA file in a directory and reports PASS/FAIL for each
const dir = process.argv[2] ?? './test_data'

if (!existsSync(dir) || !statSync(dir).isDirectory()) {
  console.error('ERROR: Cannot locate test data directory. Aborting.')
  process.exitCode = 1
} else {
  let failures = 0
  for (const name of readdirSync(dir).sort()) {
    const sequences = readFastaFile(join(dir, name))
    if (!sequences) {
      failures++
      continue
    }
    const chromosome = assembleChromosome(sequences)
    const pass = validateChromosome(sequences, chromosome)
    console.log(`${name}:`)
    console.log(pass ? '    PASS' : '    FAIL')
    if (!pass) {
      failures++
    }
  }
  if (failures > 0) {
    process.exitCode = 1
  }
}
