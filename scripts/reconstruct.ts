import {
  USAGE,
  formatReconstruction,
  parseReconstructArgs,
  readFastaFile,
} from './cli.ts'
import { reconstructChromosome } from '../src/reconstruct.ts'

const args = parseReconstructArgs(process.argv.slice(2))

if (!args) {
  console.log(USAGE)
} else {
  const sequences = readFastaFile(args.input)
  if (!sequences) {
    process.exitCode = 1
  } else {
    const result = reconstructChromosome(sequences)
    if (result.ok) {
      console.log(formatReconstruction(result, args.json))
    } else {
      console.error(formatReconstruction(result, args.json))
      process.exitCode = 1
    }
  }
}
