import { writeFileSync } from 'fs'
import { describeFailure, readFastaFile } from './cli.ts'
import { renderAssemblySvg } from './svg.ts'
import { reconstructChromosome } from '../src/reconstruct.ts'

// --- CLI ---
const args = process.argv.slice(2)

if (args.length < 2) {
  console.error(
    'Usage: visualize.ts <input.fasta> <output.svg> [--title "..."]',
  )
  process.exit(1)
}

const fastaPath = args[0]!
const outPath = args[1]!

let title = fastaPath
const titleIdx = args.indexOf('--title')
if (titleIdx !== -1 && args[titleIdx + 1]) {
  title = args[titleIdx + 1]!
}

const sequences = readFastaFile(fastaPath)
if (!sequences) {
  process.exit(1)
}

const result = reconstructChromosome(sequences)
if (!result.ok) {
  console.error(describeFailure(result.reason))
  process.exit(1)
}

writeFileSync(
  outPath,
  renderAssemblySvg({
    title,
    chromosomeLength: result.chromosome.length,
    placements: result.placements,
  }),
)
console.log(`Wrote ${outPath}`)
