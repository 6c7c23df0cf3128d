import { describe, it, expect, vi, afterEach } from 'vitest'
import { fileURLToPath } from 'url'
import {
  describeFailure,
  formatReconstruction,
  parseReconstructArgs,
  readFastaFile,
} from '../scripts/cli.ts'
import { fragmentRowY, renderAssemblySvg, scaleX } from '../scripts/svg.ts'
import { reconstructChromosome } from '../src/reconstruct.ts'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('parseReconstructArgs', () => {
  it('takes a single input file', () => {
    expect(parseReconstructArgs(['reads.fasta'])).toEqual({
      help: false,
      json: false,
      input: 'reads.fasta',
    })
  })

  it('reads the --json flag', () => {
    expect(parseReconstructArgs(['--json', 'reads.fasta'])?.json).toBe(true)
  })

  it('asks for usage on help or bad arguments', () => {
    expect(parseReconstructArgs([])).toBeUndefined()
    expect(parseReconstructArgs(['-h', 'reads.fasta'])).toBeUndefined()
    expect(parseReconstructArgs(['--help'])).toBeUndefined()
    expect(parseReconstructArgs(['a.fasta', 'b.fasta'])).toBeUndefined()
    expect(parseReconstructArgs(['--verbose', 'reads.fasta'])).toBeUndefined()
  })
})

describe('formatReconstruction', () => {
  const result = reconstructChromosome(['ATTAGACCTG', 'AGACCTGCCG'])

  it('prints the chromosome and its length', () => {
    expect(formatReconstruction(result, false)).toBe(
      'The reconstructed chromosome is:\nATTAGACCTGCCG\nLength: 13',
    )
  })

  it('prints JSON with fragment placements', () => {
    expect(JSON.parse(formatReconstruction(result, true))).toEqual({
      chromosome: 'ATTAGACCTGCCG',
      length: 13,
      fragments: [
        { sequence: 'ATTAGACCTG', start: 0, end: 10 },
        { sequence: 'AGACCTGCCG', start: 3, end: 13 },
      ],
    })
  })

  it('explains failures', () => {
    expect(formatReconstruction({ ok: false, reason: 'EMPTY_INPUT' }, true)).toBe(
      'ERROR: Unable to reconstruct a unique chromosome (no sequences in input)',
    )
    expect(describeFailure('NO_UNIQUE_ROOT')).toBe(
      'ERROR: Unable to reconstruct a unique chromosome (no unique starting sequence)',
    )
  })
})

describe('readFastaFile', () => {
  it('reads sequences from a file', () => {
    const path = fileURLToPath(new URL('./fixtures/ambiguous.fasta', import.meta.url))
    expect(readFastaFile(path)).toEqual(new Set(['AAAAAAAA', 'CCCCCCCC']))
  })

  it('reports a file that cannot be read', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const path = fileURLToPath(new URL('./fixtures/missing.fasta', import.meta.url))
    expect(readFastaFile(path)).toBeUndefined()
    expect(error).toHaveBeenCalledTimes(1)
    expect(String(error.mock.calls[0]?.[0])).toMatch(
      /^ERROR: Unable to parse FASTA file ".*missing\.fasta"/,
    )
  })
})

describe('renderAssemblySvg', () => {
  it('scales chromosome coordinates onto the drawing', () => {
    expect(scaleX(0, 20)).toBe(100)
    expect(scaleX(10, 20)).toBe(420)
    expect(scaleX(20, 20)).toBe(740)
    expect(fragmentRowY(0)).toBe(94)
    expect(fragmentRowY(1)).toBe(114)
  })

  it('draws each fragment at its placement', () => {
    const lines = renderAssemblySvg({
      title: 'reads <test>',
      chromosomeLength: 20,
      placements: [
        { sequence: 'AAAAAAAAAA', start: 0, end: 10 },
        { sequence: 'AAAAAAAAAAAAAAA', start: 5, end: 20 },
      ],
    }).split('\n')
    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="800" height="146" viewBox="0 0 800 146">',
    )
    expect(lines).toContain(
      '<text x="400" y="24" text-anchor="middle" font-family="sans-serif" font-size="16" font-weight="bold" fill="#1e293b">reads &lt;test&gt;</text>',
    )
    expect(lines).toContain(
      '<rect x="100" y="94" width="320" height="14" fill="#60a5fa" stroke="#334155"/>',
    )
    expect(lines).toContain(
      '<rect x="260" y="114" width="480" height="14" fill="#fb923c" stroke="#334155"/>',
    )
    expect(lines[lines.length - 1]).toBe('</svg>')
  })
})
