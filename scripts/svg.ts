import type { FragmentPlacement } from '../src/types.ts'

// --- Layout constants ---
const WIDTH = 800
const BAR_H = 32
const BAR_X0 = 100
const BAR_X1 = 740
const FRAG_H = 14
const GAP = 6
const TOP = 50

const FRAG_COLORS = [
  '#60a5fa', // blue
  '#fb923c', // orange
  '#4ade80', // green
  '#c084fc', // purple
  '#f472b6', // pink
  '#facc15', // yellow
  '#a78bfa', // violet
  '#f0abfc', // fuchsia
  '#34d399', // emerald
  '#fbbf24', // amber
]

export interface AssemblyDiagram {
  title: string
  chromosomeLength: number
  placements: FragmentPlacement[]
}

function escapeXml(text: string) {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function formatPos(pos: number): string {
  if (pos >= 1_000_000) {
    return `${(pos / 1_000_000).toFixed(1)}Mb`
  }
  if (pos >= 1_000) {
    return `${(pos / 1_000).toFixed(0)}kb`
  }
  return `${pos}`
}

// Maps a chromosome coordinate onto the drawing's x axis
export function scaleX(pos: number, chromosomeLength: number) {
  if (chromosomeLength === 0) {
    return BAR_X0
  }
  return BAR_X0 + (pos / chromosomeLength) * (BAR_X1 - BAR_X0)
}

export function fragmentRowY(row: number) {
  return TOP + BAR_H + GAP * 2 + row * (FRAG_H + GAP)
}

export function renderAssemblySvg(diagram: AssemblyDiagram) {
  const { title, chromosomeLength, placements } = diagram
  const height = fragmentRowY(placements.length) + GAP * 2
  const x0 = scaleX(0, chromosomeLength)
  const x1 = scaleX(chromosomeLength, chromosomeLength)

  const parts: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}">`,
    `<rect width="${WIDTH}" height="${height}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="24" text-anchor="middle" font-family="sans-serif" font-size="16" font-weight="bold" fill="#1e293b">${escapeXml(title)}</text>`,
    `<text x="${BAR_X0 - 8}" y="${TOP + BAR_H / 2}" text-anchor="end" dominant-baseline="middle" font-family="sans-serif" font-size="12" fill="#475569">chr</text>`,
    `<rect x="${x0}" y="${TOP}" width="${x1 - x0}" height="${BAR_H}" fill="#e2e8f0" stroke="#334155"/>`,
    `<text x="${x0}" y="${TOP - 4}" font-family="sans-serif" font-size="10" fill="#94a3b8">0</text>`,
    `<text x="${x1}" y="${TOP - 4}" text-anchor="end" font-family="sans-serif" font-size="10" fill="#94a3b8">${formatPos(chromosomeLength)}</text>`,
  ]

  for (let i = 0; i < placements.length; i++) {
    const p = placements[i]!
    const x = scaleX(p.start, chromosomeLength)
    const w = scaleX(p.end, chromosomeLength) - x
    const y = fragmentRowY(i)
    const color = FRAG_COLORS[i % FRAG_COLORS.length]!
    parts.push(
      `<rect x="${x}" y="${y}" width="${w}" height="${FRAG_H}" fill="${color}" stroke="#334155"/>`,
      `<text x="${BAR_X0 - 8}" y="${y + FRAG_H / 2}" text-anchor="end" dominant-baseline="middle" font-family="sans-serif" font-size="10" fill="#475569">${i + 1}</text>`,
    )
  }

  parts.push('</svg>')
  return parts.join('\n')
}
