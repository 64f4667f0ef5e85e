export interface CellRef {
  row: number // 0-based
  col: number // 0-based
}

export interface ParsedRange {
  tab: string
  start: CellRef | null
  end: CellRef | null
}

export function quoteTab(tab: string): string {
  return `'${tab.replace(/'/g, "''")}'`
}

export function a1(tab: string, cells?: string): string {
  return cells ? `${quoteTab(tab)}!${cells}` : quoteTab(tab)
}

function columnIndex(letters: string): number {
  let n = 0
  for (const ch of letters) n = n * 26 + (ch.charCodeAt(0) - 64)
  return n - 1
}

function parseCell(col: string, row: string): CellRef {
  return { row: parseInt(row, 10) - 1, col: columnIndex(col) }
}

export function parseRange(range: string): ParsedRange {
  const quoted = range.match(/^'((?:[^']|'')+)'(?:!(.+))?$/)
  const bare = quoted ? null : range.match(/^([^!]+)(?:!(.+))?$/)
  const match = quoted ?? bare
  if (!match) throw new Error(`Invalid range: ${range}`)

  const tab = quoted ? match[1].replace(/''/g, "'") : match[1]
  const cells = match[2]
  if (!cells) return { tab, start: null, end: null }

  const m = cells.toUpperCase().match(/^([A-Z]+)(\d+)(?::([A-Z]+)(\d+))?$/)
  if (!m) throw new Error(`Invalid range: ${range}`)
  const start = parseCell(m[1], m[2])
  const end = m[3] && m[4] ? parseCell(m[3], m[4]) : start
  return { tab, start, end }
}
