import { ShapeError } from './edaErrors'
import { EDA_COLUMNS, validateSignalTable, type EdaColumn, type EdaSignalTable } from './edaSignals'

function splitRow(line: string): string[] {
  return line.split(',').map((cell) => cell.trim().replace(/^"(.*)"$/, '$1'))
}

const KNOWN_COLUMNS: ReadonlySet<string> = new Set(EDA_COLUMNS)

function isEdaColumn(name: string): name is EdaColumn {
  return KNOWN_COLUMNS.has(name)
}

/**
 * Reads a processed EDA table from CSV text. The header row names the columns; columns this
 * plot does not use (an index column, SCR_Amplitude, ...) are ignored.
 */
export function parseEdaSignalsCsv(text: string): EdaSignalTable {
  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
  if (!lines.length) throw new ShapeError('CSV is empty')

  const header = splitRow(lines[0])
  const positions = new Map<EdaColumn, number>()
  header.forEach((name, idx) => {
    if (isEdaColumn(name) && !positions.has(name)) positions.set(name, idx)
  })

  const missing = EDA_COLUMNS.filter((c) => !positions.has(c))
  if (missing.length) throw new ShapeError(`CSV is missing required columns: ${missing.join(', ')}`)

  const columns = new Map<EdaColumn, number[]>(EDA_COLUMNS.map((c) => [c, []]))
  for (let row = 1; row < lines.length; row++) {
    const cells = splitRow(lines[row])
    if (cells.length !== header.length) {
      throw new ShapeError(`CSV row ${row + 1} has ${cells.length} cells; header has ${header.length}`)
    }
    for (const [name, idx] of positions) {
      const value = Number(cells[idx])
      if (cells[idx] === '' || Number.isNaN(value)) {
        throw new ShapeError(`CSV row ${row + 1}, column ${name}: "${cells[idx]}" is not a number`)
      }
      columns.get(name)?.push(value)
    }
  }

  const column = (name: EdaColumn) => columns.get(name) ?? []
  const table: EdaSignalTable = {
    EDA_Raw: column('EDA_Raw'),
    EDA_Clean: column('EDA_Clean'),
    EDA_Phasic: column('EDA_Phasic'),
    EDA_Tonic: column('EDA_Tonic'),
    SCR_Onsets: column('SCR_Onsets'),
    SCR_Peaks: column('SCR_Peaks'),
    SCR_Recovery: column('SCR_Recovery'),
  }
  validateSignalTable(table)
  return table
}
