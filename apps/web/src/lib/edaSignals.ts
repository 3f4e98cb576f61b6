import { ShapeError } from './edaErrors'

export const EDA_SIGNAL_COLUMNS = ['EDA_Raw', 'EDA_Clean', 'EDA_Phasic', 'EDA_Tonic'] as const
export const EDA_EVENT_COLUMNS = ['SCR_Onsets', 'SCR_Peaks', 'SCR_Recovery'] as const
export const EDA_COLUMNS = [...EDA_SIGNAL_COLUMNS, ...EDA_EVENT_COLUMNS] as const

export type EdaSignalColumn = (typeof EDA_SIGNAL_COLUMNS)[number]
export type EdaEventColumn = (typeof EDA_EVENT_COLUMNS)[number]
export type EdaColumn = (typeof EDA_COLUMNS)[number]

/** Processed EDA table, column-major. Indicator columns hold 0/1 per sample. */
export type EdaSignalTable = Readonly<Record<EdaColumn, readonly number[]>>

export type EdaEvents = {
  onsets: readonly number[]
  peaks: readonly number[]
  halfRecovery: readonly number[]
}

export type XAxisLabel = 'Samples' | 'Seconds'

export type XAxis = {
  values: readonly number[]
  label: XAxisLabel
}

export function signalLength(table: EdaSignalTable): number {
  return table.EDA_Phasic.length
}

export function validateSignalTable(table: EdaSignalTable): number {
  const n = signalLength(table)
  const mismatched = EDA_COLUMNS.filter((c) => table[c].length !== n)
  if (mismatched.length) {
    const detail = mismatched.map((c) => `${c}=${table[c].length}`).join(', ')
    throw new ShapeError(`Signal columns must share one length (EDA_Phasic=${n}; ${detail})`)
  }
  return n
}

export function findEventIndices(indicator: readonly number[]): number[] {
  const out: number[] = []
  for (let i = 0; i < indicator.length; i++) {
    if (indicator[i] === 1) out.push(i)
  }
  return out
}

export function extractEdaEvents(table: EdaSignalTable): EdaEvents {
  return {
    onsets: findEventIndices(table.SCR_Onsets),
    peaks: findEventIndices(table.SCR_Peaks),
    halfRecovery: findEventIndices(table.SCR_Recovery),
  }
}

export function buildXAxis(length: number, samplingRate?: number | null): XAxis {
  if (samplingRate === null || samplingRate === undefined) {
    return { values: Array.from({ length }, (_, i) => i), label: 'Samples' }
  }
  if (!Number.isFinite(samplingRate) || samplingRate <= 0) {
    throw new RangeError(`Sampling rate must be a positive number of Hz (got ${samplingRate})`)
  }
  return { values: Array.from({ length }, (_, i) => i / samplingRate), label: 'Seconds' }
}
