import { buildEdaSegments, type EdaSegments, type Segment } from './edaSegments'
import {
  buildXAxis,
  extractEdaEvents,
  validateSignalTable,
  type EdaEvents,
  type EdaSignalTable,
  type XAxisLabel,
} from './edaSignals'

export type LineDash = 'solid' | 'dash'

export type LineStyle = {
  color: string
  width: number
  dash: LineDash
}

export type LineCommand = {
  kind: 'line'
  label: string
  x: readonly number[]
  y: readonly number[]
  style: LineStyle
}

export type ScatterCommand = {
  kind: 'scatter'
  label: string
  x: readonly number[]
  y: readonly number[]
  color: string
}

export type SegmentsCommand = {
  kind: 'segments'
  label: string
  segments: readonly Segment[]
  style: LineStyle
}

export type DrawCommand = LineCommand | ScatterCommand | SegmentsCommand

export type EdaPanelId = 'signal' | 'phasic' | 'tonic'

export type EdaPanel = {
  id: EdaPanelId
  title: string
  commands: readonly DrawCommand[]
}

export type EdaFigure = {
  title: string
  xLabel: XAxisLabel
  xAxis: readonly number[]
  panels: readonly EdaPanel[]
  events: EdaEvents
  segments: EdaSegments
}

export type BuildEdaFigureOptions = {
  samplingRate?: number | null
}

export const EDA_FIGURE_TITLE = 'Electrodermal Activity (EDA)'

export const EDA_COLORS = {
  raw: '#B0BEC5',
  clean: '#9C27B0',
  phasic: '#E91E63',
  tonic: '#673AB7',
  onset: '#FFA726',
  peak: '#1976D2',
  halfRecovery: '#FDD835',
} as const

function pick(values: readonly number[], indices: readonly number[]): number[] {
  return indices.map((i) => values[i])
}

function line(label: string, x: readonly number[], y: readonly number[], color: string, width = 1.5): LineCommand {
  return { kind: 'line', label, x, y, style: { color, width, dash: 'solid' } }
}

function scatter(label: string, x: readonly number[], y: readonly number[], color: string): ScatterCommand {
  return { kind: 'scatter', label, x, y, color }
}

function segments(label: string, list: readonly Segment[], color: string, dash: LineDash): SegmentsCommand {
  return { kind: 'segments', label, segments: list, style: { color, width: 1, dash } }
}

/**
 * Backend-neutral description of the three-panel EDA figure. Nothing here touches a plotting
 * library; renderers consume the returned commands in order.
 */
export function buildEdaFigure(table: EdaSignalTable, options: BuildEdaFigureOptions = {}): EdaFigure {
  const n = validateSignalTable(table)
  const xAxis = buildXAxis(n, options.samplingRate)
  const x = xAxis.values
  const events = extractEdaEvents(table)
  const segs = buildEdaSegments(table, x, events)
  const phasic = table.EDA_Phasic

  const panels: EdaPanel[] = [
    {
      id: 'signal',
      title: 'Raw and Cleaned Signal',
      commands: [line('Raw', x, table.EDA_Raw, EDA_COLORS.raw, 1), line('Cleaned', x, table.EDA_Clean, EDA_COLORS.clean)],
    },
    {
      id: 'phasic',
      title: 'Skin Conductance Response (SCR)',
      commands: [
        line('Phasic Component', x, phasic, EDA_COLORS.phasic),
        scatter('SCR - Onsets', pick(x, events.onsets), pick(phasic, events.onsets), EDA_COLORS.onset),
        scatter('SCR - Peaks', pick(x, events.peaks), pick(phasic, events.peaks), EDA_COLORS.peak),
        scatter(
          'SCR - Half recovery',
          pick(x, events.halfRecovery),
          pick(phasic, events.halfRecovery),
          EDA_COLORS.halfRecovery,
        ),
        segments('Rise Time', segs.riseTime, EDA_COLORS.onset, 'dash'),
        segments('SCR Amplitude', segs.amplitude, EDA_COLORS.peak, 'solid'),
        segments('Half Recovery', segs.halfRecovery, EDA_COLORS.halfRecovery, 'dash'),
      ],
    },
    {
      id: 'tonic',
      title: 'Skin Conductance Level (SCL)',
      commands: [line('Tonic Component', x, table.EDA_Tonic, EDA_COLORS.tonic)],
    },
  ]

  return { title: EDA_FIGURE_TITLE, xLabel: xAxis.label, xAxis: x, panels, events, segments: segs }
}
