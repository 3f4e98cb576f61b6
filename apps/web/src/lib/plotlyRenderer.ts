import type { Annotations, Layout, PlotData } from 'plotly.js'

import type { LineCommand, ScatterCommand, SegmentsCommand } from './edaFigure'
import type { FigureMeta, PanelMeta, Renderer } from './edaRenderer'

export type PlotlyFigure = {
  data: Array<Partial<PlotData>>
  layout: Partial<Layout>
}

const PANEL_AXES = [
  { trace: 'y', layout: 'yaxis' },
  { trace: 'y2', layout: 'yaxis2' },
  { trace: 'y3', layout: 'yaxis3' },
] as const

const PANEL_GAP = 0.05

function round6(v: number) {
  return Number(v.toFixed(6))
}

/** Vertical paper-space band of a panel, top panel first. */
export function panelDomain(index: number, count: number): [number, number] {
  const height = (1 - PANEL_GAP * (count - 1)) / count
  const top = 1 - index * (height + PANEL_GAP)
  return [round6(Math.max(0, top - height)), round6(top)]
}

/** Flattens segments into one polyline with null breaks so each collection stays a single trace. */
export function segmentsToPolyline(command: SegmentsCommand): { x: Array<number | null>; y: Array<number | null> } {
  const x: Array<number | null> = []
  const y: Array<number | null> = []
  command.segments.forEach((s, i) => {
    if (i > 0) {
      x.push(null)
      y.push(null)
    }
    x.push(s.x0, s.x1)
    y.push(s.y0, s.y1)
  })
  return { x, y }
}

export function createPlotlyRenderer(options: { height?: number } = {}): Renderer<PlotlyFigure> {
  const data: Array<Partial<PlotData>> = []
  const annotations: Array<Partial<Annotations>> = []
  let meta: FigureMeta | null = null
  let panel: PanelMeta | null = null

  function axisFor(current: PanelMeta | null) {
    if (!current) throw new Error('drawing before beginPanel')
    return PANEL_AXES[current.index]
  }

  function push(trace: Partial<PlotData>) {
    const axis = axisFor(panel)
    data.push({ ...trace, type: 'scatter', xaxis: 'x', yaxis: axis.trace, legendgroup: axis.trace, showlegend: true })
  }

  return {
    beginFigure(next) {
      if (next.panelCount > PANEL_AXES.length) {
        throw new Error(`Plotly figure supports at most ${PANEL_AXES.length} panels (got ${next.panelCount})`)
      }
      meta = next
    },

    beginPanel(next) {
      if (!meta) throw new Error('beginPanel before beginFigure')
      panel = next
      const [, top] = panelDomain(next.index, meta.panelCount)
      annotations.push({
        text: next.title,
        xref: 'paper',
        yref: 'paper',
        x: 0.5,
        y: top,
        xanchor: 'center',
        yanchor: 'bottom',
        showarrow: false,
      })
    },

    drawLine(command: LineCommand) {
      push({
        mode: 'lines',
        name: command.label,
        x: [...command.x],
        y: [...command.y],
        line: { color: command.style.color, width: command.style.width, dash: command.style.dash },
      })
    },

    drawScatter(command: ScatterCommand) {
      push({
        mode: 'markers',
        name: command.label,
        x: [...command.x],
        y: [...command.y],
        marker: { color: command.color },
      })
    },

    drawSegments(command: SegmentsCommand) {
      const { x, y } = segmentsToPolyline(command)
      push({
        mode: 'lines',
        name: command.label,
        x,
        y,
        line: { color: command.style.color, width: command.style.width, dash: command.style.dash },
      })
    },

    finish() {
      if (!meta) throw new Error('finish before beginFigure')
      const count = meta.panelCount
      const layout: Partial<Layout> = {
        title: { text: meta.title },
        autosize: true,
        height: options.height ?? 720,
        margin: { l: 50, r: 20, t: 70, b: 50 },
        legend: { orientation: 'v' },
        annotations,
        xaxis: { title: { text: meta.xLabel }, anchor: PANEL_AXES[Math.max(0, count - 1)].trace },
      }
      PANEL_AXES.slice(0, count).forEach((axis, index) => {
        layout[axis.layout] = { domain: panelDomain(index, count), anchor: 'x' }
      })
      return { data, layout }
    },
  }
}
