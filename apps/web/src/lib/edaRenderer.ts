import type { EdaFigure, LineCommand, ScatterCommand, SegmentsCommand } from './edaFigure'
import type { XAxisLabel } from './edaSignals'

export type FigureMeta = {
  title: string
  xLabel: XAxisLabel
  panelCount: number
}

export type PanelMeta = {
  index: number
  title: string
}

/** Owns all mutable figure state for one render; `finish` hands back the backend's figure. */
export type Renderer<TFigure> = {
  beginFigure(meta: FigureMeta): void
  beginPanel(panel: PanelMeta): void
  drawLine(command: LineCommand): void
  drawScatter(command: ScatterCommand): void
  drawSegments(command: SegmentsCommand): void
  finish(): TFigure
}

export function renderEdaFigure<TFigure>(figure: EdaFigure, renderer: Renderer<TFigure>): TFigure {
  renderer.beginFigure({ title: figure.title, xLabel: figure.xLabel, panelCount: figure.panels.length })

  figure.panels.forEach((panel, index) => {
    renderer.beginPanel({ index, title: panel.title })
    for (const command of panel.commands) {
      switch (command.kind) {
        case 'line':
          renderer.drawLine(command)
          break
        case 'scatter':
          renderer.drawScatter(command)
          break
        case 'segments':
          renderer.drawSegments(command)
          break
      }
    }
  })

  return renderer.finish()
}
