import { buildEdaFigure, type EdaFigure } from './edaFigure'
import { renderEdaFigure } from './edaRenderer'
import type { EdaSignalTable } from './edaSignals'
import { loadPlotComponent, type PlotComponent, type PlotlyImporter } from './interactiveBackend'
import { createPlotlyRenderer, type PlotlyFigure } from './plotlyRenderer'
import { createSvgRenderer, type StaticFigure, type SvgRendererOptions } from './svgRenderer'

export type EdaPlotBackend = 'static' | 'interactive'

export type EdaPlotOptions = {
  samplingRate?: number | null
  backend?: EdaPlotBackend
  size?: SvgRendererOptions
  importPlotly?: PlotlyImporter
}

export type EdaPlotResult =
  | { backend: 'static'; spec: EdaFigure; figure: StaticFigure }
  | { backend: 'interactive'; spec: EdaFigure; figure: PlotlyFigure; Plot: PlotComponent }

/**
 * Plots a processed EDA table with the chosen backend.
 *
 * The interactive backend resolves `react-plotly.js` lazily and rejects with an
 * `IntegrationError` when it cannot be loaded. Shape and matching errors from the table
 * surface before any backend work starts.
 */
export async function edaPlot(table: EdaSignalTable, options: EdaPlotOptions = {}): Promise<EdaPlotResult> {
  const spec = buildEdaFigure(table, { samplingRate: options.samplingRate })

  if (options.backend === 'interactive') {
    const Plot = await loadPlotComponent(options.importPlotly)
    const figure = renderEdaFigure(spec, createPlotlyRenderer({ height: options.size?.height }))
    return { backend: 'interactive', spec, figure, Plot }
  }

  return { backend: 'static', spec, figure: renderEdaFigure(spec, createSvgRenderer(options.size)) }
}
