import type { ComponentType } from 'react'
import type { PlotParams } from 'react-plotly.js'

import { IntegrationError } from './edaErrors'

export type PlotComponent = ComponentType<PlotParams>

type PlotlyModule = {
  default: PlotComponent | { default: PlotComponent }
}

export type PlotlyImporter = () => Promise<PlotlyModule>

export const INTERACTIVE_DEPENDENCY = 'react-plotly.js'

const defaultImporter: PlotlyImporter = () => import('react-plotly.js')

// Bundlers disagree on whether a CommonJS default export arrives wrapped once or twice.
function unwrapDefault(mod: PlotlyModule): PlotComponent {
  const candidate = mod.default
  return 'default' in candidate ? candidate.default : candidate
}

export async function loadPlotComponent(importer: PlotlyImporter = defaultImporter): Promise<PlotComponent> {
  let mod: PlotlyModule
  try {
    mod = await importer()
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new IntegrationError(
      INTERACTIVE_DEPENDENCY,
      `The '${INTERACTIVE_DEPENDENCY}' module is required when the backend is 'interactive'. ` +
        `Please install it first (\`npm install react-plotly.js plotly.js\`). Import failed: ${reason}`,
    )
  }
  return unwrapDefault(mod)
}
