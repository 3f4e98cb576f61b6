import type { EdaPlotBackend } from './edaPlot'

export type EdaPlotPrefsV1 = {
  version: 1
  kind: 'eda-plot-prefs'
  saved_at: string
  state: {
    samplingRate: number | null
    backend: EdaPlotBackend
  }
}

const PREFS_KEY = 'edaPlot.prefs:v1'

export const DEFAULT_PLOT_PREFS: EdaPlotPrefsV1['state'] = { samplingRate: null, backend: 'static' }

export function buildEdaPlotPrefsV1(args: { state: EdaPlotPrefsV1['state']; saved_at?: string }): EdaPlotPrefsV1 {
  return {
    version: 1,
    kind: 'eda-plot-prefs',
    saved_at: args.saved_at ?? new Date().toISOString(),
    state: args.state,
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v)
}

function isBackend(v: unknown): v is EdaPlotBackend {
  return v === 'static' || v === 'interactive'
}

function safeJsonParse(raw: string | null): unknown {
  if (!raw) return null
  try {
    return JSON.parse(raw)
  } catch {
    return null
  }
}

export function coerceEdaPlotPrefsV1(payload: unknown): EdaPlotPrefsV1 | null {
  if (!isRecord(payload)) return null
  if (payload.version !== 1) return null
  if (payload.kind !== 'eda-plot-prefs') return null
  if (!isRecord(payload.state)) return null

  const saved_at = typeof payload.saved_at === 'string' ? payload.saved_at : ''
  if (!saved_at.trim()) return null

  const { backend } = payload.state
  if (!isBackend(backend)) return null

  const rate = payload.state.samplingRate
  let samplingRate: number | null = null
  if (rate !== null) {
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) return null
    samplingRate = rate
  }

  return { version: 1, kind: 'eda-plot-prefs', saved_at, state: { samplingRate, backend } }
}

export function loadEdaPlotPrefs(): EdaPlotPrefsV1['state'] {
  try {
    const prefs = coerceEdaPlotPrefsV1(safeJsonParse(localStorage.getItem(PREFS_KEY)))
    return prefs ? prefs.state : DEFAULT_PLOT_PREFS
  } catch {
    return DEFAULT_PLOT_PREFS
  }
}

export function saveEdaPlotPrefs(state: EdaPlotPrefsV1['state']): void {
  try {
    localStorage.setItem(PREFS_KEY, JSON.stringify(buildEdaPlotPrefsV1({ state })))
  } catch {
    // ignore
  }
}
