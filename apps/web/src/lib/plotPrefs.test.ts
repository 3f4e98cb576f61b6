import { describe, expect, it } from 'vitest'

import {
  buildEdaPlotPrefsV1,
  coerceEdaPlotPrefsV1,
  DEFAULT_PLOT_PREFS,
  loadEdaPlotPrefs,
  saveEdaPlotPrefs,
} from './plotPrefs'

describe('plotPrefs', () => {
  it('round-trips a prefs payload', () => {
    const prefs = buildEdaPlotPrefsV1({
      saved_at: '2026-01-05T00:00:00.000Z',
      state: { samplingRate: 250, backend: 'interactive' },
    })
    expect(coerceEdaPlotPrefsV1(JSON.parse(JSON.stringify(prefs)))).toEqual(prefs)
  })

  it('rejects payloads that are not prefs', () => {
    expect(coerceEdaPlotPrefsV1(null)).toBeNull()
    expect(coerceEdaPlotPrefsV1({})).toBeNull()
    expect(coerceEdaPlotPrefsV1({ version: 2, kind: 'eda-plot-prefs', saved_at: 'x', state: {} })).toBeNull()
    expect(
      coerceEdaPlotPrefsV1({ version: 1, kind: 'eda-plot-prefs', saved_at: 'x', state: { samplingRate: -1, backend: 'static' } }),
    ).toBeNull()
    expect(
      coerceEdaPlotPrefsV1({ version: 1, kind: 'eda-plot-prefs', saved_at: 'x', state: { samplingRate: null, backend: 'canvas' } }),
    ).toBeNull()
  })

  it('falls back to defaults when nothing valid is stored', () => {
    expect(loadEdaPlotPrefs()).toEqual(DEFAULT_PLOT_PREFS)
    localStorage.setItem('edaPlot.prefs:v1', '{not json')
    expect(loadEdaPlotPrefs()).toEqual(DEFAULT_PLOT_PREFS)
  })

  it('persists prefs in localStorage', () => {
    saveEdaPlotPrefs({ samplingRate: 100, backend: 'interactive' })
    expect(loadEdaPlotPrefs()).toEqual({ samplingRate: 100, backend: 'interactive' })
  })
})
