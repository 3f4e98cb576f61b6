import { Component, useEffect, useMemo, useState, type ChangeEvent, type ReactNode } from 'react'
import { createPortal } from 'react-dom'

import { notifySignalsLoaded } from '../lib/appEvents'
import { STATIC_FIGURE_SIZE } from '../lib/config'
import { parseEdaSignalsCsv } from '../lib/edaCsv'
import { simulateEdaSignals } from '../lib/edaDemo'
import type { EdaFigure } from '../lib/edaFigure'
import { edaPlot, type EdaPlotBackend, type EdaPlotResult } from '../lib/edaPlot'
import { findEventIndices, signalLength, type EdaSignalTable } from '../lib/edaSignals'
import { loadEdaPlotPrefs, saveEdaPlotPrefs } from '../lib/plotPrefs'
import { logSessionEvent } from '../lib/sessionLogging'
import { renderStaticMarkup } from '../lib/svgRenderer'
import { usePanelSlots } from '../layout/panelSlotsContext'

type LoadedSignals = {
  name: string
  table: EdaSignalTable
}

const EXAMPLE_SAMPLING_RATE = 50

class PlotErrorBoundary extends Component<
  {
    children: ReactNode
  },
  {
    hasError: boolean
    message: string
  }
> {
  state = { hasError: false, message: '' }

  static getDerivedStateFromError(error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    return { hasError: true, message }
  }

  render() {
    if (this.state.hasError) {
      return (
        <div style={{ border: '1px solid #e5e7eb', padding: '1rem', borderRadius: '0.5rem' }}>
          <p style={{ margin: 0, color: 'crimson' }}>Plot failed to render.</p>
          <p style={{ marginTop: '0.5rem', marginBottom: 0, fontSize: '0.9rem' }}>{this.state.message}</p>
        </div>
      )
    }
    return this.props.children
  }
}

function parseSamplingRate(text: string): number | null {
  const t = text.trim()
  return t ? Number(t) : null
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e)
}

function fmt(v: number, digits = 3) {
  return Number.isFinite(v) ? v.toFixed(digits) : '?'
}

function downloadSvg(markup: string, filename: string) {
  const blob = new Blob([markup], { type: 'image/svg+xml' })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  document.body.appendChild(a)
  a.click()
  a.remove()
  URL.revokeObjectURL(url)
}

function ScrEventsTable({ spec }: { spec: EdaFigure }) {
  const { riseTime, amplitude, halfRecovery, halfRecoveryPeaks } = spec.segments
  const unit = spec.xLabel === 'Seconds' ? 's' : 'samples'

  return (
    <section aria-label="SCR events">
      <h2 style={{ fontSize: '1rem', marginTop: 0 }}>SCR events</h2>
      {riseTime.length ? (
        <table style={{ width: '100%', fontSize: '0.85rem', borderCollapse: 'collapse' }}>
          <thead>
            <tr>
              <th style={{ textAlign: 'left' }}>#</th>
              <th style={{ textAlign: 'right' }}>Onset</th>
              <th style={{ textAlign: 'right' }}>Peak</th>
              <th style={{ textAlign: 'right' }}>Rise time ({unit})</th>
              <th style={{ textAlign: 'right' }}>Amplitude</th>
            </tr>
          </thead>
          <tbody>
            {riseTime.map((r, i) => (
              <tr key={i} data-testid="scr-row">
                <td>{i + 1}</td>
                <td style={{ textAlign: 'right' }}>{fmt(r.x0, 2)}</td>
                <td style={{ textAlign: 'right' }}>{fmt(r.x1, 2)}</td>
                <td style={{ textAlign: 'right' }}>{fmt(r.x1 - r.x0, 2)}</td>
                <td style={{ textAlign: 'right' }}>{fmt(amplitude[i].y1 - amplitude[i].y0)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      ) : (
        <p style={{ margin: 0 }}>No SCR onsets or peaks in this table.</p>
      )}

      {halfRecovery.length ? (
        <>
          <h3 style={{ fontSize: '0.9rem' }}>Half recovery</h3>
          <ul style={{ margin: 0, paddingLeft: '1.25rem', fontSize: '0.85rem' }}>
            {halfRecovery.map((h, j) => (
              <li key={j} data-testid="half-recovery-row">
                at {fmt(h.x1, 2)} {unit}, from peak #{halfRecoveryPeaks[j] + 1} ({fmt(h.x1 - h.x0, 2)} {unit})
              </li>
            ))}
          </ul>
        </>
      ) : null}
    </section>
  )
}

export function PlotPage() {
  const panelSlots = usePanelSlots()
  const inspectorSlot = panelSlots?.inspectorSlot ?? null

  const [prefs] = useState(loadEdaPlotPrefs)
  const [signals, setSignals] = useState<LoadedSignals | null>(null)
  const [csvText, setCsvText] = useState('')
  const [samplingRateText, setSamplingRateText] = useState(() =>
    prefs.samplingRate === null ? '' : String(prefs.samplingRate),
  )
  const [backend, setBackend] = useState<EdaPlotBackend>(prefs.backend)

  const [result, setResult] = useState<EdaPlotResult | null>(null)
  // Bumped per result so the error boundary resets for every new render.
  const [renderId, setRenderId] = useState(0)
  const [error, setError] = useState<string | null>(null)
  const [busy, setBusy] = useState(false)

  const samplingRate = useMemo(() => parseSamplingRate(samplingRateText), [samplingRateText])

  useEffect(() => {
    if (samplingRate !== null && !(Number.isFinite(samplingRate) && samplingRate > 0)) return
    saveEdaPlotPrefs({ samplingRate, backend })
  }, [samplingRate, backend])

  useEffect(() => {
    if (!signals) return
    let cancelled = false

    async function run(loaded: LoadedSignals) {
      setBusy(true)
      try {
        const out = await edaPlot(loaded.table, { samplingRate, backend, size: STATIC_FIGURE_SIZE })
        if (cancelled) return
        setResult(out)
        setRenderId((n) => n + 1)
        setError(null)
        void logSessionEvent({
          type: 'eda_plot.rendered',
          message: `Plotted ${loaded.name}`,
          payload: {
            backend: out.backend,
            samples: out.spec.xAxis.length,
            sampling_rate: samplingRate,
            scr_count: out.spec.events.peaks.length,
            half_recovery_count: out.spec.events.halfRecovery.length,
          },
        })
      } catch (e) {
        if (cancelled) return
        setResult(null)
        setError(errorMessage(e))
        void logSessionEvent({
          type: 'eda_plot.failed',
          message: `Could not plot ${loaded.name}`,
          payload: {
            backend,
            error_name: e instanceof Error ? e.name : 'Error',
            sampling_rate: samplingRate,
          },
        })
      } finally {
        if (!cancelled) setBusy(false)
      }
    }

    void run(signals)
    return () => {
      cancelled = true
    }
  }, [signals, samplingRate, backend])

  function loadSignals(next: LoadedSignals) {
    setSignals(next)
    notifySignalsLoaded({
      name: next.name,
      samples: signalLength(next.table),
      scrCount: findEventIndices(next.table.SCR_Peaks).length,
    })
  }

  function onLoadExample() {
    setSamplingRateText(String(EXAMPLE_SAMPLING_RATE))
    loadSignals({
      name: `Example (synthetic, ${EXAMPLE_SAMPLING_RATE} Hz)`,
      table: simulateEdaSignals({ samplingRate: EXAMPLE_SAMPLING_RATE }),
    })
  }

  function onPlotCsv() {
    try {
      loadSignals({ name: 'Pasted CSV', table: parseEdaSignalsCsv(csvText) })
    } catch (e) {
      setSignals(null)
      setResult(null)
      setError(errorMessage(e))
    }
  }

  function onPickFile(e: ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0]
    if (!file) return
    const reader = new FileReader()
    reader.onload = () => {
      const text = typeof reader.result === 'string' ? reader.result : ''
      setCsvText(text)
      try {
        loadSignals({ name: file.name, table: parseEdaSignalsCsv(text) })
      } catch (err) {
        setSignals(null)
        setResult(null)
        setError(errorMessage(err))
      }
    }
    reader.onerror = () => setError(`Could not read ${file.name}`)
    reader.readAsText(file)
  }

  const inspector = result ? <ScrEventsTable spec={result.spec} /> : null

  return (
    <section>
      <h1>Plot</h1>

      <div style={{ display: 'flex', gap: '0.75rem', flexWrap: 'wrap', alignItems: 'end', marginBottom: '0.75rem' }}>
        <button type="button" onClick={onLoadExample}>
          Load example
        </button>

        <label style={{ display: 'grid', gap: '0.25rem' }}>
          <span style={{ fontSize: '0.8rem' }}>Sampling rate (Hz)</span>
          <input
            aria-label="Sampling rate"
            value={samplingRateText}
            onChange={(e) => setSamplingRateText(e.target.value)}
            placeholder="blank = sample index"
            style={{ width: 160 }}
          />
        </label>

        <label style={{ display: 'grid', gap: '0.25rem' }}>
          <span style={{ fontSize: '0.8rem' }}>Backend</span>
          <select
            aria-label="Backend"
            value={backend}
            onChange={(e) => setBackend(e.target.value === 'interactive' ? 'interactive' : 'static')}
          >
            <option value="static">Static (SVG)</option>
            <option value="interactive">Interactive (Plotly)</option>
          </select>
        </label>

        {result?.backend === 'static' ? (
          <button type="button" onClick={() => downloadSvg(renderStaticMarkup(result.figure), 'eda-plot.svg')}>
            Download SVG
          </button>
        ) : null}
      </div>

      <details style={{ marginBottom: '0.75rem' }}>
        <summary>Load a CSV table</summary>
        <div style={{ display: 'grid', gap: '0.5rem', marginTop: '0.5rem' }}>
          <input type="file" accept=".csv,text/csv" aria-label="CSV file" onChange={onPickFile} />
          <textarea
            aria-label="Signal table CSV"
            value={csvText}
            onChange={(e) => setCsvText(e.target.value)}
            rows={6}
            placeholder="EDA_Raw,EDA_Clean,EDA_Phasic,EDA_Tonic,SCR_Onsets,SCR_Peaks,SCR_Recovery"
            style={{ fontFamily: 'monospace' }}
          />
          <div>
            <button type="button" onClick={onPlotCsv} disabled={!csvText.trim()}>
              Plot CSV
            </button>
          </div>
        </div>
      </details>

      {signals ? (
        <p style={{ marginTop: 0, fontSize: '0.85rem' }}>
          {signals.name} · {signalLength(signals.table)} samples{busy ? ' · rendering…' : ''}
        </p>
      ) : null}

      {error ? (
        <p role="alert" style={{ color: 'crimson' }}>
          {error}
        </p>
      ) : null}

      {!signals && !error ? <p>Load the example or a CSV table to plot it.</p> : null}

      {result ? (
        <PlotErrorBoundary key={`${result.backend}-${renderId}`}>
          {result.backend === 'static' ? (
            <div data-testid="eda-static-figure" style={{ overflow: 'auto' }}>
              {result.figure.element}
            </div>
          ) : (
            <result.Plot
              data={result.figure.data}
              layout={result.figure.layout}
              config={{ displaylogo: false, responsive: true }}
              useResizeHandler
              style={{ width: '100%', height: `${STATIC_FIGURE_SIZE.height}px` }}
            />
          )}
        </PlotErrorBoundary>
      ) : null}

      {inspector ? (inspectorSlot ? createPortal(inspector, inspectorSlot) : <div style={{ marginTop: '1rem' }}>{inspector}</div>) : null}
    </section>
  )
}
