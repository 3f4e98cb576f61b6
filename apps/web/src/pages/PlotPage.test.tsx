import { fireEvent, render, screen, waitFor } from '@testing-library/react'
import { describe, expect, it, vi } from 'vitest'

import { PlotPage } from './PlotPage'

const plotly = vi.hoisted(() => ({ fail: false }))

vi.mock('react-plotly.js', () => {
  return {
    default: (props: { data?: unknown; layout?: unknown }) => {
      if (plotly.fail) throw new Error('plot crashed')
      const traces = Array.isArray(props.data) ? props.data : []
      return (
        <div
          data-testid="plotly"
          data-traces={JSON.stringify(traces)}
          data-layout={JSON.stringify(props.layout ?? {})}
        />
      )
    },
  }
})

const HEADER = 'EDA_Raw,EDA_Clean,EDA_Phasic,EDA_Tonic,SCR_Onsets,SCR_Peaks,SCR_Recovery'

function pasteCsv(text: string) {
  fireEvent.change(screen.getByLabelText('Signal table CSV'), { target: { value: text } })
  fireEvent.click(screen.getByText('Plot CSV'))
}

describe('PlotPage', () => {
  it('plots the example signal with the static backend', async () => {
    render(<PlotPage />)

    fireEvent.click(screen.getByText('Load example'))

    expect(await screen.findByRole('img', { name: 'Electrodermal Activity (EDA)' })).toBeInTheDocument()
    expect(screen.getByText('Seconds')).toBeInTheDocument()
    expect(screen.getAllByTestId('scr-row')).toHaveLength(4)
    expect(screen.getAllByTestId('half-recovery-row')).toHaveLength(4)
    expect((screen.getByLabelText('Sampling rate') as HTMLInputElement).value).toBe('50')
  })

  it('hands the Plotly figure to react-plotly.js on the interactive backend', async () => {
    render(<PlotPage />)

    fireEvent.change(screen.getByLabelText('Backend'), { target: { value: 'interactive' } })
    fireEvent.click(screen.getByText('Load example'))

    const plot = await screen.findByTestId('plotly')
    const traces = JSON.parse(plot.getAttribute('data-traces') ?? '[]') as Array<{ name?: string }>
    expect(traces.map((t) => t.name)).toEqual([
      'Raw',
      'Cleaned',
      'Phasic Component',
      'SCR - Onsets',
      'SCR - Peaks',
      'SCR - Half recovery',
      'Rise Time',
      'SCR Amplitude',
      'Half Recovery',
      'Tonic Component',
    ])
    const layout = JSON.parse(plot.getAttribute('data-layout') ?? '{}') as { title?: { text?: string } }
    expect(layout.title?.text).toBe('Electrodermal Activity (EDA)')
  })

  it('downloads the static figure through an attached link', async () => {
    const createObjectURL = vi.fn((_blob: Blob) => 'blob:eda-plot')
    const revokeObjectURL = vi.fn((_url: string) => {})
    Object.defineProperty(URL, 'createObjectURL', { value: createObjectURL, configurable: true })
    Object.defineProperty(URL, 'revokeObjectURL', { value: revokeObjectURL, configurable: true })
    const clicked: Array<{ connected: boolean; download: string; href: string }> = []
    const click = vi.spyOn(HTMLAnchorElement.prototype, 'click').mockImplementation(function (this: HTMLAnchorElement) {
      clicked.push({ connected: this.isConnected, download: this.download, href: this.href })
    })

    try {
      render(<PlotPage />)
      fireEvent.click(screen.getByText('Load example'))
      await screen.findByTestId('eda-static-figure')

      fireEvent.click(screen.getByText('Download SVG'))

      expect(clicked).toEqual([{ connected: true, download: 'eda-plot.svg', href: 'blob:eda-plot' }])
      expect(createObjectURL.mock.calls[0][0].type).toBe('image/svg+xml')
      expect(revokeObjectURL).toHaveBeenCalledWith('blob:eda-plot')
      expect(document.querySelector('a[download]')).toBeNull()
    } finally {
      click.mockRestore()
    }
  })

  it('recovers from a failed render when the next result arrives', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
    plotly.fail = true
    try {
      render(<PlotPage />)

      fireEvent.change(screen.getByLabelText('Backend'), { target: { value: 'interactive' } })
      fireEvent.click(screen.getByText('Load example'))
      expect(await screen.findByText('Plot failed to render.')).toBeInTheDocument()
      expect(screen.getByText('plot crashed')).toBeInTheDocument()

      plotly.fail = false
      pasteCsv([HEADER, '1,1,0.1,1,1,0,0', '1,1,0.9,1,0,1,0', '1,1,0.5,1,0,0,1'].join('\n'))

      expect(await screen.findByTestId('plotly')).toBeInTheDocument()
      expect(screen.queryByText('Plot failed to render.')).not.toBeInTheDocument()
    } finally {
      plotly.fail = false
      consoleError.mockRestore()
    }
  })

  it('shows the error when a half-recovery point precedes every peak', async () => {
    render(<PlotPage />)

    pasteCsv([HEADER, '1,1,0.1,1,1,0,1', '1,1,0.9,1,0,1,0', '1,1,0.5,1,0,0,0'].join('\n'))

    expect(await screen.findByRole('alert')).toHaveTextContent('No value at or below 0 among 1 candidates')
    expect(screen.queryByTestId('eda-static-figure')).not.toBeInTheDocument()
  })

  it('reports CSV problems without plotting', () => {
    render(<PlotPage />)

    pasteCsv('EDA_Raw,EDA_Clean\n1,2')

    expect(screen.getByRole('alert')).toHaveTextContent(
      'CSV is missing required columns: EDA_Phasic, EDA_Tonic, SCR_Onsets, SCR_Peaks, SCR_Recovery',
    )
  })

  it('uses sample indices when no sampling rate is given', async () => {
    render(<PlotPage />)

    pasteCsv([HEADER, '1,1,0.1,1,1,0,0', '1,1,0.9,1,0,1,0', '1,1,0.5,1,0,0,1'].join('\n'))

    expect(await screen.findByTestId('eda-static-figure')).toBeInTheDocument()
    expect(screen.getByText('Samples')).toBeInTheDocument()
    expect(screen.getAllByTestId('scr-row')).toHaveLength(1)
    expect(screen.getByTestId('half-recovery-row')).toHaveTextContent('at 2.00 samples, from peak #1 (1.00 samples)')
  })

  it('logs the render to the active session', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => ({ ok: true }))
    vi.stubGlobal('fetch', fetchMock)
    localStorage.setItem('session.activeId', 's-1')

    render(<PlotPage />)
    fireEvent.click(screen.getByText('Load example'))

    await waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1))
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://localhost:8000/sessions/s-1/events')
    const body = JSON.parse(String(init?.body)) as { type: string; payload: Record<string, unknown> }
    expect(body.type).toBe('eda_plot.rendered')
    expect(body.payload).toEqual({
      backend: 'static',
      samples: 1500,
      sampling_rate: 50,
      scr_count: 4,
      half_recovery_count: 4,
    })
  })
})
