import type { ReactElement } from 'react'
import { renderToStaticMarkup } from 'react-dom/server'

import type { LineCommand, LineStyle, ScatterCommand, SegmentsCommand } from './edaFigure'
import type { FigureMeta, PanelMeta, Renderer } from './edaRenderer'

export type StaticFigure = {
  title: string
  width: number
  height: number
  element: ReactElement
}

export type SvgRendererOptions = {
  width?: number
  height?: number
}

type LegendEntry = { label: string; color: string }

type PanelDraft = {
  title: string
  lines: LineCommand[]
  scatters: ScatterCommand[]
  segments: SegmentsCommand[]
  legend: LegendEntry[]
}

export type LinearScale = {
  domain: [number, number]
  (v: number): number
}

const MARGIN = { left: 64, right: 180, header: 44, footer: 44 }
const PANEL_TITLE_HEIGHT = 22
const PANEL_GAP = 10

function fmt(v: number) {
  return Math.round(v * 100) / 100
}

function extent(values: Iterable<number>): [number, number] | null {
  let lo = Infinity
  let hi = -Infinity
  for (const v of values) {
    if (!Number.isFinite(v)) continue
    if (v < lo) lo = v
    if (v > hi) hi = v
  }
  return lo <= hi ? [lo, hi] : null
}

/** Maps [d0, d1] onto [r0, r1]; a zero-width domain maps everything to the range midpoint. */
export function createScale(domain: [number, number], range: [number, number]): LinearScale {
  const [d0, d1] = domain
  const [r0, r1] = range
  const span = d1 - d0
  const scale = (v: number) => (span === 0 ? (r0 + r1) / 2 : r0 + ((v - d0) / span) * (r1 - r0))
  return Object.assign(scale, { domain })
}

function dashArray(style: LineStyle) {
  return style.dash === 'dash' ? '4 3' : undefined
}

function* panelY(p: PanelDraft): Generator<number> {
  for (const c of p.lines) yield* c.y
  for (const c of p.scatters) yield* c.y
  for (const c of p.segments) {
    for (const s of c.segments) {
      yield s.y0
      yield s.y1
    }
  }
}

function* allX(panels: PanelDraft[]): Generator<number> {
  for (const p of panels) {
    for (const c of p.lines) yield* c.x
    for (const c of p.scatters) yield* c.x
    for (const c of p.segments) {
      for (const s of c.segments) {
        yield s.x0
        yield s.x1
      }
    }
  }
}

function polylinePoints(x: readonly number[], y: readonly number[], sx: LinearScale, sy: LinearScale) {
  const out: string[] = []
  for (let i = 0; i < x.length; i++) {
    if (!Number.isFinite(x[i]) || !Number.isFinite(y[i])) continue
    out.push(`${fmt(sx(x[i]))},${fmt(sy(y[i]))}`)
  }
  return out.join(' ')
}

export function createSvgRenderer(options: SvgRendererOptions = {}): Renderer<StaticFigure> {
  const width = options.width ?? 900
  const height = options.height ?? 720
  const panels: PanelDraft[] = []
  let meta: FigureMeta | null = null

  function current(): PanelDraft {
    const p = panels[panels.length - 1]
    if (!p) throw new Error('drawing before beginPanel')
    return p
  }

  return {
    beginFigure(next) {
      meta = next
    },

    beginPanel(next: PanelMeta) {
      panels.push({ title: next.title, lines: [], scatters: [], segments: [], legend: [] })
    },

    drawLine(command) {
      const p = current()
      p.lines.push(command)
      p.legend.push({ label: command.label, color: command.style.color })
    },

    drawScatter(command) {
      const p = current()
      p.scatters.push(command)
      p.legend.push({ label: command.label, color: command.color })
    },

    drawSegments(command) {
      const p = current()
      p.segments.push(command)
      p.legend.push({ label: command.label, color: command.style.color })
    },

    finish() {
      if (!meta) throw new Error('finish before beginFigure')
      const { title, xLabel } = meta

      const plotLeft = MARGIN.left
      const plotRight = width - MARGIN.right
      const slot = (height - MARGIN.header - MARGIN.footer) / Math.max(1, panels.length)
      const sx = createScale(extent(allX(panels)) ?? [0, 1], [plotLeft, plotRight])

      const element = (
        <svg
          xmlns="http://www.w3.org/2000/svg"
          width={width}
          height={height}
          viewBox={`0 0 ${width} ${height}`}
          role="img"
          aria-label={title}
          fontFamily="sans-serif"
        >
          <rect x={0} y={0} width={width} height={height} fill="#ffffff" />
          <text x={width / 2} y={26} textAnchor="middle" fontSize={16} fontWeight="bold">
            {title}
          </text>

          {panels.map((p, i) => {
            const slotTop = MARGIN.header + i * slot
            const top = slotTop + PANEL_TITLE_HEIGHT
            const bottom = slotTop + slot - PANEL_GAP
            const [y0, y1] = extent(panelY(p)) ?? [0, 1]
            const pad = (y1 - y0) * 0.05
            const sy = createScale([y0 - pad, y1 + pad], [bottom, top])

            return (
              <g key={p.title} data-panel={i}>
                <text x={(plotLeft + plotRight) / 2} y={slotTop + 16} textAnchor="middle" fontSize={13}>
                  {p.title}
                </text>
                <rect x={plotLeft} y={top} width={plotRight - plotLeft} height={bottom - top} fill="none" stroke="#e5e7eb" />
                <text x={plotLeft - 6} y={top + 10} textAnchor="end" fontSize={10}>
                  {fmt(y1)}
                </text>
                <text x={plotLeft - 6} y={bottom} textAnchor="end" fontSize={10}>
                  {fmt(y0)}
                </text>

                {p.lines.map((c) => (
                  <polyline
                    key={c.label}
                    data-series={c.label}
                    points={polylinePoints(c.x, c.y, sx, sy)}
                    fill="none"
                    stroke={c.style.color}
                    strokeWidth={c.style.width}
                    strokeDasharray={dashArray(c.style)}
                  />
                ))}

                {p.segments.map((c) =>
                  c.segments.map((s, k) => (
                    <line
                      key={`${c.label}-${k}`}
                      data-series={c.label}
                      x1={fmt(sx(s.x0))}
                      y1={fmt(sy(s.y0))}
                      x2={fmt(sx(s.x1))}
                      y2={fmt(sy(s.y1))}
                      stroke={c.style.color}
                      strokeWidth={c.style.width}
                      strokeDasharray={dashArray(c.style)}
                    />
                  )),
                )}

                {p.scatters.map((c) =>
                  c.x.map((x, k) => (
                    <circle
                      key={`${c.label}-${k}`}
                      data-series={c.label}
                      cx={fmt(sx(x))}
                      cy={fmt(sy(c.y[k]))}
                      r={3}
                      fill={c.color}
                    />
                  )),
                )}

                <g data-legend={i}>
                  {p.legend.map((entry, k) => (
                    <g key={entry.label}>
                      <rect x={plotRight + 12} y={top + k * 14} width={10} height={3} fill={entry.color} />
                      <text x={plotRight + 28} y={top + k * 14 + 4} fontSize={10}>
                        {entry.label}
                      </text>
                    </g>
                  ))}
                </g>
              </g>
            )
          })}

          <text x={plotLeft} y={height - MARGIN.footer + 16} textAnchor="start" fontSize={10}>
            {fmt(sx.domain[0])}
          </text>
          <text x={plotRight} y={height - MARGIN.footer + 16} textAnchor="end" fontSize={10}>
            {fmt(sx.domain[1])}
          </text>
          <text x={(plotLeft + plotRight) / 2} y={height - 12} textAnchor="middle" fontSize={12}>
            {xLabel}
          </text>
        </svg>
      )

      return { title, width, height, element }
    },
  }
}

export function renderStaticMarkup(figure: StaticFigure): string {
  return renderToStaticMarkup(figure.element)
}
