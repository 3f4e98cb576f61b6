import { API_BASE } from './config'
import type { EdaPlotBackend } from './edaPlot'

export type PlotRenderedEvent = {
  type: 'eda_plot.rendered'
  message: string
  payload: {
    backend: EdaPlotBackend
    samples: number
    sampling_rate: number | null
    scr_count: number
    half_recovery_count: number
  }
}

export type PlotFailedEvent = {
  type: 'eda_plot.failed'
  message: string
  payload: {
    backend: EdaPlotBackend
    error_name: string
    sampling_rate: number | null
  }
}

export type SessionEvent = PlotRenderedEvent | PlotFailedEvent

const ACTIVE_SESSION_KEY = 'session.activeId'

export function getActiveSessionId(): string | null {
  try {
    const id = (localStorage.getItem(ACTIVE_SESSION_KEY) ?? '').trim()
    return id || null
  } catch {
    return null
  }
}

export function setActiveSessionId(sessionId: string | null) {
  const id = (sessionId ?? '').trim()
  try {
    if (id) localStorage.setItem(ACTIVE_SESSION_KEY, id)
    else localStorage.removeItem(ACTIVE_SESSION_KEY)
  } catch {
    // ignore
  }
}

export function sessionEventsUrl(sessionId: string) {
  return `${API_BASE}/sessions/${encodeURIComponent(sessionId)}/events`
}

/** Posts a plot event to the active session, if any. Never rejects. */
export async function logSessionEvent(event: SessionEvent): Promise<void> {
  const sessionId = getActiveSessionId()
  if (!sessionId) return

  try {
    await fetch(sessionEventsUrl(sessionId), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(event),
    })
  } catch {
    // non-blocking
  }
}
