import { useCallback, useEffect, useState } from 'react'
import { NavLink, Navigate, Outlet, Route, Routes } from 'react-router-dom'

import { PanelSlotsContext } from './layout/panelSlotsContext'
import { onSignalsLoaded, type SignalsLoadedDetail } from './lib/appEvents'
import { DocsPage } from './pages/DocsPage'
import { PlotPage } from './pages/PlotPage'

const navStyle = ({ isActive }: { isActive: boolean }) => ({
  fontWeight: isActive ? 700 : 400,
  textDecoration: 'none',
  padding: '0.25rem 0.5rem',
})

function readStoredBool(key: string, fallback: boolean) {
  try {
    const raw = localStorage.getItem(key)
    if (raw === 'true') return true
    if (raw === 'false') return false
  } catch {
    // ignore
  }
  return fallback
}

function writeStoredBool(key: string, value: boolean) {
  try {
    localStorage.setItem(key, value ? 'true' : 'false')
  } catch {
    // ignore
  }
}

function AppShell() {
  const [inspectorCollapsed, setInspectorCollapsed] = useState(() => readStoredBool('ui.inspectorCollapsed', false))
  const [inspectorSlot, setInspectorSlot] = useState<HTMLElement | null>(null)
  const [loaded, setLoaded] = useState<SignalsLoadedDetail | null>(null)

  const onInspectorSlotRef = useCallback((el: HTMLDivElement | null) => {
    setInspectorSlot((prev) => (prev === el ? prev : el))
  }, [])

  useEffect(() => onSignalsLoaded(setLoaded), [])

  const inspectorWidth = inspectorCollapsed ? '0px' : '360px'

  return (
    <PanelSlotsContext.Provider value={{ inspectorSlot }}>
      <div
        style={{
          display: 'grid',
          gridTemplateRows: 'auto 1fr',
          height: '100vh',
          minHeight: 0,
        }}
      >
        <header style={{ borderBottom: '1px solid #e5e7eb', padding: '0.75rem 1rem' }}>
          <nav style={{ display: 'flex', gap: '0.5rem', alignItems: 'center', flexWrap: 'wrap' }}>
            <strong style={{ marginRight: '0.5rem' }}>EDA Plot</strong>

            <NavLink to="/plot" data-testid="nav-plot" style={navStyle}>
              Plot
            </NavLink>

            <button
              type="button"
              data-testid="nav-inspector"
              onClick={() => {
                setInspectorCollapsed((prev) => {
                  const next = !prev
                  writeStoredBool('ui.inspectorCollapsed', next)
                  return next
                })
              }}
              style={{
                fontWeight: inspectorCollapsed ? 400 : 700,
                padding: '0.25rem 0.5rem',
                border: '1px solid #e5e7eb',
                background: 'transparent',
                cursor: 'pointer',
              }}
              title={inspectorCollapsed ? 'Show Inspector panel' : 'Hide Inspector panel'}
            >
              Inspector
            </button>

            <NavLink to="/docs" data-testid="nav-docs" style={navStyle}>
              Docs
            </NavLink>

            <span data-testid="loaded-signals" style={{ marginLeft: 'auto', fontSize: '0.85rem', opacity: 0.85 }}>
              {loaded ? `${loaded.name}: ${loaded.samples} samples, ${loaded.scrCount} SCRs` : 'No signals loaded'}
            </span>
          </nav>
        </header>

        <div
          style={{
            display: 'grid',
            gridTemplateColumns: `minmax(0, 1fr) ${inspectorWidth}`,
            minHeight: 0,
          }}
        >
          <main style={{ padding: '0.75rem', overflow: 'auto', minHeight: 0 }}>
            <Outlet />
          </main>

          <aside
            aria-label="Inspector panel"
            style={{
              borderLeft: inspectorCollapsed ? 'none' : '1px solid #e5e7eb',
              overflow: 'auto',
              padding: inspectorCollapsed ? 0 : '0.75rem',
              minHeight: 0,
              display: inspectorCollapsed ? 'none' : 'block',
            }}
          >
            <div ref={onInspectorSlotRef} />
          </aside>
        </div>
      </div>
    </PanelSlotsContext.Provider>
  )
}

function App() {
  return (
    <Routes>
      <Route element={<AppShell />}>
        <Route path="/" element={<Navigate to="/plot" replace />} />
        <Route path="/plot" element={<PlotPage />} />
        <Route path="/docs" element={<DocsPage />} />
      </Route>
    </Routes>
  )
}

export default App
