import { useEffect, useMemo, useState } from 'react'
import { useSearchParams } from 'react-router-dom'
import ReactMarkdown from 'react-markdown'

import csvFormat from '../../../../docs/csv-format.md?raw'
import glossary from '../../../../docs/glossary.md?raw'
import overview from '../../../../docs/index.md?raw'
import readingTheFigure from '../../../../docs/reading-the-figure.md?raw'

type DocEntry = {
  id: string
  title: string
  category: string
  content: string
}

const DOCS: DocEntry[] = [
  { id: 'overview', title: 'Overview', category: 'Start here', content: overview },
  { id: 'reading-the-figure', title: 'Reading the figure', category: 'Guides', content: readingTheFigure },
  { id: 'csv-format', title: 'CSV format', category: 'Guides', content: csvFormat },
  { id: 'glossary', title: 'Glossary', category: 'Reference', content: glossary },
]

const CATEGORIES = ['All', ...new Set(DOCS.map((d) => d.category))]

export function DocsPage() {
  const [searchParams, setSearchParams] = useSearchParams()

  const [category, setCategory] = useState(() => searchParams.get('cat') ?? 'All')
  const [query, setQuery] = useState(() => searchParams.get('q') ?? '')
  const [selectedDocId, setSelectedDocId] = useState(() => searchParams.get('doc') ?? 'overview')

  useEffect(() => {
    const next = new URLSearchParams(searchParams)
    if (category === 'All') next.delete('cat')
    else next.set('cat', category)

    if (query.trim() === '') next.delete('q')
    else next.set('q', query)

    if (selectedDocId === 'overview') next.delete('doc')
    else next.set('doc', selectedDocId)

    if (next.toString() !== searchParams.toString()) setSearchParams(next, { replace: true })
  }, [category, query, selectedDocId, searchParams, setSearchParams])

  const filteredDocs = useMemo(() => {
    const q = query.trim().toLowerCase()
    return DOCS.filter((d) => category === 'All' || d.category === category).filter(
      (d) => !q || d.title.toLowerCase().includes(q) || d.content.toLowerCase().includes(q),
    )
  }, [category, query])

  const selectedDoc = DOCS.find((d) => d.id === selectedDocId) ?? DOCS[0]

  return (
    <section>
      <h1>Docs</h1>
      <p style={{ marginTop: '0.25rem', marginBottom: '0.75rem' }}>
        How to load a table and read the EDA figure. Search matches titles and content.
      </p>

      <div style={{ display: 'grid', gridTemplateColumns: '280px 1fr', gap: '1rem', minHeight: 0 }}>
        <aside style={{ borderRight: '1px solid #e5e7eb', paddingRight: '1rem', minHeight: 0 }}>
          <div>
            <label htmlFor="docs-search" style={{ display: 'block', fontWeight: 700, marginBottom: '0.25rem' }}>
              Search
            </label>
            <input
              id="docs-search"
              aria-label="Search docs"
              value={query}
              onChange={(e) => setQuery(e.target.value)}
              placeholder="Try: SCR_Recovery, sampling rate, amplitude"
              style={{ width: '100%' }}
            />
          </div>

          <div style={{ marginTop: '0.75rem' }}>
            <div style={{ fontWeight: 700, marginBottom: '0.25rem' }}>Category</div>
            <div style={{ display: 'flex', flexWrap: 'wrap', gap: '0.25rem' }}>
              {CATEGORIES.map((c) => (
                <button
                  key={c}
                  type="button"
                  onClick={() => setCategory(c)}
                  style={{
                    padding: '0.25rem 0.5rem',
                    border: '1px solid #e5e7eb',
                    background: c === category ? '#e5e7eb' : 'transparent',
                    cursor: 'pointer',
                  }}
                >
                  {c}
                </button>
              ))}
            </div>
          </div>

          <div style={{ marginTop: '0.75rem', minHeight: 0 }}>
            <div style={{ fontWeight: 700, marginBottom: '0.25rem' }}>Pages</div>
            <div style={{ display: 'grid', gap: '0.25rem' }}>
              {filteredDocs.length ? (
                filteredDocs.map((d) => (
                  <button
                    key={d.id}
                    type="button"
                    onClick={() => setSelectedDocId(d.id)}
                    style={{
                      textAlign: 'left',
                      padding: '0.25rem 0.5rem',
                      border: '1px solid #e5e7eb',
                      background: d.id === selectedDocId ? '#e5e7eb' : 'transparent',
                      cursor: 'pointer',
                    }}
                  >
                    {d.title}
                  </button>
                ))
              ) : (
                <p style={{ marginTop: '0.25rem' }}>No matches.</p>
              )}
            </div>
          </div>

          <div style={{ marginTop: '0.75rem' }}>
            <div style={{ fontWeight: 700, marginBottom: '0.25rem' }}>Quick answers</div>
            <div style={{ display: 'grid', gap: '0.25rem' }}>
              {[
                { label: 'CSV columns', q: 'SCR_Recovery' },
                { label: 'Sampling rate', q: 'sampling rate' },
                { label: 'Half recovery', q: 'half-recovery' },
              ].map((item) => (
                <button
                  key={item.label}
                  type="button"
                  onClick={() => setQuery(item.q)}
                  style={{
                    textAlign: 'left',
                    padding: '0.25rem 0.5rem',
                    border: '1px solid #e5e7eb',
                    background: 'transparent',
                    cursor: 'pointer',
                  }}
                >
                  {item.label}
                </button>
              ))}
            </div>
          </div>
        </aside>

        <main style={{ minWidth: 0 }}>
          <h2 style={{ fontSize: '1.1rem', marginTop: 0 }}>{selectedDoc.title}</h2>
          <div style={{ border: '1px solid #e5e7eb', padding: '0.75rem', overflow: 'auto', maxHeight: '70vh' }}>
            <ReactMarkdown>{selectedDoc.content}</ReactMarkdown>
          </div>
        </main>
      </div>
    </section>
  )
}
