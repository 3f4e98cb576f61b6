import { fireEvent, render, screen } from '@testing-library/react'
import { MemoryRouter } from 'react-router-dom'
import { describe, expect, it } from 'vitest'

import { DocsPage } from './DocsPage'

describe('DocsPage', () => {
  it('prefills search from URL params', () => {
    render(
      <MemoryRouter initialEntries={['/docs?q=amplitude']}>
        <DocsPage />
      </MemoryRouter>,
    )

    const input = screen.getByLabelText('Search docs') as HTMLInputElement
    expect(input.value).toBe('amplitude')
  })

  it('filters pages by query', () => {
    render(
      <MemoryRouter initialEntries={['/docs']}>
        <DocsPage />
      </MemoryRouter>,
    )

    fireEvent.change(screen.getByLabelText('Search docs'), { target: { value: 'SCR_Recovery' } })

    expect(screen.getByRole('button', { name: 'CSV format' })).toBeInTheDocument()
    expect(screen.queryByRole('button', { name: 'Overview' })).not.toBeInTheDocument()
  })

  it('opens a page from the list', () => {
    render(
      <MemoryRouter initialEntries={['/docs']}>
        <DocsPage />
      </MemoryRouter>,
    )

    fireEvent.click(screen.getByRole('button', { name: 'Glossary' }))

    expect(screen.getByRole('heading', { level: 2, name: 'Glossary' })).toBeInTheDocument()
  })

  it('limits pages to the chosen category', () => {
    render(
      <MemoryRouter initialEntries={['/docs?cat=Guides']}>
        <DocsPage />
      </MemoryRouter>,
    )

    expect(screen.getByRole('button', { name: 'Reading the figure' })).toBeInTheDocument()
    expect(screen.getByRole('button', { name: 'CSV format' })).toBeInTheDocument()
    expect(screen.queryByRole('button', { name: 'Glossary' })).not.toBeInTheDocument()

    fireEvent.click(screen.getByRole('button', { name: 'Reference' }))

    expect(screen.getByRole('button', { name: 'Glossary' })).toBeInTheDocument()
    expect(screen.queryByRole('button', { name: 'CSV format' })).not.toBeInTheDocument()
  })
})
