export const API_BASE = (import.meta.env.VITE_API_BASE ?? '').trim().replace(/\/+$/, '') || 'http://localhost:8000'

export const STATIC_FIGURE_SIZE = { width: 900, height: 720 } as const
