const SIGNALS_LOADED_EVENT = 'eda:signals-loaded'

export type SignalsLoadedDetail = {
  name: string
  samples: number
  scrCount: number
}

export function notifySignalsLoaded(detail: SignalsLoadedDetail) {
  try {
    window.dispatchEvent(new CustomEvent<SignalsLoadedDetail>(SIGNALS_LOADED_EVENT, { detail }))
  } catch {
    // ignore
  }
}

export function onSignalsLoaded(handler: (detail: SignalsLoadedDetail) => void): () => void {
  const h = (e: Event) => {
    const ev = e as CustomEvent<SignalsLoadedDetail>
    if (ev.detail) handler(ev.detail)
  }
  try {
    window.addEventListener(SIGNALS_LOADED_EVENT, h)
  } catch {
    // ignore
  }

  return () => {
    try {
      window.removeEventListener(SIGNALS_LOADED_EVENT, h)
    } catch {
      // ignore
    }
  }
}
