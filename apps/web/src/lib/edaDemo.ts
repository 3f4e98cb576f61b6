import type { EdaSignalTable } from './edaSignals'

export type SimulateEdaOptions = {
  durationSec?: number
  samplingRate?: number
  scrOnsetsSec?: readonly number[]
  amplitude?: number
}

const TAU_DECAY = 4
const TAU_RISE = 0.75

// Bateman-shaped response normalised to a unit peak.
const PEAK_DELAY = (Math.log(TAU_DECAY / TAU_RISE) * TAU_DECAY * TAU_RISE) / (TAU_DECAY - TAU_RISE)
const PEAK_RAW = Math.exp(-PEAK_DELAY / TAU_DECAY) - Math.exp(-PEAK_DELAY / TAU_RISE)

export function scrShape(tSinceOnset: number): number {
  if (tSinceOnset < 0) return 0
  return (Math.exp(-tSinceOnset / TAU_DECAY) - Math.exp(-tSinceOnset / TAU_RISE)) / PEAK_RAW
}

/** Deterministic synthetic EDA table with marked onsets, peaks and half-recovery points. */
export function simulateEdaSignals(options: SimulateEdaOptions = {}): EdaSignalTable {
  const sr = options.samplingRate ?? 50
  const n = Math.round((options.durationSec ?? 30) * sr)
  const onsetsSec = options.scrOnsetsSec ?? [3, 10, 17, 24]
  const amplitude = options.amplitude ?? 0.6

  const tonic: number[] = []
  const phasic: number[] = []
  const clean: number[] = []
  const raw: number[] = []
  for (let i = 0; i < n; i++) {
    const t = i / sr
    const scl = 2 + 0.02 * t
    const scr = onsetsSec.reduce((acc, t0) => acc + amplitude * scrShape(t - t0), 0)
    tonic.push(scl)
    phasic.push(scr)
    clean.push(scl + scr)
    raw.push(scl + scr + 0.01 * Math.sin(2 * Math.PI * 1.3 * t))
  }

  const onsets = new Array<number>(n).fill(0)
  const peaks = new Array<number>(n).fill(0)
  const recovery = new Array<number>(n).fill(0)
  for (const t0 of onsetsSec) {
    const onset = Math.round(t0 * sr)
    const peak = Math.round((t0 + PEAK_DELAY) * sr)
    if (onset < 0 || peak >= n) continue
    onsets[onset] = 1
    peaks[peak] = 1

    let half = peak + 1
    while (half < n && scrShape(half / sr - t0) > 0.5) half++
    if (half < n) recovery[half] = 1
  }

  return {
    EDA_Raw: raw,
    EDA_Clean: clean,
    EDA_Phasic: phasic,
    EDA_Tonic: tonic,
    SCR_Onsets: onsets,
    SCR_Peaks: peaks,
    SCR_Recovery: recovery,
  }
}
