import { ShapeError } from './edaErrors'
import type { EdaEvents, EdaSignalTable } from './edaSignals'
import { findClosest, findLastAtOrBelow, isAscending, type ClosestMatch } from './findClosest'

export type Segment = {
  x0: number
  y0: number
  x1: number
  y1: number
}

export type EdaSegments = {
  riseTime: readonly Segment[]
  amplitude: readonly Segment[]
  halfRecovery: readonly Segment[]
  /** Position in `peaks` of the peak each half-recovery point was matched to. */
  halfRecoveryPeaks: readonly number[]
}

function assertIndices(name: string, indices: readonly number[], length: number) {
  for (const i of indices) {
    if (!Number.isInteger(i) || i < 0 || i >= length) {
      throw new ShapeError(`${name} index ${i} is outside the sample range [0, ${length})`)
    }
  }
}

export function buildEdaSegments(
  table: Pick<EdaSignalTable, 'EDA_Phasic'>,
  xAxis: readonly number[],
  events: EdaEvents,
): EdaSegments {
  const phasic = table.EDA_Phasic
  const { onsets, peaks, halfRecovery } = events

  if (xAxis.length !== phasic.length) {
    throw new ShapeError(`x-axis has ${xAxis.length} samples but EDA_Phasic has ${phasic.length}`)
  }
  if (onsets.length !== peaks.length) {
    throw new ShapeError(`Each SCR needs one onset and one peak (onsets=${onsets.length}, peaks=${peaks.length})`)
  }
  assertIndices('Onset', onsets, xAxis.length)
  assertIndices('Peak', peaks, xAxis.length)
  assertIndices('Half-recovery', halfRecovery, xAxis.length)

  const riseTime: Segment[] = []
  const amplitude: Segment[] = []
  for (let i = 0; i < onsets.length; i++) {
    const onset = onsets[i]
    const peak = peaks[i]
    riseTime.push({ x0: xAxis[onset], y0: phasic[onset], x1: xAxis[peak], y1: phasic[onset] })
    amplitude.push({ x0: xAxis[peak], y0: phasic[onset], x1: xAxis[peak], y1: phasic[peak] })
  }

  const peakX = peaks.map((p) => xAxis[p])
  const match: (x: number) => ClosestMatch = isAscending(peakX)
    ? (x) => findLastAtOrBelow(peakX, x)
    : (x) => findClosest(x, peakX, { direction: 'smaller', strictly: false })

  const halfRecoverySegments: Segment[] = []
  const halfRecoveryPeaks: number[] = []
  for (const recovery of halfRecovery) {
    const x = xAxis[recovery]
    const y = phasic[recovery]
    const peak = match(x)
    halfRecoverySegments.push({ x0: peak.value, y0: y, x1: x, y1: y })
    halfRecoveryPeaks.push(peak.index)
  }

  return { riseTime, amplitude, halfRecovery: halfRecoverySegments, halfRecoveryPeaks }
}
