import { expect } from "vitest"
import type {
  Position,
  SheetLayoutParams,
} from "../../lib/badge-layout-types"

const TOLERANCE = 1e-6

/** Brute-force smallest center distance over all pairs. */
export function getMinCenterDistance(positions: readonly Position[]): number {
  let best = Infinity
  for (let i = 0; i < positions.length; i++) {
    for (let j = i + 1; j < positions.length; j++) {
      const a = positions[i]
      const b = positions[j]
      if (!a || !b) continue
      best = Math.min(best, Math.hypot(a.x - b.x, a.y - b.y))
    }
  }
  return best
}

export function expectContained(
  positions: readonly Position[],
  params: SheetLayoutParams,
) {
  const r = params.diameterPx / 2
  for (const { x, y } of positions) {
    expect(x - r).toBeGreaterThanOrEqual(params.marginPx - TOLERANCE)
    expect(y - r).toBeGreaterThanOrEqual(params.marginPx - TOLERANCE)
    expect(x + r).toBeLessThanOrEqual(
      params.sheetWidthPx - params.marginPx + TOLERANCE,
    )
    expect(y + r).toBeLessThanOrEqual(
      params.sheetHeightPx - params.marginPx + TOLERANCE,
    )
  }
}

export function expectMinCenterDistance(
  positions: readonly Position[],
  minDistancePx: number,
) {
  if (positions.length < 2) return
  expect(getMinCenterDistance(positions)).toBeGreaterThanOrEqual(
    minDistancePx - TOLERANCE,
  )
}
