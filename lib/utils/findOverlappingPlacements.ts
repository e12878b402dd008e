// lib/utils/findOverlappingPlacements.ts
import type { Position } from "../badge-layout-types"
import { FlatbushIndex } from "../data-structures/FlatbushIndex"
import { distance, lt } from "./layout-geometry"

export type PlacementConflict = {
  /** Index of the first position, always lower than `b`. */
  a: number
  b: number
  distancePx: number
}

/**
 * Pairs of positions whose centers are closer than `minCenterDistancePx`.
 * Candidates come from a box search around each center, so only nearby
 * pairs are measured.
 */
export function findOverlappingPlacements(
  positions: readonly Position[],
  minCenterDistancePx: number,
): PlacementConflict[] {
  if (positions.length < 2) return []

  const index = new FlatbushIndex<number>(positions.length)
  positions.forEach((p, i) => index.insertPoint(i, p))
  index.finish()

  const conflicts: PlacementConflict[] = []
  positions.forEach((p, a) => {
    const candidates = index.searchAround(p, minCenterDistancePx)
    for (const b of candidates.sort((x, y) => x - y)) {
      if (b <= a) continue
      const other = positions[b]
      if (!other) continue
      const distancePx = distance(p, other)
      if (lt(distancePx, minCenterDistancePx)) {
        conflicts.push({ a, b, distancePx })
      }
    }
  })
  return conflicts
}
