// lib/solvers/CompactLayoutSolver/searchUniformColumns.ts
import { EPS, lte } from "../../utils/layout-geometry"

export type UniformColumnFit = {
  columns: number
  /** Realized center-to-center distance between neighbouring columns. */
  pitchPx: number
  requiredWidthPx: number
}

/**
 * Tries to spread `testColumns` items across the available width with the
 * widest equal gap between them. Returns null once the column count no longer
 * fits, which ends the search: adding columns only shrinks the gaps further.
 */
export function evaluateUniformColumns(params: {
  testColumns: number
  availableWidthPx: number
  diameterPx: number
  spacingPx: number
  minSpacingRatio: number
}): UniformColumnFit | null {
  const { testColumns, availableWidthPx, diameterPx, spacingPx } = params

  if (testColumns === 1) {
    if (!lte(diameterPx, availableWidthPx)) return null
    return { columns: 1, pitchPx: diameterPx, requiredWidthPx: diameterPx }
  }

  const spaceForGaps = availableWidthPx - testColumns * diameterPx
  if (spaceForGaps < 0) return null

  const perGapSpacing = spaceForGaps / (testColumns - 1)
  if (perGapSpacing < params.minSpacingRatio * spacingPx) return null

  const requiredWidthPx =
    testColumns * diameterPx + (testColumns - 1) * perGapSpacing
  if (!lte(requiredWidthPx, availableWidthPx)) return null

  return {
    columns: testColumns,
    pitchPx: diameterPx + perGapSpacing,
    requiredWidthPx,
  }
}

/** Upper bound of the uniform search: columns that fit edge to edge. */
export const getMaxTestColumns = (availableWidthPx: number, diameterPx: number) =>
  Math.max(1, Math.floor((availableWidthPx + EPS) / diameterPx))

