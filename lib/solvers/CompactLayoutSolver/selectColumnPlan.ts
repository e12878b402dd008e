// lib/solvers/CompactLayoutSolver/selectColumnPlan.ts
import type { CompactStrategy } from "../../badge-layout-types"
import { HEX_ROW_FACTOR } from "../../utils/layout-geometry"
import type { UniformColumnFit } from "./searchUniformColumns"

export type ColumnPlan = {
  strategy: CompactStrategy
  columns: number
  horizontalPitchPx: number
  verticalPitchPx: number
  /** Center x of column 0. */
  startX: number
}

/** Column pitch of a hexagonal close-pack keeping `spacingPx` between rows. */
export const computeHexPitch = (diameterPx: number, spacingPx: number) =>
  diameterPx * HEX_ROW_FACTOR + spacingPx

export const computeMaxHexColumns = (availableWidthPx: number, hexPitchPx: number) =>
  Math.max(1, Math.floor((availableWidthPx + hexPitchPx) / hexPitchPx))

/**
 * Row pitch inside a column. The hexagonal value alone under-separates rows
 * when the column pitch came from the uniform search, so it is clamped to
 * the minimum center distance.
 */
export const computeVerticalPitch = (
  horizontalPitchPx: number,
  diameterPx: number,
  spacingPx: number,
) => Math.max(horizontalPitchPx * HEX_ROW_FACTOR, diameterPx + spacingPx)

export function selectColumnPlan(params: {
  uniformFit: UniformColumnFit
  availableWidthPx: number
  diameterPx: number
  spacingPx: number
  marginPx: number
  preferHexOnTie: boolean
}): ColumnPlan {
  const { uniformFit, availableWidthPx, diameterPx, spacingPx, marginPx } =
    params
  const radiusPx = diameterPx / 2

  const hexPitchPx = computeHexPitch(diameterPx, spacingPx)
  const maxColsHex = computeMaxHexColumns(availableWidthPx, hexPitchPx)

  const useHex =
    maxColsHex > uniformFit.columns ||
    (params.preferHexOnTie && maxColsHex === uniformFit.columns)

  if (useHex) {
    // Packed against the left margin, not centered
    return {
      strategy: "hex",
      columns: maxColsHex,
      horizontalPitchPx: hexPitchPx,
      verticalPitchPx: computeVerticalPitch(hexPitchPx, diameterPx, spacingPx),
      startX: marginPx + radiusPx,
    }
  }

  const blockWidthPx =
    diameterPx + (uniformFit.columns - 1) * uniformFit.pitchPx
  return {
    strategy: "uniform",
    columns: uniformFit.columns,
    horizontalPitchPx: uniformFit.pitchPx,
    verticalPitchPx: computeVerticalPitch(
      uniformFit.pitchPx,
      diameterPx,
      spacingPx,
    ),
    startX: marginPx + (availableWidthPx - blockWidthPx) / 2 + radiusPx,
  }
}
