// lib/solvers/GridLayoutSolver/computeGridLayout.ts
import type {
  GridSheetLayout,
  Position,
  SheetLayoutParams,
} from "../../badge-layout-types"
import {
  getAvailableArea,
  sanitizeSheetLayoutParams,
} from "../../utils/layout-geometry"

export const emptyGridLayout = (params: SheetLayoutParams): GridSheetLayout => ({
  mode: "grid",
  positions: [],
  columns: 0,
  rows: 0,
  horizontalPitchPx: 0,
  verticalPitchPx: 0,
  marginPx: params.marginPx,
  spacingPx: params.spacingPx,
  capacity: 0,
})

/**
 * Offset of a centered block inside the available span. A single cell whose
 * pitch is wider than the span is centered on its diameter instead, so the
 * item never crosses the margin.
 */
function centeredStart(
  marginPx: number,
  availablePx: number,
  cellCount: number,
  pitchPx: number,
  diameterPx: number,
): number {
  const blockPx = cellCount * pitchPx
  if (blockPx > availablePx) return marginPx + (availablePx - diameterPx) / 2
  return marginPx + (availablePx - blockPx) / 2
}

/** Number of cells of one pitch along a span, at least one. */
export const countGridCells = (availablePx: number, pitchPx: number) =>
  Math.max(1, Math.floor(availablePx / pitchPx))

/**
 * Row/column grid with a fixed center-to-center pitch of diameter + spacing,
 * centered inside the printable area. Positions are emitted row-major.
 */
export function computeGridLayout(rawParams: SheetLayoutParams): GridSheetLayout {
  const params = sanitizeSheetLayoutParams(rawParams)
  const available = getAvailableArea(params)
  if (!available) return emptyGridLayout(params)

  const { diameterPx, spacingPx, marginPx } = params
  const radiusPx = diameterPx / 2
  const pitch = diameterPx + spacingPx

  const columns = countGridCells(available.width, pitch)
  const rows = countGridCells(available.height, pitch)

  const startX = centeredStart(marginPx, available.width, columns, pitch, diameterPx)
  const startY = centeredStart(marginPx, available.height, rows, pitch, diameterPx)

  const positions: Position[] = []
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < columns; col++) {
      positions.push({
        x: startX + col * pitch + radiusPx,
        y: startY + row * pitch + radiusPx,
      })
    }
  }

  return {
    mode: "grid",
    positions,
    columns,
    rows,
    horizontalPitchPx: pitch,
    verticalPitchPx: pitch,
    marginPx,
    spacingPx,
    capacity: positions.length,
  }
}
