// lib/utils/findOutOfBoundsPlacements.ts
import type { Position, SheetLayoutParams } from "../badge-layout-types"
import { gt, lt } from "./layout-geometry"

/** Indexes of positions whose circle reaches into the margin or off the sheet. */
export function findOutOfBoundsPlacements(
  positions: readonly Position[],
  params: SheetLayoutParams,
): number[] {
  const radiusPx = params.diameterPx / 2
  const minEdge = params.marginPx
  const maxX = params.sheetWidthPx - params.marginPx
  const maxY = params.sheetHeightPx - params.marginPx

  const outOfBounds: number[] = []
  positions.forEach((p, i) => {
    if (
      lt(p.x - radiusPx, minEdge) ||
      lt(p.y - radiusPx, minEdge) ||
      gt(p.x + radiusPx, maxX) ||
      gt(p.y + radiusPx, maxY)
    ) {
      outOfBounds.push(i)
    }
  })
  return outOfBounds
}
