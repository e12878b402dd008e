// lib/utils/validateSheetLayout.ts
import type { SheetLayoutParams, SingleSheetLayout } from "../badge-layout-types"
import { LayoutValidationError } from "../errors"
import { findOutOfBoundsPlacements } from "./findOutOfBoundsPlacements"
import { findOverlappingPlacements } from "./findOverlappingPlacements"

/**
 * Center distance a layout promises. Grid pitches always keep the requested
 * spacing; compact layouts only guarantee that items do not touch.
 */
export const getGuaranteedCenterDistance = (
  layout: SingleSheetLayout,
  params: SheetLayoutParams,
) =>
  layout.mode === "grid"
    ? params.diameterPx + params.spacingPx
    : params.diameterPx

/**
 * Strict check of a finished sheet layout. This should never fail for a
 * layout produced by the calculators; a failure is a bug in the packing.
 */
export function validateSheetLayout(
  layout: SingleSheetLayout,
  params: SheetLayoutParams,
  opts: { minCenterDistancePx?: number } = {},
): void {
  if (layout.capacity !== layout.positions.length) {
    throw new LayoutValidationError(
      `capacity ${layout.capacity} does not match ${layout.positions.length} positions`,
    )
  }

  const outOfBounds = findOutOfBoundsPlacements(layout.positions, params)
  const firstOut = outOfBounds[0]
  if (firstOut !== undefined) {
    const p = layout.positions[firstOut]
    throw new LayoutValidationError(
      `position ${firstOut} at (${p?.x.toFixed(3)}, ${p?.y.toFixed(3)}) crosses the ${params.marginPx}px margin`,
    )
  }

  const minCenterDistancePx =
    opts.minCenterDistancePx ?? getGuaranteedCenterDistance(layout, params)
  const [conflict] = findOverlappingPlacements(
    layout.positions,
    minCenterDistancePx,
  )
  if (conflict) {
    throw new LayoutValidationError(
      `positions ${conflict.a} and ${conflict.b} are ${conflict.distancePx.toFixed(3)}px apart, need ${minCenterDistancePx.toFixed(3)}px`,
    )
  }
}
