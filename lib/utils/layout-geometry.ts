// lib/utils/layout-geometry.ts
import type { Position, SheetLayoutParams } from "../badge-layout-types"

export const EPS = 1e-9

/** sin(60°): row spacing of a hexagonal close-pack relative to its pitch. */
export const HEX_ROW_FACTOR = Math.sqrt(3) / 2

export const clamp = (v: number, lo: number, hi: number) =>
  Math.max(lo, Math.min(hi, v))

export const gt = (a: number, b: number) => a > b + EPS
export const lt = (a: number, b: number) => a < b - EPS
export const lte = (a: number, b: number) => a < b + EPS

/** Negative and non-finite lengths are treated as zero. */
export const sanitizeLength = (value: number) =>
  Number.isFinite(value) && value > 0 ? value : 0

export const distance = (a: Position, b: Position) =>
  Math.hypot(a.x - b.x, a.y - b.y)

export const sanitizeSheetLayoutParams = (
  params: SheetLayoutParams,
): SheetLayoutParams => ({
  diameterPx: sanitizeLength(params.diameterPx),
  spacingPx: sanitizeLength(params.spacingPx),
  marginPx: sanitizeLength(params.marginPx),
  sheetWidthPx: sanitizeLength(params.sheetWidthPx),
  sheetHeightPx: sanitizeLength(params.sheetHeightPx),
})

/**
 * Width and height left once the margin is removed from both sides.
 * Null when a single item cannot fit on either axis.
 */
export function getAvailableArea(
  params: SheetLayoutParams,
): { width: number; height: number } | null {
  const width = params.sheetWidthPx - 2 * params.marginPx
  const height = params.sheetHeightPx - 2 * params.marginPx
  if (width <= 0 || height <= 0) return null
  if (params.diameterPx <= 0) return null
  if (lt(width, params.diameterPx) || lt(height, params.diameterPx)) return null
  return { width, height }
}
