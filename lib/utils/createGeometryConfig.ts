// lib/utils/createGeometryConfig.ts
import { LAYOUT_CONFIG } from "../../layout.config"
import type { GeometryConfig } from "../badge-layout-types"
import { SHEET_SIZES, type SheetName, type SheetSizeMm } from "../sheet-presets"
import { mmToPixels } from "./units"

export type GeometryConfigInput = (
  | { itemDiameterPx: number }
  | { itemDiameterMm: number }
) & {
  /** Defaults to A4. */
  sheet?: SheetName | SheetSizeMm | { widthPx: number; heightPx: number }
  dpi?: number
}

function resolveSheetPx(
  sheet: NonNullable<GeometryConfigInput["sheet"]>,
  dpi: number,
): { widthPx: number; heightPx: number } {
  if (typeof sheet === "string") {
    const size = SHEET_SIZES[sheet]
    return {
      widthPx: mmToPixels(size.widthMm, dpi),
      heightPx: mmToPixels(size.heightMm, dpi),
    }
  }
  if ("widthPx" in sheet) return sheet
  return {
    widthPx: mmToPixels(sheet.widthMm, dpi),
    heightPx: mmToPixels(sheet.heightMm, dpi),
  }
}

/** Builds the immutable geometry handed to every layout query. */
export function createGeometryConfig(input: GeometryConfigInput): GeometryConfig {
  const dpi = input.dpi ?? LAYOUT_CONFIG.PRINT_DPI
  const itemDiameterPx =
    "itemDiameterPx" in input
      ? input.itemDiameterPx
      : mmToPixels(input.itemDiameterMm, dpi)
  const { widthPx, heightPx } = resolveSheetPx(input.sheet ?? "A4", dpi)

  if (!(itemDiameterPx > 0)) {
    throw new RangeError(
      `BadgeLayout: item diameter must be positive, got ${itemDiameterPx}px`,
    )
  }
  if (!(widthPx > 0) || !(heightPx > 0)) {
    throw new RangeError(
      `BadgeLayout: sheet size must be positive, got ${widthPx}x${heightPx}px`,
    )
  }

  return Object.freeze({
    itemDiameterPx,
    itemRadiusPx: itemDiameterPx / 2,
    sheetWidthPx: widthPx,
    sheetHeightPx: heightPx,
  })
}
