// lib/visualization/visualizeSheetLayout.ts
import type { GraphicsObject } from "graphics-debug"
import type {
  PageAssignment,
  Position,
  SheetLayoutParams,
  SingleSheetLayout,
} from "../badge-layout-types"
import { getPageSlots } from "../utils/getPageSlots"
import { SHEET_COLORS } from "./visualizationColors"

type SheetFrame = Pick<
  SheetLayoutParams,
  "sheetWidthPx" | "sheetHeightPx" | "marginPx"
>

/**
 * Sheet outline and printable area. Usable before any layout exists to show
 * the problem space.
 */
export function createSheetVisualization(
  frame: SheetFrame,
  title: string = "Badge sheet",
): GraphicsObject {
  const { sheetWidthPx, sheetHeightPx, marginPx } = frame
  const rects: NonNullable<GraphicsObject["rects"]> = [
    {
      center: { x: sheetWidthPx / 2, y: sheetHeightPx / 2 },
      width: sheetWidthPx,
      height: sheetHeightPx,
      fill: SHEET_COLORS.sheet.fill,
      stroke: SHEET_COLORS.sheet.stroke,
      label: "sheet",
    },
  ]

  const printableWidth = sheetWidthPx - 2 * marginPx
  const printableHeight = sheetHeightPx - 2 * marginPx
  if (marginPx > 0 && printableWidth > 0 && printableHeight > 0) {
    rects.push({
      center: { x: sheetWidthPx / 2, y: sheetHeightPx / 2 },
      width: printableWidth,
      height: printableHeight,
      fill: SHEET_COLORS.margin.fill,
      stroke: SHEET_COLORS.margin.stroke,
      label: "printable area",
    })
  }

  return {
    title,
    coordinateSystem: "screen",
    rects,
    circles: [],
    points: [],
    lines: [],
  }
}

export function drawItemCircles(
  positions: readonly Position[],
  radiusPx: number,
  style: { fill: string; stroke: string },
  label: (index: number) => string,
): NonNullable<GraphicsObject["circles"]> {
  return positions.map((center, index) => ({
    center,
    radius: radiusPx,
    fill: style.fill,
    stroke: style.stroke,
    label: label(index),
  }))
}

export function visualizeSheetLayout(
  layout: SingleSheetLayout,
  params: SheetLayoutParams,
  title: string = `${layout.mode} layout (${layout.capacity} per sheet)`,
): GraphicsObject {
  const graphics = createSheetVisualization(params, title)
  return {
    ...graphics,
    circles: drawItemCircles(
      layout.positions,
      params.diameterPx / 2,
      SHEET_COLORS.item,
      (index) => `slot ${index + 1}`,
    ),
  }
}

/** Items placed on the page are filled; remaining slots are outlined. */
export function visualizePage(
  page: PageAssignment,
  sheetLayout: SingleSheetLayout,
  params: SheetLayoutParams,
): GraphicsObject {
  const graphics = createSheetVisualization(
    params,
    `Page ${page.pageIndex + 1} (${page.itemsOnPage}/${sheetLayout.capacity})`,
  )
  const radiusPx = params.diameterPx / 2

  const circles: NonNullable<GraphicsObject["circles"]> = getPageSlots(
    page,
    sheetLayout,
  ).map((slot) => {
    const colors =
      slot.itemIndex === null ? SHEET_COLORS.placeholder : SHEET_COLORS.item
    return {
      center: slot.position,
      radius: radiusPx,
      fill: colors.fill,
      stroke: colors.stroke,
      label:
        slot.itemIndex === null
          ? `empty slot ${slot.slotIndex + 1}`
          : `item ${slot.itemIndex + 1}`,
    }
  })

  return { ...graphics, circles }
}
