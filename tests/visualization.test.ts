import { getSvgFromGraphicsObject } from "graphics-debug"
import { expect, test } from "vitest"
import type { SheetLayoutParams } from "../lib/badge-layout-types"
import { BadgeLayoutPipeline } from "../lib/BadgeLayoutPipeline"
import { CompactLayoutSolver } from "../lib/solvers/CompactLayoutSolver/CompactLayoutSolver"
import { computeGridLayout } from "../lib/solvers/GridLayoutSolver/computeGridLayout"
import { partitionIntoPages } from "../lib/solvers/PagePartitionSolver/partitionIntoPages"
import {
  createSheetVisualization,
  visualizePage,
  visualizeSheetLayout,
} from "../lib/visualization/visualizeSheetLayout"
import { makeA4SheetParams } from "./fixtures/makeA4SheetParams"

const params: SheetLayoutParams = {
  diameterPx: 100,
  spacingPx: 10,
  marginPx: 10,
  sheetWidthPx: 300,
  sheetHeightPx: 300,
}

test("sheet visualization outlines the printable area only when there is a margin", () => {
  const withMargin = createSheetVisualization(params)
  expect(withMargin.title).toBe("Badge sheet")
  expect(withMargin.rects?.map((r) => r.label)).toEqual([
    "sheet",
    "printable area",
  ])
  expect(withMargin.rects?.[1]?.width).toBe(280)

  const noMargin = createSheetVisualization({ ...params, marginPx: 0 })
  expect(noMargin.rects).toHaveLength(1)
})

test("a sheet layout is drawn as one labelled circle per slot", () => {
  const layout = computeGridLayout(params)
  const graphics = visualizeSheetLayout(layout, params)

  expect(graphics.title).toBe("grid layout (4 per sheet)")
  expect(graphics.circles?.map((c) => c.label)).toEqual([
    "slot 1",
    "slot 2",
    "slot 3",
    "slot 4",
  ])
  expect(graphics.circles?.[0]).toMatchObject({
    center: { x: 90, y: 90 },
    radius: 50,
  })
  expect(getSvgFromGraphicsObject(graphics)).toContain("<svg")
})

test("a partial page shows its items and outlines the empty slots", () => {
  const layout = computeGridLayout(params)
  const { pages } = partitionIntoPages(6, layout)
  const secondPage = pages[1]
  if (!secondPage) throw new Error("expected a second page")

  const graphics = visualizePage(secondPage, layout, params)
  expect(graphics.title).toBe("Page 2 (2/4)")
  expect(graphics.circles?.map((c) => c.label)).toEqual([
    "item 5",
    "item 6",
    "empty slot 3",
    "empty slot 4",
  ])
  expect(graphics.circles?.[2]?.fill).toBe("none")
})

test("the compact solver draws its columns and marks skipped ones", () => {
  const sheet = makeA4SheetParams({ diameterMm: 68, spacingMm: 1, marginMm: 5 })
  const solver = new CompactLayoutSolver(sheet)

  const before = solver.visualize()
  expect(before.title).toBe("Compact layout: column search")
  expect(before.circles).toEqual([])

  solver.solve()
  const after = solver.visualize()
  expect(after.title).toBe("Compact layout: hex, 4 column(s)")
  expect(after.circles).toHaveLength(11)
  expect(after.circles?.[4]?.label).toBe("col 2 row 1")
  expect(after.lines?.map((l) => l.label)).toEqual(["skipped column 4"])
})

test("the pipeline final view is titled by mode", () => {
  const pipeline = new BadgeLayoutPipeline({
    totalItems: 3,
    mode: "grid",
    sheetParams: params,
  })
  expect(pipeline.initialVisualize().title).toBe(
    "BadgeLayoutPipeline - Initial (grid)",
  )

  pipeline.solve()
  const final = pipeline.finalVisualize()
  expect(final.title).toBe("BadgeLayoutPipeline - Final (grid)")
  expect(final.circles).toHaveLength(4)
})
