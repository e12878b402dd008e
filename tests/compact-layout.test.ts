import { expect, test } from "vitest"
import type { Position } from "../lib/badge-layout-types"
import { computeCompactLayout } from "../lib/solvers/CompactLayoutSolver/computeCompactLayout"
import { computeGridLayout } from "../lib/solvers/GridLayoutSolver/computeGridLayout"
import {
  expectContained,
  expectMinCenterDistance,
  getMinCenterDistance,
} from "./fixtures/expectValidPlacement"
import { makeA4SheetParams } from "./fixtures/makeA4SheetParams"

/** Number of items in each column, left to right. */
const getColumnSizes = (positions: readonly Position[]) => {
  const byX = new Map<number, number>()
  for (const { x } of positions) byX.set(x, (byX.get(x) ?? 0) + 1)
  return [...byX.entries()].sort(([a], [b]) => a - b).map(([, n]) => n)
}

test("68mm badges on A4 with 1mm spacing and 5mm margin form an 11 item 4-3-4 honeycomb", () => {
  const params = makeA4SheetParams({ diameterMm: 68, spacingMm: 1, marginMm: 5 })
  expect(params.diameterPx).toBe(803)
  expect(params.spacingPx).toBe(11)
  expect(params.marginPx).toBe(59)

  const layout = computeCompactLayout(params)

  expect(layout.capacity).toBe(11)
  expect(layout.strategy).toBe("hex")
  expect(layout.columns).toBe(4)
  expect(layout.skippedColumns).toEqual([3])
  expect(layout.verticalPitchPx).toBe(814)
  expect(layout.horizontalPitchPx).toBeCloseTo(706.4184, 3)
  expect(getColumnSizes(layout.positions)).toEqual([4, 3, 4])

  expect(layout.positions.slice(0, 4)).toEqual([
    { x: 460.5, y: 460.5 },
    { x: 460.5, y: 1274.5 },
    { x: 460.5, y: 2088.5 },
    { x: 460.5, y: 2902.5 },
  ])
  // Odd column starts half a row lower
  expect(layout.positions[4]?.x).toBeCloseTo(1166.9184, 3)
  expect(layout.positions[4]?.y).toBe(867.5)

  expectContained(layout.positions, params)
  expectMinCenterDistance(layout.positions, params.diameterPx + params.spacingPx)
})

test("32mm badges use several columns and beat the grid", () => {
  const params = makeA4SheetParams({ diameterMm: 32, spacingMm: 2, marginMm: 8 })
  const compact = computeCompactLayout(params)
  const grid = computeGridLayout(params)

  expect(compact.strategy).toBe("hex")
  expect(compact.columns).toBe(7)
  expect(compact.skippedColumns).toEqual([6])
  expect(getColumnSizes(compact.positions)).toEqual([8, 7, 8, 7, 8, 7])
  expect(compact.capacity).toBe(45)
  expect(grid.capacity).toBe(40)
  expect(compact.capacity).toBeGreaterThan(grid.capacity)
  expectContained(compact.positions, params)
})

test("uniform strategy wins ties and centers its columns", () => {
  const params = {
    diameterPx: 100,
    spacingPx: 100,
    marginPx: 0,
    sheetWidthPx: 250,
    sheetHeightPx: 500,
  }
  const layout = computeCompactLayout(params)

  expect(layout.strategy).toBe("uniform")
  expect(layout.columns).toBe(2)
  expect(layout.horizontalPitchPx).toBe(150)
  expect(layout.verticalPitchPx).toBe(200)
  expect(layout.positions).toEqual([
    { x: 50, y: 50 },
    { x: 50, y: 250 },
    { x: 50, y: 450 },
    { x: 200, y: 150 },
    { x: 200, y: 350 },
  ])
  // Gaps shrink to half the requested spacing: items never touch, but the
  // full spacing is not kept across columns.
  expect(getMinCenterDistance(layout.positions)).toBeCloseTo(180.2776, 3)
  expectMinCenterDistance(layout.positions, params.diameterPx)
})

test("preferHexOnTie switches the tie to the left-packed hex columns", () => {
  const layout = computeCompactLayout(
    {
      diameterPx: 100,
      spacingPx: 100,
      marginPx: 0,
      sheetWidthPx: 250,
      sheetHeightPx: 500,
    },
    { preferHexOnTie: true },
  )

  expect(layout.strategy).toBe("hex")
  expect(layout.skippedColumns).toEqual([1])
  expect(layout.capacity).toBe(3)
})

test("a stricter spacing ratio stops the uniform search earlier", () => {
  const layout = computeCompactLayout(
    {
      diameterPx: 100,
      spacingPx: 100,
      marginPx: 0,
      sheetWidthPx: 250,
      sheetHeightPx: 500,
    },
    { uniformMinSpacingRatio: 1 },
  )

  expect(layout.strategy).toBe("hex")
  expect(layout.capacity).toBe(3)
})

test("zero spacing and zero margin pack touching circles without overlap", () => {
  const params = {
    diameterPx: 100,
    spacingPx: 0,
    marginPx: 0,
    sheetWidthPx: 280,
    sheetHeightPx: 500,
  }
  const layout = computeCompactLayout(params)

  expect(layout.strategy).toBe("hex")
  expect(layout.capacity).toBe(14)
  expect(getColumnSizes(layout.positions)).toEqual([5, 4, 5])
  expect(getMinCenterDistance(layout.positions)).toBeCloseTo(100, 6)
  expectContained(layout.positions, params)
})

test("compact layout treats a negative margin and NaN spacing as zero", () => {
  const zeroed = {
    diameterPx: 100,
    spacingPx: 0,
    marginPx: 0,
    sheetWidthPx: 280,
    sheetHeightPx: 500,
  }
  const layout = computeCompactLayout({
    ...zeroed,
    spacingPx: Number.NaN,
    marginPx: -40,
  })

  expect(layout.marginPx).toBe(0)
  expect(layout.spacingPx).toBe(0)
  expect(layout.capacity).toBe(14)
  expect(layout).toEqual(computeCompactLayout(zeroed))
})

test("compact mode falls back to the grid when the honeycomb holds fewer items", () => {
  const params = {
    diameterPx: 271,
    spacingPx: 59,
    marginPx: 236,
    sheetWidthPx: 2480,
    sheetHeightPx: 3507,
  }
  const layout = computeCompactLayout(params)

  expect(layout.strategy).toBe("grid")
  expect(layout.capacity).toBe(54)
  expect(layout.columns).toBe(6)
  expect(layout.positions).toEqual(computeGridLayout(params).positions)

  const honeycombOnly = computeCompactLayout(params, { gridFallback: false })
  expect(honeycombOnly.strategy).toBe("hex")
  expect(honeycombOnly.capacity).toBe(51)
})

test("compact layout returns zero capacity when nothing fits", () => {
  const layout = computeCompactLayout({
    diameterPx: 500,
    spacingPx: 10,
    marginPx: 100,
    sheetWidthPx: 600,
    sheetHeightPx: 900,
  })
  expect(layout.capacity).toBe(0)
  expect(layout.positions).toEqual([])
  expect(layout.columns).toBe(0)
})

test("identical inputs give identical positions", () => {
  const params = makeA4SheetParams({ diameterMm: 58, spacingMm: 3, marginMm: 6 })
  expect(computeCompactLayout(params)).toEqual(computeCompactLayout(params))
})

test("compact layouts stay inside the margin, never overlap and never lose to the grid", () => {
  for (const diameterMm of [20, 32, 42, 58, 68, 75, 85, 100]) {
    for (const spacingMm of [0, 1, 2, 3, 5]) {
      for (const marginMm of [5, 6, 10, 20]) {
        const params = makeA4SheetParams({ diameterMm, spacingMm, marginMm })
        const compact = computeCompactLayout(params)
        const grid = computeGridLayout(params)

        expect(compact.capacity).toBeGreaterThanOrEqual(grid.capacity)
        expectContained(compact.positions, params)
        expectMinCenterDistance(
          compact.positions,
          compact.strategy === "uniform"
            ? params.diameterPx
            : params.diameterPx + params.spacingPx,
        )
      }
    }
  }
})
