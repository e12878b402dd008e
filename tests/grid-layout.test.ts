import { expect, test } from "vitest"
import { computeGridLayout } from "../lib/solvers/GridLayoutSolver/computeGridLayout"
import { GridLayoutSolver } from "../lib/solvers/GridLayoutSolver/GridLayoutSolver"
import {
  expectContained,
  expectMinCenterDistance,
} from "./fixtures/expectValidPlacement"
import { makeA4SheetParams } from "./fixtures/makeA4SheetParams"

test("grid layout centers a row-major block inside the margin", () => {
  const params = {
    diameterPx: 100,
    spacingPx: 10,
    marginPx: 20,
    sheetWidthPx: 500,
    sheetHeightPx: 400,
  }
  const layout = computeGridLayout(params)

  expect(layout.mode).toBe("grid")
  expect(layout.columns).toBe(4)
  expect(layout.rows).toBe(3)
  expect(layout.capacity).toBe(12)
  expect(layout.horizontalPitchPx).toBe(110)
  expect(layout.verticalPitchPx).toBe(110)
  expect(layout.positions[0]).toEqual({ x: 80, y: 85 })
  expect(layout.positions[1]).toEqual({ x: 190, y: 85 })
  expect(layout.positions[4]).toEqual({ x: 80, y: 195 })
  expect(layout.positions[11]).toEqual({ x: 410, y: 305 })
})

test("grid layout on A4 keeps the requested spacing between every pair", () => {
  const params = makeA4SheetParams({ diameterMm: 68, spacingMm: 1, marginMm: 5 })
  const layout = computeGridLayout(params)

  expect(layout.columns).toBe(2)
  expect(layout.rows).toBe(4)
  expect(layout.capacity).toBe(8)
  expectContained(layout.positions, params)
  expectMinCenterDistance(layout.positions, params.diameterPx + params.spacingPx)
})

test("grid layout returns zero capacity when the margins consume the sheet", () => {
  const layout = computeGridLayout({
    diameterPx: 10,
    spacingPx: 0,
    marginPx: 50,
    sheetWidthPx: 100,
    sheetHeightPx: 100,
  })
  expect(layout.capacity).toBe(0)
  expect(layout.positions).toEqual([])
})

test("grid layout returns zero capacity when one item is wider than the printable area", () => {
  const layout = computeGridLayout({
    diameterPx: 100,
    spacingPx: 0,
    marginPx: 30,
    sheetWidthPx: 150,
    sheetHeightPx: 500,
  })
  expect(layout.capacity).toBe(0)
})

test("a single cell wider than the printable area is centered on the item", () => {
  const params = {
    diameterPx: 100,
    spacingPx: 40,
    marginPx: 50,
    sheetWidthPx: 220,
    sheetHeightPx: 220,
  }
  const layout = computeGridLayout(params)

  expect(layout.positions).toEqual([{ x: 110, y: 110 }])
  expectContained(layout.positions, params)
})

test("negative spacing is treated as zero", () => {
  const layout = computeGridLayout({
    diameterPx: 100,
    spacingPx: -5,
    marginPx: 0,
    sheetWidthPx: 300,
    sheetHeightPx: 200,
  })
  expect(layout.spacingPx).toBe(0)
  expect(layout.horizontalPitchPx).toBe(100)
  expect(layout.capacity).toBe(6)
})

test("GridLayoutSolver solves in one step and reports grid stats", () => {
  const solver = new GridLayoutSolver(
    makeA4SheetParams({ diameterMm: 32, spacingMm: 2, marginMm: 8 }),
  )
  solver.setup()
  solver.step()

  expect(solver.solved).toBe(true)
  expect(solver.stats.columns).toBe(5)
  expect(solver.stats.rows).toBe(8)
  expect(solver.getOutput().sheetLayout?.capacity).toBe(40)
  expect(solver.computeProgress()).toBe(1)
})
