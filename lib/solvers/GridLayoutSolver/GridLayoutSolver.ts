// lib/solvers/GridLayoutSolver/GridLayoutSolver.ts
import type { GridSheetLayout } from "../../badge-layout-types"
import { SheetLayoutSolver } from "../SheetLayoutSolver"
import { computeGridLayout, emptyGridLayout } from "./computeGridLayout"

export class GridLayoutSolver extends SheetLayoutSolver {
  readonly mode = "grid" as const
  protected override sheetLayout: GridSheetLayout | null = null

  override _step() {
    const layout = computeGridLayout(this.params)
    this.sheetLayout = layout
    this.stats = {
      columns: layout.columns,
      rows: layout.rows,
      capacity: layout.capacity,
    }
    this.solved = true
  }

  override computeProgress(): number {
    return this.solved ? 1 : 0
  }

  protected override emptyLayout(): GridSheetLayout {
    return emptyGridLayout(this.params)
  }
}
