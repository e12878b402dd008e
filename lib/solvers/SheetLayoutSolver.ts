// lib/solvers/SheetLayoutSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type {
  LayoutMode,
  SheetLayoutParams,
  SingleSheetLayout,
} from "../badge-layout-types"
import { sanitizeSheetLayoutParams } from "../utils/layout-geometry"
import { visualizeSheetLayout } from "../visualization/visualizeSheetLayout"

export type SheetLayoutSolverOutput = {
  /** Null until the solver has finished. */
  sheetLayout: SingleSheetLayout | null
}

/**
 * Common surface of the per-mode sheet layout solvers. Each layout mode has
 * exactly one subclass.
 */
export abstract class SheetLayoutSolver extends BaseSolver {
  abstract readonly mode: LayoutMode
  protected readonly params: SheetLayoutParams
  protected sheetLayout: SingleSheetLayout | null = null

  constructor(params: SheetLayoutParams) {
    super()
    this.params = sanitizeSheetLayoutParams(params)
  }

  override getOutput(): SheetLayoutSolverOutput {
    return { sheetLayout: this.sheetLayout }
  }

  override visualize(): GraphicsObject {
    if (!this.sheetLayout) {
      return visualizeSheetLayout(
        this.emptyLayout(),
        this.params,
        `${this.mode} layout (in progress)`,
      )
    }
    return visualizeSheetLayout(this.sheetLayout, this.params)
  }

  /** Fraction of the layout computed so far, from 0 to 1. */
  abstract computeProgress(): number

  protected abstract emptyLayout(): SingleSheetLayout
}
