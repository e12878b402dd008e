// lib/solvers/PagePartitionSolver/PagePartitionSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type {
  MultiPageLayoutResult,
  PageAssignment,
  SheetLayoutParams,
  SingleSheetLayout,
} from "../../badge-layout-types"
import { InsufficientCapacityError } from "../../errors"
import {
  createSheetVisualization,
  visualizePage,
} from "../../visualization/visualizeSheetLayout"
import {
  assertItemCount,
  createPageAssignment,
  getTotalPages,
} from "./partitionIntoPages"

export type PagePartitionSolverInput = {
  totalItems: number
  sheetLayout: SingleSheetLayout
  /** Sheet geometry, only used for visualization. */
  sheetParams: SheetLayoutParams
}

/**
 * Fills pages greedily, one page per step. Fails (without looping) when
 * items are requested but the sheet holds none.
 */
export class PagePartitionSolver extends BaseSolver {
  private pages: PageAssignment[] = []
  private totalPages: number
  capacityError: InsufficientCapacityError | null = null

  constructor(private input: PagePartitionSolverInput) {
    super()
    assertItemCount(input.totalItems)
    this.totalPages =
      input.sheetLayout.capacity === 0
        ? 0
        : getTotalPages(input.totalItems, input.sheetLayout.capacity)
    this.MAX_ITERATIONS = Math.max(this.MAX_ITERATIONS, this.totalPages + 2)
    this.stats = { pages: 0, totalPages: this.totalPages }
  }

  override _step() {
    const { totalItems, sheetLayout } = this.input

    if (sheetLayout.capacity === 0) {
      if (totalItems > 0) {
        this.capacityError = new InsufficientCapacityError({
          totalItems,
          mode: sheetLayout.mode,
        })
        this.error = this.capacityError.message
        this.failed = true
        return
      }
      this.pages.push(createPageAssignment(0, 0, sheetLayout))
      this.totalPages = 1
    } else {
      this.pages.push(
        createPageAssignment(this.pages.length, totalItems, sheetLayout),
      )
    }

    this.stats.pages = this.pages.length
    if (this.pages.length >= this.totalPages) this.solved = true
  }

  computeProgress(): number {
    if (this.solved) return 1
    return this.pages.length / Math.max(1, this.totalPages)
  }

  override getOutput(): MultiPageLayoutResult | null {
    if (!this.solved) return null
    return {
      totalItems: this.input.totalItems,
      capacityPerSheet: this.input.sheetLayout.capacity,
      totalPages: this.pages.length,
      pages: this.pages,
    }
  }

  /** Shows the most recently filled page. */
  override visualize(): GraphicsObject {
    const lastPage = this.pages[this.pages.length - 1]
    if (!lastPage) {
      return createSheetVisualization(this.input.sheetParams, "No pages yet")
    }
    return visualizePage(lastPage, this.input.sheetLayout, this.input.sheetParams)
  }
}
