// lib/solvers/CompactLayoutSolver/CompactLayoutSolver.ts
import type { GraphicsObject } from "graphics-debug"
import type {
  CompactSheetLayout,
  SheetLayoutParams,
} from "../../badge-layout-types"
import {
  createSheetVisualization,
  drawItemCircles,
} from "../../visualization/visualizeSheetLayout"
import {
  SHEET_COLORS,
  getColorForColumn,
} from "../../visualization/visualizationColors"
import { SheetLayoutSolver } from "../SheetLayoutSolver"
import {
  countEmittedPositions,
  finalizeCompactLayout,
  getColumnX,
  getCompactStepBound,
  initCompactState,
  stepCompact,
  type CompactLayoutOptions,
  type CompactLayoutState,
} from "./compact-engine"

/**
 * Honeycomb sheet layout, one small step per call: first one candidate
 * column count of the uniform search per step, then one column of positions
 * per step.
 */
export class CompactLayoutSolver extends SheetLayoutSolver {
  readonly mode = "compact" as const
  protected override sheetLayout: CompactSheetLayout | null = null
  private state: CompactLayoutState

  constructor(params: SheetLayoutParams, options: CompactLayoutOptions = {}) {
    super(params)
    this.state = initCompactState(this.params, options)
    this.MAX_ITERATIONS = Math.max(
      this.MAX_ITERATIONS,
      getCompactStepBound(this.state),
    )
    this.stats = { phase: this.state.phase }
  }

  override _step() {
    stepCompact(this.state)

    this.stats.phase = this.state.phase
    this.stats.testedColumns = this.state.nextTestColumns - 1
    this.stats.uniformColumns = this.state.uniformFit?.columns ?? 0
    this.stats.strategy = this.state.plan?.strategy
    this.stats.placed = countEmittedPositions(this.state)

    if (this.state.phase === "DONE") {
      this.sheetLayout = finalizeCompactLayout(this.state)
      this.stats.strategy = this.sheetLayout.strategy
      this.stats.capacity = this.sheetLayout.capacity
      this.solved = true
    }
  }

  /** Compute solver progress (0 to 1). */
  override computeProgress(): number {
    if (this.solved || this.state.phase === "DONE") return 1
    const { plan } = this.state
    if (!plan) {
      // Column search counts as the first half
      return (
        (0.5 * (this.state.nextTestColumns - 1)) /
        Math.max(1, this.state.maxTestColumns)
      )
    }
    return 0.5 + (0.5 * this.state.nextColumn) / Math.max(1, plan.columns)
  }

  protected override emptyLayout(): CompactSheetLayout {
    return finalizeCompactLayout(initCompactState(this.params))
  }

  override visualize(): GraphicsObject {
    if (this.sheetLayout?.strategy === "grid") return super.visualize()

    const { plan } = this.state
    const graphics = createSheetVisualization(
      this.params,
      plan
        ? `Compact layout: ${plan.strategy}, ${plan.columns} column(s)`
        : "Compact layout: column search",
    )
    const radiusPx = this.params.diameterPx / 2

    const circles = this.state.emittedColumns.flatMap(({ column, positions }) =>
      drawItemCircles(
        positions,
        radiusPx,
        getColorForColumn(column),
        (row) => `col ${column + 1} row ${row + 1}`,
      ),
    )

    const lines: NonNullable<GraphicsObject["lines"]> = []
    if (plan) {
      for (const column of this.state.skippedColumns) {
        const x = getColumnX(plan, column)
        lines.push({
          points: [
            { x, y: 0 },
            { x, y: this.params.sheetHeightPx },
          ],
          strokeColor: SHEET_COLORS.skippedColumn.stroke,
          label: `skipped column ${column + 1}`,
        })
      }
    }

    return { ...graphics, circles, lines }
  }
}
