import type { GraphicsObject } from "graphics-debug"
import type {
  LayoutMode,
  MultiPageLayoutResult,
  SheetLayoutParams,
  SingleSheetLayout,
} from "./badge-layout-types"
import { BasePipelineSolver } from "./solvers/BasePipelineSolver"
import type { CompactLayoutOptions } from "./solvers/CompactLayoutSolver/compact-engine"
import { PagePartitionSolver } from "./solvers/PagePartitionSolver/PagePartitionSolver"
import type { SheetLayoutSolver } from "./solvers/SheetLayoutSolver"
import { createSheetLayoutSolver } from "./solvers/createSheetLayoutSolver"
import { createSheetVisualization } from "./visualization/visualizeSheetLayout"

export interface BadgeLayoutPipelineInput {
  totalItems: number
  mode: LayoutMode
  sheetParams: SheetLayoutParams
  compactOptions?: CompactLayoutOptions
}

export type BadgeLayoutPhase = "SHEET_LAYOUT" | "PAGE_PARTITION"

export class BadgeLayoutPipeline extends BasePipelineSolver<BadgeLayoutPhase> {
  sheetLayoutSolver?: SheetLayoutSolver
  pagePartitionSolver?: PagePartitionSolver
  private phase: BadgeLayoutPhase | null = "SHEET_LAYOUT"

  constructor(readonly inputProblem: BadgeLayoutPipelineInput) {
    super()
    this.stats = { phase: this.phase }
  }

  protected override getCurrentPhase(): BadgeLayoutPhase | null {
    return this.phase
  }

  protected override setPhase(phase: BadgeLayoutPhase | null) {
    this.phase = phase
    this.stats.phase = phase
  }

  protected override stepPhase(phase: BadgeLayoutPhase): BadgeLayoutPhase | null {
    switch (phase) {
      case "SHEET_LAYOUT":
        return this.stepSheetLayout()
      case "PAGE_PARTITION":
        return this.stepPagePartition()
    }
  }

  private stepSheetLayout(): BadgeLayoutPhase | null {
    if (!this.sheetLayoutSolver) {
      this.sheetLayoutSolver = createSheetLayoutSolver(
        this.inputProblem.mode,
        this.inputProblem.sheetParams,
        this.inputProblem.compactOptions,
      )
      this.extendIterationBudget(this.sheetLayoutSolver.MAX_ITERATIONS)
    }

    const solver = this.sheetLayoutSolver
    solver.step()
    if (solver.failed) {
      this.failWith("SHEET_LAYOUT", solver)
      return null
    }
    if (!solver.solved) return "SHEET_LAYOUT"

    this.stats.capacity = solver.getOutput().sheetLayout?.capacity ?? 0
    return "PAGE_PARTITION"
  }

  private stepPagePartition(): BadgeLayoutPhase | null {
    const sheetLayout = this.sheetLayoutSolver?.getOutput().sheetLayout
    if (!sheetLayout) {
      this.error = "PAGE_PARTITION: sheet layout missing"
      this.failed = true
      return null
    }

    if (!this.pagePartitionSolver) {
      this.pagePartitionSolver = new PagePartitionSolver({
        totalItems: this.inputProblem.totalItems,
        sheetLayout,
        sheetParams: this.inputProblem.sheetParams,
      })
      this.extendIterationBudget(this.pagePartitionSolver.MAX_ITERATIONS)
    }

    const solver = this.pagePartitionSolver
    solver.step()
    if (solver.failed) {
      this.failWith("PAGE_PARTITION", solver)
      return null
    }
    this.stats.pages = solver.stats.pages
    return solver.solved ? null : "PAGE_PARTITION"
  }

  /** Leaves room for every step of a phase solver that was just created. */
  private extendIterationBudget(subSolverIterations: number) {
    this.MAX_ITERATIONS = Math.max(
      this.MAX_ITERATIONS,
      this.iterations + subSolverIterations + 2,
    )
  }

  computeProgress(): number {
    if (this.solved) return 1
    if (this.phase === "PAGE_PARTITION") {
      return 0.5 + 0.5 * (this.pagePartitionSolver?.computeProgress() ?? 0)
    }
    return 0.5 * (this.sheetLayoutSolver?.computeProgress() ?? 0)
  }

  override getOutput(): {
    sheetLayout: SingleSheetLayout | null
    result: MultiPageLayoutResult | null
  } {
    return {
      sheetLayout: this.sheetLayoutSolver?.getOutput().sheetLayout ?? null,
      result: this.pagePartitionSolver?.getOutput() ?? null,
    }
  }

  initialVisualize(): GraphicsObject {
    return createSheetVisualization(
      this.inputProblem.sheetParams,
      `BadgeLayoutPipeline - Initial (${this.inputProblem.mode})`,
    )
  }

  override visualize(): GraphicsObject {
    if (this.phase === "PAGE_PARTITION" && this.pagePartitionSolver) {
      return this.pagePartitionSolver.visualize()
    }
    if (this.sheetLayoutSolver) return this.sheetLayoutSolver.visualize()
    return this.initialVisualize()
  }

  finalVisualize(): GraphicsObject {
    if (this.sheetLayoutSolver?.solved) {
      return {
        ...this.sheetLayoutSolver.visualize(),
        title: `BadgeLayoutPipeline - Final (${this.inputProblem.mode})`,
      }
    }
    return this.initialVisualize()
  }
}
