// lib/solvers/BasePipelineSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"

/**
 * Base class for solvers that run in distinct phases. Each call to
 * `stepPhase` advances the current phase and returns the phase to run next,
 * or null when the pipeline is finished.
 */
export abstract class BasePipelineSolver<
  Phase extends string,
> extends BaseSolver {
  protected abstract getCurrentPhase(): Phase | null
  protected abstract setPhase(phase: Phase | null): void
  protected abstract stepPhase(phase: Phase): Phase | null

  override _step() {
    const currentPhase = this.getCurrentPhase()
    if (!currentPhase) {
      this.solved = true
      return
    }

    const nextPhase = this.stepPhase(currentPhase)
    if (this.failed) return
    this.setPhase(nextPhase)
    if (!nextPhase) this.solved = true
  }

  /**
   * Get the current phase name for visualization/stats.
   */
  getPhase(): Phase | null {
    return this.getCurrentPhase()
  }

  /** Marks the pipeline failed with the error of a failed phase solver. */
  protected failWith(phase: Phase, subSolver: BaseSolver) {
    this.error = `${phase}: ${subSolver.error ?? "failed"}`
    this.failed = true
  }
}
