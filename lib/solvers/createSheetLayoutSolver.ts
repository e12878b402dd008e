// lib/solvers/createSheetLayoutSolver.ts
import type { LayoutMode, SheetLayoutParams } from "../badge-layout-types"
import { CompactLayoutSolver } from "./CompactLayoutSolver/CompactLayoutSolver"
import type { CompactLayoutOptions } from "./CompactLayoutSolver/compact-engine"
import { GridLayoutSolver } from "./GridLayoutSolver/GridLayoutSolver"
import type { SheetLayoutSolver } from "./SheetLayoutSolver"

export function createSheetLayoutSolver(
  mode: LayoutMode,
  params: SheetLayoutParams,
  compactOptions: CompactLayoutOptions = {},
): SheetLayoutSolver {
  switch (mode) {
    case "grid":
      return new GridLayoutSolver(params)
    case "compact":
      return new CompactLayoutSolver(params, compactOptions)
    default: {
      const unknownMode: never = mode
      throw new Error(`BadgeLayout: unknown layout mode "${unknownMode}"`)
    }
  }
}
