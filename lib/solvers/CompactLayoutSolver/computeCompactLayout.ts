// lib/solvers/CompactLayoutSolver/computeCompactLayout.ts
import type {
  CompactSheetLayout,
  SheetLayoutParams,
} from "../../badge-layout-types"
import {
  finalizeCompactLayout,
  initCompactState,
  stepCompact,
  type CompactLayoutOptions,
} from "./compact-engine"

/**
 * Column-major honeycomb arrangement. Picks between a hexagonal column pitch
 * packed against the left margin and an evenly spread (centered) set of
 * columns, whichever yields more columns, then staggers odd columns by half
 * a row.
 */
export function computeCompactLayout(
  params: SheetLayoutParams,
  options: CompactLayoutOptions = {},
): CompactSheetLayout {
  const state = initCompactState(params, options)
  while (state.phase !== "DONE") {
    stepCompact(state)
  }
  return finalizeCompactLayout(state)
}
