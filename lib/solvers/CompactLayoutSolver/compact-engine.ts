// lib/solvers/CompactLayoutSolver/compact-engine.ts
import { LAYOUT_CONFIG } from "../../../layout.config"
import type {
  CompactSheetLayout,
  GridSheetLayout,
  Position,
  SheetLayoutParams,
} from "../../badge-layout-types"
import {
  HEX_ROW_FACTOR,
  getAvailableArea,
  gt,
  lt,
  lte,
  sanitizeSheetLayoutParams,
} from "../../utils/layout-geometry"
import {
  evaluateUniformColumns,
  getMaxTestColumns,
  type UniformColumnFit,
} from "./searchUniformColumns"
import { selectColumnPlan, type ColumnPlan } from "./selectColumnPlan"
import { computeGridLayout } from "../GridLayoutSolver/computeGridLayout"

export type CompactLayoutOptions = {
  /** See LAYOUT_CONFIG.UNIFORM_MIN_SPACING_RATIO */
  uniformMinSpacingRatio?: number
  /** See LAYOUT_CONFIG.PREFER_HEX_ON_TIE */
  preferHexOnTie?: boolean
  /** See LAYOUT_CONFIG.GRID_FALLBACK */
  gridFallback?: boolean
}

export type CompactPhase = "COLUMN_SEARCH" | "EMIT" | "GRID_FALLBACK" | "DONE"

export type CompactLayoutState = {
  params: SheetLayoutParams
  options: Required<CompactLayoutOptions>
  available: { width: number; height: number } | null
  phase: CompactPhase
  nextTestColumns: number
  maxTestColumns: number
  uniformFit: UniformColumnFit | null
  plan: ColumnPlan | null
  nextColumn: number
  emittedColumns: Array<{ column: number; positions: Position[] }>
  skippedColumns: number[]
  /** Set when the plain grid holds more items than the honeycomb. */
  gridFallbackLayout: GridSheetLayout | null
}

export function initCompactState(
  rawParams: SheetLayoutParams,
  options: CompactLayoutOptions = {},
): CompactLayoutState {
  const params = sanitizeSheetLayoutParams(rawParams)
  const available = getAvailableArea(params)

  return {
    params,
    options: {
      uniformMinSpacingRatio:
        options.uniformMinSpacingRatio ??
        LAYOUT_CONFIG.UNIFORM_MIN_SPACING_RATIO,
      preferHexOnTie: options.preferHexOnTie ?? LAYOUT_CONFIG.PREFER_HEX_ON_TIE,
      gridFallback: options.gridFallback ?? LAYOUT_CONFIG.GRID_FALLBACK,
    },
    available,
    phase: available ? "COLUMN_SEARCH" : "DONE",
    nextTestColumns: 1,
    maxTestColumns: available
      ? getMaxTestColumns(available.width, params.diameterPx)
      : 0,
    uniformFit: null,
    plan: null,
    nextColumn: 0,
    emittedColumns: [],
    skippedColumns: [],
    gridFallbackLayout: null,
  }
}

/** Evaluates one candidate column count of the uniform search. */
export function stepColumnSearch(state: CompactLayoutState) {
  const { available, params } = state
  if (!available) {
    state.phase = "DONE"
    return
  }

  const fit =
    state.nextTestColumns <= state.maxTestColumns
      ? evaluateUniformColumns({
          testColumns: state.nextTestColumns,
          availableWidthPx: available.width,
          diameterPx: params.diameterPx,
          spacingPx: params.spacingPx,
          minSpacingRatio: state.options.uniformMinSpacingRatio,
        })
      : null

  if (fit) {
    state.uniformFit = fit
    state.nextTestColumns++
    return
  }

  // Search exhausted
  if (!state.uniformFit) {
    state.phase = "DONE"
    return
  }
  state.plan = selectColumnPlan({
    uniformFit: state.uniformFit,
    availableWidthPx: available.width,
    diameterPx: params.diameterPx,
    spacingPx: params.spacingPx,
    marginPx: params.marginPx,
    preferHexOnTie: state.options.preferHexOnTie,
  })
  state.phase = "EMIT"
}

/** Column center x; a single column ignores the pitch. */
export const getColumnX = (plan: ColumnPlan, column: number) =>
  plan.columns === 1 ? plan.startX : plan.startX + column * plan.horizontalPitchPx

/** Odd columns start half a row lower so rows interleave. */
export const getColumnStartY = (
  plan: ColumnPlan,
  column: number,
  marginPx: number,
  radiusPx: number,
) => marginPx + radiusPx + (column % 2 === 1 ? plan.verticalPitchPx / 2 : 0)

export function computeColumnPositions(params: {
  plan: ColumnPlan
  column: number
  sheet: SheetLayoutParams
}): Position[] | null {
  const { plan, column, sheet } = params
  const radiusPx = sheet.diameterPx / 2
  const x = getColumnX(plan, column)

  if (
    lt(x - radiusPx, sheet.marginPx) ||
    gt(x + radiusPx, sheet.sheetWidthPx - sheet.marginPx)
  ) {
    return null
  }

  const yStart = getColumnStartY(plan, column, sheet.marginPx, radiusPx)
  const maxBottom = sheet.sheetHeightPx - sheet.marginPx

  const positions: Position[] = []
  for (let row = 0; ; row++) {
    const y = yStart + row * plan.verticalPitchPx
    if (!lte(y + radiusPx, maxBottom)) break
    positions.push({ x, y })
  }
  return positions
}

/** Emits one column, or records it as skipped when it would cross the margin. */
export function stepEmitColumn(state: CompactLayoutState) {
  const { plan } = state
  if (!plan || state.nextColumn >= plan.columns) {
    state.phase = getPhaseAfterEmit(state)
    return
  }

  const column = state.nextColumn
  const columnPositions = computeColumnPositions({
    plan,
    column,
    sheet: state.params,
  })
  if (columnPositions) {
    state.emittedColumns.push({ column, positions: columnPositions })
  } else {
    state.skippedColumns.push(column)
  }

  state.nextColumn++
  if (state.nextColumn >= plan.columns) state.phase = getPhaseAfterEmit(state)
}

const getPhaseAfterEmit = (state: CompactLayoutState): CompactPhase =>
  state.options.gridFallback ? "GRID_FALLBACK" : "DONE"

export const countEmittedPositions = (state: CompactLayoutState) =>
  state.emittedColumns.reduce((sum, c) => sum + c.positions.length, 0)

/** Keeps the grid arrangement when it places strictly more items. */
export function stepGridFallback(state: CompactLayoutState) {
  const gridLayout = computeGridLayout(state.params)
  if (gridLayout.capacity > countEmittedPositions(state)) {
    state.gridFallbackLayout = gridLayout
  }
  state.phase = "DONE"
}

export function stepCompact(state: CompactLayoutState) {
  if (state.phase === "COLUMN_SEARCH") {
    stepColumnSearch(state)
  } else if (state.phase === "EMIT") {
    stepEmitColumn(state)
  } else if (state.phase === "GRID_FALLBACK") {
    stepGridFallback(state)
  }
}

/** Upper bound on the steps needed to finish a layout from a fresh state. */
export const getCompactStepBound = (state: CompactLayoutState) => {
  if (!state.available) return 1
  const hexColumns =
    Math.ceil(
      state.available.width / (state.params.diameterPx * HEX_ROW_FACTOR),
    ) + 2
  return state.maxTestColumns + hexColumns + 3
}

export function finalizeCompactLayout(
  state: CompactLayoutState,
): CompactSheetLayout {
  const { plan, params, gridFallbackLayout } = state
  if (gridFallbackLayout) {
    return {
      mode: "compact",
      positions: gridFallbackLayout.positions,
      columns: gridFallbackLayout.columns,
      strategy: "grid",
      skippedColumns: [],
      horizontalPitchPx: gridFallbackLayout.horizontalPitchPx,
      verticalPitchPx: gridFallbackLayout.verticalPitchPx,
      marginPx: params.marginPx,
      spacingPx: params.spacingPx,
      capacity: gridFallbackLayout.capacity,
    }
  }

  const positions = state.emittedColumns.flatMap((c) => c.positions)
  return {
    mode: "compact",
    positions,
    columns: plan?.columns ?? 0,
    strategy: plan?.strategy ?? "uniform",
    skippedColumns: state.skippedColumns,
    horizontalPitchPx: plan?.horizontalPitchPx ?? 0,
    verticalPitchPx: plan?.verticalPitchPx ?? 0,
    marginPx: params.marginPx,
    spacingPx: params.spacingPx,
    capacity: positions.length,
  }
}
