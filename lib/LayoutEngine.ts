import { LAYOUT_CONFIG } from "../layout.config"
import type {
  GeometryConfig,
  LayoutInfo,
  LayoutMode,
  MultiPageLayoutResult,
  SheetLayoutParams,
  SingleSheetLayout,
} from "./badge-layout-types"
import { BadgeLayoutPipeline } from "./BadgeLayoutPipeline"
import type { CompactLayoutOptions } from "./solvers/CompactLayoutSolver/compact-engine"
import { assertItemCount } from "./solvers/PagePartitionSolver/partitionIntoPages"
import { createSheetLayoutSolver } from "./solvers/createSheetLayoutSolver"
import { mmToPixels } from "./utils/units"

export type LayoutEngineOptions = {
  /** Resolution used to convert spacing and margin from mm. */
  dpi?: number
  compact?: CompactLayoutOptions
}

export type BadgeLayoutResult = MultiPageLayoutResult & {
  sheetLayout: SingleSheetLayout
}

/**
 * Single entry point for layout queries. Holds only its options; every call
 * is computed from its arguments alone.
 */
export class LayoutEngine {
  private readonly dpi: number
  private readonly compactOptions: CompactLayoutOptions

  constructor(options: LayoutEngineOptions = {}) {
    this.dpi = options.dpi ?? LAYOUT_CONFIG.PRINT_DPI
    this.compactOptions = { ...options.compact }
  }

  toSheetLayoutParams(
    spacingMm: number,
    marginMm: number,
    config: GeometryConfig,
  ): SheetLayoutParams {
    return {
      diameterPx: config.itemDiameterPx,
      spacingPx: mmToPixels(spacingMm, this.dpi),
      marginPx: mmToPixels(marginMm, this.dpi),
      sheetWidthPx: config.sheetWidthPx,
      sheetHeightPx: config.sheetHeightPx,
    }
  }

  sheetLayout(
    mode: LayoutMode,
    spacingMm: number,
    marginMm: number,
    config: GeometryConfig,
  ): SingleSheetLayout {
    const solver = createSheetLayoutSolver(
      mode,
      this.toSheetLayoutParams(spacingMm, marginMm, config),
      this.compactOptions,
    )
    solver.solve()
    const { sheetLayout } = solver.getOutput()
    if (solver.failed || !sheetLayout) {
      throw new Error(`BadgeLayout: ${mode} layout failed: ${solver.error}`)
    }
    return sheetLayout
  }

  /**
   * Lays out `totalItems` across as many sheets as needed.
   * Throws InsufficientCapacityError when items are requested but none fit.
   */
  layout(
    totalItems: number,
    mode: LayoutMode,
    spacingMm: number,
    marginMm: number,
    config: GeometryConfig,
  ): BadgeLayoutResult {
    assertItemCount(totalItems)

    const pipeline = new BadgeLayoutPipeline({
      totalItems,
      mode,
      sheetParams: this.toSheetLayoutParams(spacingMm, marginMm, config),
      compactOptions: this.compactOptions,
    })
    pipeline.solve()

    const capacityError = pipeline.pagePartitionSolver?.capacityError
    if (capacityError) throw capacityError

    const { sheetLayout, result } = pipeline.getOutput()
    if (pipeline.failed || !sheetLayout || !result) {
      throw new Error(`BadgeLayout: ${mode} layout failed: ${pipeline.error}`)
    }
    return { ...result, sheetLayout }
  }

  layoutInfo(
    mode: LayoutMode,
    spacingMm: number,
    marginMm: number,
    config: GeometryConfig,
  ): LayoutInfo {
    return {
      mode,
      capacity: this.sheetLayout(mode, spacingMm, marginMm, config).capacity,
      spacingMm,
      marginMm,
    }
  }
}

/** Convenience wrapper around a default LayoutEngine. */
export function computeLayout(
  totalItems: number,
  mode: LayoutMode,
  spacingMm: number,
  marginMm: number,
  config: GeometryConfig,
  options: LayoutEngineOptions = {},
): BadgeLayoutResult {
  return new LayoutEngine(options).layout(
    totalItems,
    mode,
    spacingMm,
    marginMm,
    config,
  )
}
