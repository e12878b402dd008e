// lib/badge-layout-types.ts
export type LayoutMode = "grid" | "compact"

/** Immutable geometry of one query, all lengths in device pixels. */
export type GeometryConfig = Readonly<{
  itemDiameterPx: number
  itemRadiusPx: number
  sheetWidthPx: number
  sheetHeightPx: number
}>

/** Center of one placed item, in device pixels. */
export type Position = Readonly<{ x: number; y: number }>

/** Pixel inputs shared by both sheet layout calculators. */
export type SheetLayoutParams = {
  diameterPx: number
  spacingPx: number
  marginPx: number
  sheetWidthPx: number
  sheetHeightPx: number
}

/** "grid" marks a compact layout that fell back to the plain grid. */
export type CompactStrategy = "hex" | "uniform" | "grid"

type SheetLayoutBase = {
  positions: readonly Position[]
  horizontalPitchPx: number
  verticalPitchPx: number
  marginPx: number
  spacingPx: number
  /** Number of positions; the authoritative per-sheet count. */
  capacity: number
}

export type GridSheetLayout = SheetLayoutBase & {
  mode: "grid"
  columns: number
  rows: number
}

export type CompactSheetLayout = SheetLayoutBase & {
  mode: "compact"
  /** Columns planned by the strategy, including any that were skipped. */
  columns: number
  strategy: CompactStrategy
  /** Column indexes dropped because they would cross the margin. */
  skippedColumns: readonly number[]
}

export type SingleSheetLayout = GridSheetLayout | CompactSheetLayout

export type PageAssignment = Readonly<{
  pageIndex: number
  /** Global index of the first item placed on this page. */
  firstItemIndex: number
  itemsOnPage: number
  positions: readonly Position[]
}>

export type MultiPageLayoutResult = Readonly<{
  totalItems: number
  capacityPerSheet: number
  totalPages: number
  pages: readonly PageAssignment[]
}>

export type LayoutInfo = Readonly<{
  mode: LayoutMode
  capacity: number
  spacingMm: number
  marginMm: number
}>

/** One slot of a page: the item placed there, or null for a placeholder. */
export type PageSlot = Readonly<{
  slotIndex: number
  position: Position
  itemIndex: number | null
}>
