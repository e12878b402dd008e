export * from "./badge-layout-types"
export * from "./errors"
export * from "./sheet-presets"
export * from "./LayoutEngine"
export * from "./BadgeLayoutPipeline"
export { computeGridLayout } from "./solvers/GridLayoutSolver/computeGridLayout"
export { GridLayoutSolver } from "./solvers/GridLayoutSolver/GridLayoutSolver"
export { computeCompactLayout } from "./solvers/CompactLayoutSolver/computeCompactLayout"
export { CompactLayoutSolver } from "./solvers/CompactLayoutSolver/CompactLayoutSolver"
export type { CompactLayoutOptions } from "./solvers/CompactLayoutSolver/compact-engine"
export {
  partitionIntoPages,
  getTotalPages,
} from "./solvers/PagePartitionSolver/partitionIntoPages"
export { PagePartitionSolver } from "./solvers/PagePartitionSolver/PagePartitionSolver"
export { SheetLayoutSolver } from "./solvers/SheetLayoutSolver"
export { createSheetLayoutSolver } from "./solvers/createSheetLayoutSolver"
export { mmToPixels, pixelsToMm } from "./utils/units"
export { createGeometryConfig } from "./utils/createGeometryConfig"
export type { GeometryConfigInput } from "./utils/createGeometryConfig"
export { resolveBadgeSettings } from "./utils/resolveBadgeSettings"
export type { BadgeSettings, BadgeSettingsInput } from "./utils/resolveBadgeSettings"
export { getPageSlots } from "./utils/getPageSlots"
export { findOverlappingPlacements } from "./utils/findOverlappingPlacements"
export type { PlacementConflict } from "./utils/findOverlappingPlacements"
export { findOutOfBoundsPlacements } from "./utils/findOutOfBoundsPlacements"
export { validateSheetLayout } from "./utils/validateSheetLayout"
export {
  createSheetVisualization,
  visualizePage,
  visualizeSheetLayout,
} from "./visualization/visualizeSheetLayout"
export { LAYOUT_CONFIG, SETTING_LIMITS } from "../layout.config"
