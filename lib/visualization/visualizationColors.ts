// lib/visualization/visualizationColors.ts
export const SHEET_COLORS = {
  sheet: { fill: "#ffffff", stroke: "#111827" },
  margin: { fill: "none", stroke: "#9ca3af" },
  item: { fill: "#dbeafe", stroke: "#3b82f6" },
  placeholder: { fill: "none", stroke: "#d1d5db" },
  skippedColumn: { stroke: "#ef4444" },
} as const

const COLUMN_COLORS = [
  { fill: "#dbeafe", stroke: "#3b82f6" },
  { fill: "#fef3c7", stroke: "#f59e0b" },
] as const

/** Alternates colors so staggered columns are easy to tell apart. */
export function getColorForColumn(column: number): {
  fill: string
  stroke: string
} {
  return column % 2 === 0 ? COLUMN_COLORS[0] : COLUMN_COLORS[1]
}
