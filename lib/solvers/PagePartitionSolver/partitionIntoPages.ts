// lib/solvers/PagePartitionSolver/partitionIntoPages.ts
import type {
  MultiPageLayoutResult,
  PageAssignment,
  SingleSheetLayout,
} from "../../badge-layout-types"
import { InsufficientCapacityError } from "../../errors"

export function assertItemCount(totalItems: number) {
  if (!Number.isInteger(totalItems) || totalItems < 0) {
    throw new RangeError(
      `BadgeLayout: item count must be a non-negative integer, got ${totalItems}`,
    )
  }
}

/**
 * Pages needed for `totalItems`. Zero items still yield one (empty) page so
 * a placeholder preview can be drawn.
 */
export function getTotalPages(totalItems: number, capacityPerSheet: number) {
  if (totalItems === 0) return 1
  return Math.ceil(totalItems / capacityPerSheet)
}

export function createPageAssignment(
  pageIndex: number,
  totalItems: number,
  sheetLayout: SingleSheetLayout,
): PageAssignment {
  const firstItemIndex = pageIndex * sheetLayout.capacity
  const itemsOnPage = Math.max(
    0,
    Math.min(sheetLayout.capacity, totalItems - firstItemIndex),
  )
  return {
    pageIndex,
    firstItemIndex,
    itemsOnPage,
    positions: sheetLayout.positions.slice(0, itemsOnPage),
  }
}

/**
 * Splits `totalItems` across as many sheets as needed. Every page reuses the
 * same sheet positions; only the final page may be partially filled.
 */
export function partitionIntoPages(
  totalItems: number,
  sheetLayout: SingleSheetLayout,
): MultiPageLayoutResult {
  assertItemCount(totalItems)
  const capacityPerSheet = sheetLayout.capacity
  if (capacityPerSheet === 0 && totalItems > 0) {
    throw new InsufficientCapacityError({ totalItems, mode: sheetLayout.mode })
  }

  const totalPages = getTotalPages(totalItems, capacityPerSheet)
  const pages: PageAssignment[] = []
  for (let pageIndex = 0; pageIndex < totalPages; pageIndex++) {
    pages.push(createPageAssignment(pageIndex, totalItems, sheetLayout))
  }

  return { totalItems, capacityPerSheet, totalPages, pages }
}
