// lib/utils/getPageSlots.ts
import type {
  PageAssignment,
  PageSlot,
  SingleSheetLayout,
} from "../badge-layout-types"

/**
 * Every slot of the sheet for one page, with the global index of the item
 * placed there. Slots past the page's item count are placeholders (null).
 */
export function getPageSlots(
  page: PageAssignment,
  sheetLayout: SingleSheetLayout,
): PageSlot[] {
  return sheetLayout.positions.map((position, slotIndex) => ({
    slotIndex,
    position,
    itemIndex:
      slotIndex < page.itemsOnPage ? page.firstItemIndex + slotIndex : null,
  }))
}
