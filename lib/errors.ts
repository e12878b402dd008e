// lib/errors.ts
import type { LayoutMode } from "./badge-layout-types"

/**
 * Raised when items are requested but a sheet cannot hold even one of them.
 * Zero capacity on its own is a valid layout; it only becomes an error once
 * there is something to place.
 */
export class InsufficientCapacityError extends Error {
  readonly totalItems: number
  readonly mode: LayoutMode

  constructor(params: { totalItems: number; mode: LayoutMode }) {
    super(
      `BadgeLayout: cannot place ${params.totalItems} item(s), the ${params.mode} layout fits 0 per sheet. Reduce the margin or the item size.`,
    )
    this.name = "InsufficientCapacityError"
    this.totalItems = params.totalItems
    this.mode = params.mode
  }
}

export class LayoutValidationError extends Error {
  constructor(message: string) {
    super(`BadgeLayout: ${message}`)
    this.name = "LayoutValidationError"
  }
}
