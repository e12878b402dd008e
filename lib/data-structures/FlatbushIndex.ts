import Flatbush from "flatbush"
import type { Position } from "../badge-layout-types"

export interface ISpatialIndex<T> {
  insert(item: T, minX: number, minY: number, maxX: number, maxY: number): void
  finish(): void
  search(minX: number, minY: number, maxX: number, maxY: number): T[]
}

/**
 * Static bounding-box index. Exactly `numItems` items must be inserted
 * before `finish()`, and nothing can be searched before it.
 */
export class FlatbushIndex<T> implements ISpatialIndex<T> {
  private index: Flatbush
  private items: T[] = []

  constructor(numItems: number) {
    this.index = new Flatbush(Math.max(1, numItems))
  }

  insert(item: T, minX: number, minY: number, maxX: number, maxY: number) {
    if (this.items.length >= this.index.numItems) {
      throw new Error("Exceeded initial capacity")
    }
    this.items.push(item)
    this.index.add(minX, minY, maxX, maxY)
  }

  insertPoint(item: T, point: Position) {
    this.insert(item, point.x, point.y, point.x, point.y)
  }

  finish() {
    this.index.finish()
  }

  search(minX: number, minY: number, maxX: number, maxY: number): T[] {
    return this.index.search(minX, minY, maxX, maxY).flatMap((id) => {
      const item = this.items[id]
      return item === undefined ? [] : [item]
    })
  }

  /** Items inside the square of half-width `reach` around `center`. */
  searchAround(center: Position, reach: number): T[] {
    return this.search(
      center.x - reach,
      center.y - reach,
      center.x + reach,
      center.y + reach,
    )
  }
}
