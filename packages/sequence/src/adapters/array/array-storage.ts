import { IndexOutOfRangeError } from "../../core/errors"
import type { SequenceStorage } from "../../ports/storage"

export class ArrayStorage<T> implements SequenceStorage<T> {
  private readonly items: T[] = []

  append(item: T): void {
    this.items.push(item)
  }

  get(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new IndexOutOfRangeError({ index, length: this.items.length })
    }

    return this.items[index]
  }

  size(): number {
    return this.items.length
  }
}
