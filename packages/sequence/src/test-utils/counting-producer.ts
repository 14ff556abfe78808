/**
 * A one-shot iterable that counts how often its iterator is advanced.
 */
export class CountingProducer<T> implements Iterable<T> {
  pulls = 0
  callsAfterDone = 0
  private iterated = false
  private done = false

  constructor(private readonly items: Iterable<T>) {}

  [Symbol.iterator](): Iterator<T> {
    if (this.iterated) throw new Error("producer iterated twice")
    this.iterated = true

    const inner = this.items[Symbol.iterator]()

    return {
      next: () => {
        if (this.done) {
          this.callsAfterDone++
          return { done: true, value: undefined }
        }

        const result = inner.next()

        if (result.done) {
          this.done = true
        } else {
          this.pulls++
        }

        return result
      },
    }
  }
}

export function* naturals(): Generator<number, never, undefined> {
  for (let n = 0; ; n++) yield n
}
