/**
 * A bidirectional frame channel bound to one client connection.
 *
 * Frames are encoded JSON-RPC messages; decoding and encoding belong to the
 * session on top of the channel. `receive()` ends when the connection goes away.
 */
export interface Channel {
  readonly id: string
  send (frame: string): Promise<void>
  receive (): AsyncIterable<string>
  close (): Promise<void>
}

/**
 * Unbounded single-consumer queue that can be consumed with `for await`.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = []
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private ended = false

  get closed (): boolean {
    return this.ended
  }

  push (item: T): boolean {
    if (this.ended) {
      return false
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value: item, done: false })
    } else {
      this.items.push(item)
    }
    return true
  }

  /**
   * Items already queued are still delivered, then iteration ends.
   */
  end (): void {
    if (this.ended) {
      return
    }
    this.ended = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  private next (): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise(resolve => {
      this.waiters.push(resolve)
    })
  }

  [Symbol.asyncIterator] (): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.end()
        return { value: undefined, done: true }
      }
    }
  }
}
