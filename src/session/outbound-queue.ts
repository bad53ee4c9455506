import { TransportError, errorMessage } from '../errors.ts'

/**
 * Single writer in front of a channel: frames are written one at a time, in
 * push order. After the first write failure every later frame is dropped.
 */
export class OutboundQueue {
  private tail: Promise<void> = Promise.resolve()
  private closed = false
  private failed = false
  private readonly write: (frame: string) => Promise<void>
  private readonly onError: (error: TransportError) => void

  constructor (write: (frame: string) => Promise<void>, onError: (error: TransportError) => void) {
    this.write = write
    this.onError = onError
  }

  /**
   * Queues a frame. Returns false when the frame is discarded.
   */
  push (frame: string): boolean {
    if (this.closed || this.failed) {
      return false
    }
    this.tail = this.tail
      .then(async () => {
        if (!this.failed) {
          await this.write(frame)
        }
      })
      .catch((error: unknown) => {
        if (!this.failed) {
          this.failed = true
          this.onError(error instanceof TransportError ? error : new TransportError(`Write failed: ${errorMessage(error)}`, { cause: error }))
        }
      })
    return true
  }

  /**
   * Resolves once every frame queued so far has been written or dropped.
   */
  flush (): Promise<void> {
    return this.tail
  }

  close (): void {
    this.closed = true
  }
}
