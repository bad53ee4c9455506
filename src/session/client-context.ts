import type { JSONRPCNotification, LoggingLevel, ProgressToken, RequestId, Root } from '../schema.ts'
import type { ClientContext } from '../types.ts'
import type { LoggingService } from '../features/logging.ts'
import { CancelledError } from '../errors.ts'
import { createNotification } from '../codec.ts'

export interface RequestClientContextOptions {
  requestId: RequestId
  progressToken?: ProgressToken
  controller: AbortController
  roots: () => readonly Root[]
  logging: LoggingService
  emit: (notification: JSONRPCNotification) => void
}

/**
 * ClientContext of one in-flight request. Notifications go straight to the
 * session's outbound queue, ahead of the response queued after the handler
 * returns. Once `complete()` is called, progress and log emit nothing.
 */
export class RequestClientContext implements ClientContext {
  readonly requestId: RequestId
  private readonly progressToken?: ProgressToken
  private readonly controller: AbortController
  private readonly currentRoots: () => readonly Root[]
  private readonly logging: LoggingService
  private readonly emit: (notification: JSONRPCNotification) => void
  private completed = false

  constructor (options: RequestClientContextOptions) {
    this.requestId = options.requestId
    this.progressToken = options.progressToken
    this.controller = options.controller
    this.currentRoots = options.roots
    this.logging = options.logging
    this.emit = options.emit
  }

  get roots (): readonly Root[] {
    return this.currentRoots()
  }

  get signal (): AbortSignal {
    return this.controller.signal
  }

  /**
   * Marks the request as answered.
   */
  complete (): void {
    this.completed = true
  }

  get cancelled (): boolean {
    return this.controller.signal.aborted
  }

  throwIfCancelled (): void {
    if (this.cancelled) {
      const reason: unknown = this.controller.signal.reason
      throw reason instanceof CancelledError ? reason : new CancelledError()
    }
  }

  /**
   * Reports progress when the client asked for it with a progress token.
   */
  progress (progress: number, total?: number, message?: string): void {
    this.throwIfCancelled()
    if (this.completed || this.progressToken === undefined) {
      return
    }

    const params: { [key: string]: unknown } = { progressToken: this.progressToken, progress }
    if (total !== undefined) {
      params.total = total
    }
    if (message !== undefined) {
      params.message = message
    }
    this.emit(createNotification('notifications/progress', params))
  }

  log (level: LoggingLevel, data: unknown, logger?: string): void {
    this.throwIfCancelled()
    if (this.completed) {
      return
    }
    this.logging.log(level, data, logger, this.requestId)
  }
}
