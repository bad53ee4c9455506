import type { JSONRPCNotification, LoggingLevel, RequestId } from '../schema.ts'
import { createNotification } from '../codec.ts'

/**
 * RFC 5424 Syslog severity levels in order of increasing severity.
 * Used for log level comparison.
 */
const LOG_LEVEL_HIERARCHY: Record<LoggingLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7
}

/**
 * Logging service of one session.
 *
 * Implements the MCP logging capability: structured log messages are sent to
 * the client as `notifications/message`, filtered by the level the client set
 * with `logging/setLevel`.
 */
export class LoggingService {
  private minLevel: LoggingLevel
  private readonly emit: (notification: JSONRPCNotification) => void

  constructor (emit: (notification: JSONRPCNotification) => void, minLevel: LoggingLevel = 'error') {
    this.emit = emit
    this.minLevel = minLevel
  }

  /**
   * Sets the minimum log level. Messages below this level will be filtered.
   */
  setLevel (level: LoggingLevel): void {
    this.minLevel = level
  }

  getLevel (): LoggingLevel {
    return this.minLevel
  }

  /**
   * Logs a message at the specified level.
   *
   * @param requestId - Request the message belongs to, when emitted by a handler
   * @returns Whether the message passed the level filter
   */
  log (level: LoggingLevel, data: unknown, logger?: string, requestId?: RequestId): boolean {
    if (!this.shouldLog(level)) {
      return false
    }

    const params: { [key: string]: unknown } = { level, data }
    if (logger !== undefined) {
      params.logger = logger
    }
    if (requestId !== undefined) {
      params._meta = { requestId }
    }

    this.emit(createNotification('notifications/message', params))
    return true
  }

  /**
   * Determines if a message at the given level should be logged
   * based on the current minimum level setting.
   */
  shouldLog (level: LoggingLevel): boolean {
    return LOG_LEVEL_HIERARCHY[level] >= LOG_LEVEL_HIERARCHY[this.minLevel]
  }
}
