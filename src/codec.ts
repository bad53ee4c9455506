import { TypeCompiler } from '@sinclair/typebox/compiler'
import type {
  ErrorObject,
  JSONRPCError,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  RequestId,
  RequestParams,
  Result
} from './schema.ts'
import {
  CLIENT_REQUEST_METHODS,
  INVALID_REQUEST,
  JSONRPC_VERSION,
  PARSE_ERROR
} from './schema.ts'
import {
  JSONRPCErrorSchema,
  JSONRPCNotificationSchema,
  JSONRPCRequestSchema,
  JSONRPCResponseSchema
} from './validation/schemas.ts'
import { DecodeError, UnknownMethodError } from './errors.ts'

const RequestCheck = TypeCompiler.Compile(JSONRPCRequestSchema)
const NotificationCheck = TypeCompiler.Compile(JSONRPCNotificationSchema)
const ResponseCheck = TypeCompiler.Compile(JSONRPCResponseSchema)
const ErrorCheck = TypeCompiler.Compile(JSONRPCErrorSchema)

export type DecodeResult = {
  success: true
  message: JSONRPCMessage
} | {
  success: false
  error: DecodeError
}

export interface DecodeOptions {
  /**
   * Request methods accepted by the receiver. Defaults to the methods a server answers.
   */
  requestMethods?: ReadonlySet<string>
}

const SERVER_METHODS: ReadonlySet<string> = new Set(CLIENT_REQUEST_METHODS)

export function isRequest (message: JSONRPCMessage): message is JSONRPCRequest {
  return 'method' in message && 'id' in message
}

export function isNotification (message: JSONRPCMessage): message is JSONRPCNotification {
  return 'method' in message && !('id' in message)
}

export function isResponse (message: JSONRPCMessage): message is JSONRPCResponse {
  return 'result' in message
}

export function isErrorResponse (message: JSONRPCMessage): message is JSONRPCError {
  return 'error' in message
}

/**
 * Serialize a message to a single JSON text frame.
 */
export function encode (message: JSONRPCMessage): string {
  return JSON.stringify({ ...message, jsonrpc: JSONRPC_VERSION })
}

function recoverId (value: { [key: string]: unknown }): RequestId | undefined {
  const id = value.id
  if (typeof id === 'string' || (typeof id === 'number' && Number.isInteger(id))) {
    return id
  }
  return undefined
}

function isObject (value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse one frame into a message.
 *
 * Never throws: failures come back as a DecodeError carrying the request id
 * when one could be read from the frame.
 */
export function decode (frame: string | Buffer, options: DecodeOptions = {}): DecodeResult {
  const text = typeof frame === 'string' ? frame : frame.toString('utf8')

  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    return { success: false, error: new DecodeError(`Parse error: ${error instanceof Error ? error.message : String(error)}`, PARSE_ERROR) }
  }

  if (Array.isArray(value)) {
    return { success: false, error: new DecodeError('Batch requests are not supported', INVALID_REQUEST) }
  }
  if (!isObject(value)) {
    return { success: false, error: new DecodeError('Invalid request: expected a JSON object', INVALID_REQUEST) }
  }

  const id = recoverId(value)
  if (value.jsonrpc !== undefined && value.jsonrpc !== JSONRPC_VERSION) {
    return { success: false, error: new DecodeError(`Invalid request: unsupported jsonrpc version ${String(value.jsonrpc)}`, INVALID_REQUEST, id) }
  }

  if ('method' in value) {
    if ('id' in value) {
      if (!RequestCheck.Check(value)) {
        return { success: false, error: new DecodeError('Invalid request: malformed request', INVALID_REQUEST, id) }
      }
      const methods = options.requestMethods ?? SERVER_METHODS
      if (!methods.has(value.method)) {
        return { success: false, error: new UnknownMethodError(value.method, value.id) }
      }
      const request: JSONRPCRequest = { jsonrpc: JSONRPC_VERSION, id: value.id, method: value.method }
      if (value.params !== undefined) {
        request.params = value.params
      }
      return { success: true, message: request }
    }

    if (!NotificationCheck.Check(value)) {
      return { success: false, error: new DecodeError('Invalid request: malformed notification', INVALID_REQUEST) }
    }
    const notification: JSONRPCNotification = { jsonrpc: JSONRPC_VERSION, method: value.method }
    if (value.params !== undefined) {
      notification.params = value.params
    }
    return { success: true, message: notification }
  }

  if (ResponseCheck.Check(value)) {
    return { success: true, message: { jsonrpc: JSONRPC_VERSION, id: value.id, result: value.result } }
  }
  if (ErrorCheck.Check(value)) {
    return { success: true, message: { jsonrpc: JSONRPC_VERSION, id: value.id, error: value.error } }
  }

  return { success: false, error: new DecodeError('Invalid request: unknown message shape', INVALID_REQUEST, id) }
}

export function createRequest (id: RequestId, method: string, params?: RequestParams): JSONRPCRequest {
  const request: JSONRPCRequest = { jsonrpc: JSONRPC_VERSION, id, method }
  if (params !== undefined) {
    request.params = params
  }
  return request
}

export function createNotification (method: string, params?: { [key: string]: unknown }): JSONRPCNotification {
  const notification: JSONRPCNotification = { jsonrpc: JSONRPC_VERSION, method }
  if (params !== undefined) {
    notification.params = params
  }
  return notification
}

export function createResponse (id: RequestId, result: Result): JSONRPCResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    result
  }
}

export function createErrorResponse (id: RequestId, error: ErrorObject): JSONRPCError {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error
  }
}
