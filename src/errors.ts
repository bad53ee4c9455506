import type { ErrorObject, RequestId } from './schema.ts'
import {
  INTERNAL_ERROR,
  INVALID_PARAMS,
  INVALID_REQUEST,
  METHOD_NOT_FOUND,
  REQUEST_CANCELLED,
  RESOURCE_NOT_FOUND,
  SESSION_NOT_INITIALIZED
} from './schema.ts'

export type ErrorKind =
  | 'ProtocolError'
  | 'InvalidParams'
  | 'NotFound'
  | 'ToolError'
  | 'ResourceError'
  | 'PromptError'
  | 'Cancelled'
  | 'TransportError'
  | 'RegistrationError'
  | 'InternalError'

/**
 * Base class of every error the protocol core reports.
 *
 * `kind` names the failure category and travels to the client inside the
 * JSON-RPC error `data`, next to the numeric `code`.
 */
export class McpError extends Error {
  readonly kind: ErrorKind
  readonly code: number
  readonly data?: { [key: string]: unknown }

  constructor (kind: ErrorKind, code: number, message: string, data?: { [key: string]: unknown }, options?: ErrorOptions) {
    super(message, options)
    this.name = kind
    this.kind = kind
    this.code = code
    this.data = data
  }

  toErrorObject (): ErrorObject {
    return {
      code: this.code,
      message: this.message,
      data: { ...this.data, kind: this.kind }
    }
  }
}

export class ProtocolError extends McpError {
  constructor (message: string, code: number = INVALID_REQUEST, data?: { [key: string]: unknown }) {
    super('ProtocolError', code, message, data)
  }
}

/**
 * A frame that could not be turned into a message. `id` is set when the
 * request id could still be read from the frame.
 */
export class DecodeError extends ProtocolError {
  readonly id?: RequestId

  constructor (message: string, code: number, id?: RequestId) {
    super(message, code)
    this.id = id
  }
}

export class UnknownMethodError extends DecodeError {
  readonly method: string

  constructor (method: string, id?: RequestId) {
    super(`Method not found: ${method}`, METHOD_NOT_FOUND, id)
    this.method = method
  }
}

export class OutOfOrderError extends ProtocolError {
  constructor (method: string) {
    super(`Session not initialized: ${method} received before initialize`, SESSION_NOT_INITIALIZED, { method })
  }
}

export class InvalidParamsError extends McpError {
  constructor (message: string, data?: { [key: string]: unknown }) {
    super('InvalidParams', INVALID_PARAMS, message, data)
  }
}

export class NotFoundError extends McpError {
  constructor (message: string, code: number = INVALID_PARAMS) {
    super('NotFound', code, message)
  }
}

export class ResourceNotFoundError extends NotFoundError {
  constructor (uri: string) {
    super(`Resource not found: ${uri}`, RESOURCE_NOT_FOUND)
  }
}

export class ToolError extends McpError {
  constructor (message: string, options?: ErrorOptions) {
    super('ToolError', INTERNAL_ERROR, message, undefined, options)
  }
}

export class ResourceError extends McpError {
  constructor (message: string, options?: ErrorOptions) {
    super('ResourceError', INTERNAL_ERROR, message, undefined, options)
  }
}

export class PromptError extends McpError {
  constructor (message: string, options?: ErrorOptions) {
    super('PromptError', INTERNAL_ERROR, message, undefined, options)
  }
}

export class CancelledError extends McpError {
  constructor (message = 'Request cancelled', reason?: string) {
    super('Cancelled', REQUEST_CANCELLED, message, reason === undefined ? undefined : { reason })
  }
}

export class TransportError extends McpError {
  constructor (message: string, options?: ErrorOptions) {
    super('TransportError', INTERNAL_ERROR, message, undefined, options)
  }
}

/**
 * Thrown at registration time, never sent over the wire.
 */
export class RegistrationError extends McpError {
  constructor (message: string) {
    super('RegistrationError', INTERNAL_ERROR, message)
  }
}

export class InternalError extends McpError {
  constructor (message: string, options?: ErrorOptions) {
    super('InternalError', INTERNAL_ERROR, message, undefined, options)
  }
}

export function errorMessage (error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

const KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'ProtocolError',
  'InvalidParams',
  'NotFound',
  'ToolError',
  'ResourceError',
  'PromptError',
  'Cancelled',
  'TransportError',
  'RegistrationError',
  'InternalError'
])

function isErrorKind (kind: unknown): kind is ErrorKind {
  return typeof kind === 'string' && KINDS.has(kind)
}

/**
 * Rebuilds an error from its wire form, as received by a client.
 */
export function fromErrorObject (error: ErrorObject): McpError {
  const { kind, ...rest } = error.data ?? {}
  const data = Object.keys(rest).length > 0 ? rest : undefined
  const resolved = isErrorKind(kind) ? kind : 'ProtocolError'

  switch (resolved) {
    case 'ProtocolError':
      return new ProtocolError(error.message, error.code, data)
    case 'InvalidParams':
      return new InvalidParamsError(error.message, data)
    case 'NotFound':
      return new NotFoundError(error.message, error.code)
    case 'ToolError':
      return new ToolError(error.message)
    case 'ResourceError':
      return new ResourceError(error.message)
    case 'PromptError':
      return new PromptError(error.message)
    case 'Cancelled':
      return new CancelledError(error.message, typeof rest.reason === 'string' ? rest.reason : undefined)
    case 'TransportError':
      return new TransportError(error.message)
    default:
      return new McpError(resolved, error.code, error.message, data)
  }
}
