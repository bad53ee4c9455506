import type { FastifyBaseLogger } from 'fastify'
import type {
  ClientCapabilities,
  Implementation,
  InitializeResult,
  JSONRPCError,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  LoggingLevel,
  RequestId,
  RequestParams,
  Result,
  Root,
  ServerCapabilities
} from '../schema.ts'
import { PROTOCOL_VERSION } from '../schema.ts'
import type { HandlerContext, HandlerServices } from '../types.ts'
import type { Registry } from '../registry.ts'
import type { Channel } from '../transports/transport.ts'
import {
  createErrorResponse,
  createNotification,
  createRequest,
  createResponse,
  decode,
  encode,
  isErrorResponse,
  isNotification,
  isRequest
} from '../codec.ts'
import {
  CancelledError,
  InternalError,
  InvalidParamsError,
  McpError,
  OutOfOrderError,
  ProtocolError,
  TransportError,
  errorMessage,
  fromErrorObject
} from '../errors.ts'
import {
  CancelledParamsSchema,
  InitializeParamsSchema,
  RootsListSchema
} from '../validation/schemas.ts'
import { check, transform, formatValidationErrors } from '../validation/validator.ts'
import { handleRequest } from '../handlers.ts'
import { CompletionService, DEFAULT_MAX_COMPLETION_VALUES } from '../features/completion.ts'
import { LoggingService } from '../features/logging.ts'
import { OutboundQueue } from './outbound-queue.ts'
import { RequestClientContext } from './client-context.ts'

export type SessionState = 'handshaking' | 'active' | 'closing' | 'closed'

export interface SessionOptions {
  registry: Registry
  logger: FastifyBaseLogger
  serverInfo: Implementation
  instructions?: string
  services?: HandlerServices
  /**
   * Timeout of requests sent to the client, in milliseconds.
   */
  requestTimeout?: number
  maxCompletionValues?: number
  defaultLogLevel?: LoggingLevel
}

interface OutgoingRequest {
  method: string
  resolve: (result: Result) => void
  reject: (error: Error) => void
  timer: NodeJS.Timeout
}

const DEFAULT_REQUEST_TIMEOUT = 30_000

function readProgressToken (params: RequestParams | undefined): string | number | undefined {
  const meta = params?._meta
  if (typeof meta === 'object' && meta !== null && 'progressToken' in meta) {
    const token = meta.progressToken
    if (typeof token === 'string' || typeof token === 'number') {
      return token
    }
  }
  return undefined
}

/**
 * The protocol state machine of one client connection.
 *
 * Frames are read from the channel in a loop that never waits on a handler:
 * each request runs on its own and its response, like every notification, goes
 * through a single outbound queue.
 */
export class Session {
  readonly id: string
  private currentState: SessionState = 'handshaking'
  private capabilities?: ClientCapabilities
  private info?: Implementation
  private rootsSnapshot: readonly Root[] = Object.freeze([])

  private readonly channel: Channel
  private readonly registry: Registry
  private readonly log: FastifyBaseLogger
  private readonly options: SessionOptions
  private readonly outbound: OutboundQueue
  private readonly completion: CompletionService
  readonly logging: LoggingService

  private readonly pending = new Map<RequestId, AbortController>()
  private readonly inflight = new Set<Promise<void>>()
  private readonly outgoing = new Map<RequestId, OutgoingRequest>()
  private nextRequestId = 0
  private running?: Promise<void>
  private closing?: Promise<void>

  constructor (channel: Channel, options: SessionOptions) {
    this.id = channel.id
    this.channel = channel
    this.options = options
    this.registry = options.registry
    this.log = options.logger
    this.outbound = new OutboundQueue(
      frame => this.channel.send(frame),
      error => {
        this.log.warn({ err: error }, 'transport write failed, closing session')
        this.close().catch((closeError: unknown) => {
          this.log.error({ err: closeError }, 'error while closing session')
        })
      }
    )
    this.completion = new CompletionService(this.registry, options.maxCompletionValues ?? DEFAULT_MAX_COMPLETION_VALUES)
    this.logging = new LoggingService(notification => this.send(notification), options.defaultLogLevel)
  }

  get state (): SessionState {
    return this.currentState
  }

  get clientCapabilities (): ClientCapabilities | undefined {
    return this.capabilities
  }

  get clientInfo (): Implementation | undefined {
    return this.info
  }

  get roots (): readonly Root[] {
    return this.rootsSnapshot
  }

  get pendingRequests (): number {
    return this.pending.size
  }

  /**
   * Replaces the root set as a whole; readers keep the snapshot they already hold.
   */
  setRoots (roots: readonly Root[]): void {
    this.rootsSnapshot = Object.freeze(roots.map(root => Object.freeze({ ...root })))
    this.log.debug({ roots: this.rootsSnapshot.length }, 'roots replaced')
  }

  /**
   * Starts reading frames. The returned promise settles when the session is closed.
   */
  start (): Promise<void> {
    if (this.running === undefined) {
      this.running = this.run()
    }
    return this.running
  }

  private async run (): Promise<void> {
    try {
      for await (const frame of this.channel.receive()) {
        if (this.currentState === 'closing' || this.currentState === 'closed') {
          break
        }
        this.handleFrame(frame)
      }
      this.log.debug('transport disconnected')
    } catch (error) {
      this.log.warn({ err: error }, 'transport receive failed')
    }
    await this.close()
  }

  /**
   * Resolves once every invocation started so far has finished.
   */
  async settled (): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight])
    }
    await this.outbound.flush()
  }

  /**
   * Ends the session: pending invocations are cancelled, requests sent to the
   * client are rejected, queued frames are flushed and the channel is closed.
   */
  close (): Promise<void> {
    if (this.closing === undefined) {
      this.closing = this.shutdown()
    }
    return this.closing
  }

  private async shutdown (): Promise<void> {
    this.currentState = 'closing'

    for (const controller of this.pending.values()) {
      controller.abort(new CancelledError('Session closed'))
    }
    for (const [id, request] of this.outgoing) {
      clearTimeout(request.timer)
      request.reject(new TransportError(`Session closed before ${request.method} completed`))
      this.outgoing.delete(id)
    }

    this.outbound.close()
    await this.outbound.flush()

    try {
      await this.channel.close()
    } catch (error) {
      this.log.debug({ err: error }, 'error closing channel')
    }

    this.currentState = 'closed'
    this.log.debug('session closed')
  }

  send (message: JSONRPCMessage): boolean {
    return this.outbound.push(encode(message))
  }

  notify (method: string, params?: { [key: string]: unknown }): boolean {
    return this.send(createNotification(method, params))
  }

  /**
   * Sends a request to the client and waits for its response.
   */
  request (method: string, params?: RequestParams): Promise<Result> {
    if (this.currentState === 'closing' || this.currentState === 'closed') {
      return Promise.reject(new TransportError('Session closed'))
    }

    const id = ++this.nextRequestId
    const timeout = this.options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT
    return new Promise<Result>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.outgoing.delete(id)
        reject(new TransportError(`Request ${method} timed out after ${timeout}ms`))
      }, timeout)
      timer.unref()
      this.outgoing.set(id, { method, resolve, reject, timer })
      this.send(createRequest(id, method, params))
    })
  }

  private handleFrame (frame: string): void {
    const decoded = decode(frame)
    if (!decoded.success) {
      const { error } = decoded
      if (error.id !== undefined) {
        this.send(createErrorResponse(error.id, error.toErrorObject()))
      } else {
        this.log.warn({ err: error }, 'dropping undecodable frame')
      }
      return
    }

    const message = decoded.message
    if (isRequest(message)) {
      this.dispatch(message)
    } else if (isNotification(message)) {
      this.handleNotification(message)
    } else {
      this.handleResponse(message)
    }
  }

  private reject (id: RequestId, error: McpError): void {
    this.send(createErrorResponse(id, error.toErrorObject()))
  }

  private dispatch (request: JSONRPCRequest): void {
    if (request.method === 'initialize') {
      this.initialize(request)
      return
    }

    if (this.currentState === 'handshaking' && request.method !== 'ping') {
      this.log.debug({ method: request.method }, 'request received before initialize')
      this.reject(request.id, new OutOfOrderError(request.method))
      return
    }

    if (this.pending.has(request.id)) {
      this.reject(request.id, new ProtocolError(`Duplicate request id: ${request.id}`))
      return
    }

    const controller = new AbortController()
    this.pending.set(request.id, controller)

    const task: Promise<void> = this.execute(request, controller)
      .catch((error: unknown) => {
        this.log.error({ err: error, method: request.method }, 'request failed')
      })
      .finally(() => {
        this.pending.delete(request.id)
        this.inflight.delete(task)
      })
    this.inflight.add(task)
  }

  private initialize (request: JSONRPCRequest): void {
    if (this.currentState !== 'handshaking') {
      this.reject(request.id, new ProtocolError('Session already initialized'))
      return
    }

    const params = transform(InitializeParamsSchema, request.params ?? {})
    if (!params.success) {
      this.reject(request.id, new InvalidParamsError(`Invalid initialize params: ${formatValidationErrors(params.error.errors)}`))
      return
    }

    this.capabilities = Object.freeze({ ...params.data.capabilities })
    this.info = params.data.clientInfo
    this.currentState = 'active'
    this.log.info({ clientInfo: this.info, protocolVersion: params.data.protocolVersion }, 'session initialized')

    const capabilities: ServerCapabilities = {
      roots: { listChanged: true },
      completions: {},
      logging: {}
    }
    if (this.registry.hasTools) {
      capabilities.tools = { listChanged: false }
    }
    if (this.registry.hasResources) {
      capabilities.resources = { subscribe: false, listChanged: false }
    }
    if (this.registry.hasPrompts) {
      capabilities.prompts = { listChanged: false }
    }

    const result: InitializeResult = {
      protocolVersion: PROTOCOL_VERSION,
      capabilities,
      serverInfo: this.options.serverInfo
    }
    if (this.options.instructions !== undefined) {
      result.instructions = this.options.instructions
    }
    this.send(createResponse(request.id, result))
  }

  private async execute (request: JSONRPCRequest, controller: AbortController): Promise<void> {
    const progressToken = readProgressToken(request.params)
    const client = new RequestClientContext({
      requestId: request.id,
      progressToken,
      controller,
      roots: () => this.rootsSnapshot,
      logging: this.logging,
      emit: notification => this.send(notification)
    })
    const context: HandlerContext = {
      sessionId: this.id,
      requestId: request.id,
      client,
      services: this.options.services ?? {},
      log: this.log.child({ requestId: request.id, method: request.method })
    }

    try {
      const result = await handleRequest(request, {
        registry: this.registry,
        completion: this.completion,
        logging: this.logging,
        roots: () => this.rootsSnapshot,
        context
      })
      client.complete()
      client.throwIfCancelled()
      this.send(createResponse(request.id, result))
    } catch (error) {
      client.complete()
      let reported: McpError
      if (error instanceof McpError) {
        reported = error
      } else {
        context.log.error({ err: error }, 'unexpected error while handling request')
        reported = new InternalError(errorMessage(error))
      }
      this.reject(request.id, reported)
    }

    if (request.method === 'shutdown') {
      this.log.info('shutdown requested')
      await this.close()
    }
  }

  private handleNotification (notification: JSONRPCNotification): void {
    if (this.currentState === 'handshaking') {
      this.log.debug({ method: notification.method }, 'dropping notification received before initialize')
      return
    }

    switch (notification.method) {
      case 'notifications/initialized':
        this.log.debug('client initialized')
        if (this.capabilities?.roots !== undefined) {
          this.refreshRoots()
        }
        break

      case 'notifications/cancelled': {
        if (!check(CancelledParamsSchema, notification.params)) {
          this.log.warn({ params: notification.params }, 'invalid cancellation notification')
          break
        }
        const { requestId, reason } = notification.params
        const controller = this.pending.get(requestId)
        if (controller) {
          this.log.debug({ requestId, reason }, 'cancelling request')
          controller.abort(new CancelledError('Request cancelled', reason))
        } else {
          this.log.debug({ requestId }, 'cancellation for unknown or finished request')
        }
        break
      }

      case 'notifications/roots/list_changed':
        if (check(RootsListSchema, notification.params)) {
          this.setRoots(notification.params.roots)
        } else if (this.capabilities?.roots !== undefined) {
          this.refreshRoots()
        } else {
          this.log.warn('roots changed but the client did not declare roots support')
        }
        break

      default:
        this.log.debug({ method: notification.method }, 'ignoring notification')
    }
  }

  /**
   * Asks the client for its roots and replaces the root set with the answer.
   */
  private refreshRoots (): void {
    const task: Promise<void> = this.request('roots/list')
      .then(result => {
        if (check(RootsListSchema, result)) {
          this.setRoots(result.roots)
        } else {
          this.log.warn('invalid roots/list result from client')
        }
      })
      .catch((error: unknown) => {
        this.log.warn({ err: error }, 'roots/list request failed')
      })
      .finally(() => {
        this.inflight.delete(task)
      })
    this.inflight.add(task)
  }

  private handleResponse (message: JSONRPCResponse | JSONRPCError): void {
    const request = this.outgoing.get(message.id)
    if (request === undefined) {
      this.log.debug({ id: message.id }, 'dropping response to unknown request')
      return
    }
    clearTimeout(request.timer)
    this.outgoing.delete(message.id)
    if (isErrorResponse(message)) {
      request.reject(fromErrorObject(message.error))
    } else {
      request.resolve(message.result)
    }
  }
}
