import type { TSchema, Static } from '@sinclair/typebox'
import type {
  ClientCapabilities,
  CompletionReference,
  Implementation,
  JSONRPCError,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  RequestId,
  RequestParams,
  Result,
  Root
} from '../schema.ts'
import { PROTOCOL_VERSION, SERVER_REQUEST_METHODS } from '../schema.ts'
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
import { McpError, ProtocolError, TransportError, UnknownMethodError, fromErrorObject } from '../errors.ts'
import { LogMessageParamsSchema, ProgressParamsSchema } from '../validation/schemas.ts'
import { check, validate, formatValidationErrors } from '../validation/validator.ts'
import {
  CallToolResultSchema,
  CompleteResultSchema,
  GetPromptResultSchema,
  InitializeResultSchema,
  ListPromptsResultSchema,
  ListResourcesResultSchema,
  ListResourceTemplatesResultSchema,
  ListToolsResultSchema,
  ReadResourceResultSchema
} from './schemas.ts'
import type {
  CompletionResponse,
  InitializeResponse,
  PromptList,
  PromptResponse,
  ResourceList,
  ResourceReadResponse,
  ResourceTemplateList,
  ToolCallResponse,
  ToolList
} from './schemas.ts'

export type NotificationListener = (notification: JSONRPCNotification) => void

export interface McpClientOptions {
  clientInfo?: Implementation
  /**
   * Receives notifications that cannot be attributed to a pending request.
   */
  onNotification?: NotificationListener
  /**
   * Milliseconds to wait for a response; no limit when unset.
   */
  requestTimeout?: number
}

export interface RequestOptions {
  /**
   * Receives the progress and log notifications the server emits while
   * serving this request.
   */
  onNotification?: NotificationListener
}

interface PendingRequest {
  method: string
  resolve: (result: Result) => void
  reject: (error: Error) => void
  onNotification?: NotificationListener
  timer?: NodeJS.Timeout
}

const CLIENT_METHODS: ReadonlySet<string> = new Set(SERVER_REQUEST_METHODS)

const DEFAULT_CLIENT_INFO: Implementation = { name: 'fastify-mcp-capabilities-client', version: '0.1.0' }

/**
 * Protocol client over any channel.
 *
 * Every request carries its own id as progress token, so notifications emitted
 * while it is served can be routed back to the caller.
 */
export class McpClient {
  private readonly channel: Channel
  private readonly options: McpClientOptions
  private readonly pending = new Map<RequestId, PendingRequest>()
  private nextId = 0
  private declaredRoots: Root[] = []
  private initializeResult?: InitializeResponse
  private reading?: Promise<void>
  private closed = false

  constructor (channel: Channel, options: McpClientOptions = {}) {
    this.channel = channel
    this.options = options
  }

  get serverInfo (): Implementation | undefined {
    return this.initializeResult?.serverInfo
  }

  get serverCapabilities (): Readonly<Record<string, unknown>> | undefined {
    return this.initializeResult?.capabilities
  }

  get instructions (): string | undefined {
    return this.initializeResult?.instructions
  }

  get connected (): boolean {
    return this.initializeResult !== undefined && !this.closed
  }

  get roots (): readonly Root[] {
    return this.declaredRoots
  }

  /**
   * Performs the handshake. Roots declared beforehand are pushed to the server
   * before any other request is sent.
   */
  async connect (): Promise<InitializeResponse> {
    if (this.initializeResult) {
      return this.initializeResult
    }
    this.reading = this.read()

    const capabilities: ClientCapabilities = { roots: { listChanged: true } }
    const result = await this.request('initialize', {
      protocolVersion: PROTOCOL_VERSION,
      capabilities,
      clientInfo: this.options.clientInfo ?? DEFAULT_CLIENT_INFO
    }, InitializeResultSchema)
    this.initializeResult = result

    await this.notify('notifications/initialized')
    if (this.declaredRoots.length > 0) {
      await this.notify('notifications/roots/list_changed', { roots: this.declaredRoots })
    }
    return result
  }

  /**
   * Replaces the roots offered to the server.
   */
  async declareRoots (roots: Root[]): Promise<void> {
    this.declaredRoots = roots.map(root => ({ ...root }))
    if (this.connected) {
      await this.notify('notifications/roots/list_changed', { roots: this.declaredRoots })
    }
  }

  async ping (): Promise<void> {
    await this.rawRequest('ping')
  }

  listTools (): Promise<ToolList> {
    return this.request('tools/list', {}, ListToolsResultSchema)
  }

  callTool (name: string, args: Record<string, unknown> = {}, options?: RequestOptions): Promise<ToolCallResponse> {
    return this.request('tools/call', { name, arguments: args }, CallToolResultSchema, options)
  }

  listResources (): Promise<ResourceList> {
    return this.request('resources/list', {}, ListResourcesResultSchema)
  }

  listResourceTemplates (): Promise<ResourceTemplateList> {
    return this.request('resources/templates/list', {}, ListResourceTemplatesResultSchema)
  }

  readResource (uri: string, options?: RequestOptions): Promise<ResourceReadResponse> {
    return this.request('resources/read', { uri }, ReadResourceResultSchema, options)
  }

  listPrompts (): Promise<PromptList> {
    return this.request('prompts/list', {}, ListPromptsResultSchema)
  }

  getPrompt (name: string, args: Record<string, string> = {}, options?: RequestOptions): Promise<PromptResponse> {
    return this.request('prompts/get', { name, arguments: args }, GetPromptResultSchema, options)
  }

  complete (ref: CompletionReference, argument: { name: string, value: string }, context?: Record<string, string>): Promise<CompletionResponse> {
    const params: RequestParams = { ref, argument }
    if (context !== undefined) {
      params.context = { arguments: context }
    }
    return this.request('completion/complete', params, CompleteResultSchema)
  }

  async setLogLevel (level: string): Promise<void> {
    await this.rawRequest('logging/setLevel', { level })
  }

  /**
   * Sends a cancellation notification for a request in flight.
   */
  async cancel (requestId: RequestId, reason?: string): Promise<void> {
    await this.notify('notifications/cancelled', reason === undefined ? { requestId } : { requestId, reason })
  }

  /**
   * Asks the server to end the session, then closes the channel.
   */
  async shutdown (): Promise<void> {
    await this.rawRequest('shutdown')
    await this.close()
  }

  async close (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await this.channel.close()
    if (this.reading) {
      await this.reading
    }
    this.rejectPending(new TransportError('Client closed'))
  }

  async notify (method: string, params?: { [key: string]: unknown }): Promise<void> {
    await this.channel.send(encode(createNotification(method, params)))
  }

  /**
   * Sends a request and validates its result against `schema`.
   */
  async request<T extends TSchema> (method: string, params: RequestParams, schema: T, options?: RequestOptions): Promise<Static<T>> {
    const result = await this.rawRequest(method, params, options)
    const validated = validate(schema, result)
    if (!validated.success) {
      throw new ProtocolError(`Invalid ${method} result: ${formatValidationErrors(validated.error.errors)}`)
    }
    return validated.data
  }

  /**
   * The id the next request will be sent with.
   */
  peekNextId (): number {
    return this.nextId + 1
  }

  rawRequest (method: string, params: RequestParams = {}, options: RequestOptions = {}): Promise<Result> {
    if (this.closed) {
      return Promise.reject(new TransportError('Client closed'))
    }

    const id = ++this.nextId
    const meta = typeof params._meta === 'object' && params._meta !== null ? params._meta : {}
    const request = createRequest(id, method, { ...params, _meta: { ...meta, progressToken: id } })

    return new Promise<Result>((resolve, reject) => {
      const entry: PendingRequest = { method, resolve, reject, onNotification: options.onNotification }
      const timeout = this.options.requestTimeout
      if (timeout !== undefined) {
        entry.timer = setTimeout(() => {
          this.pending.delete(id)
          reject(new TransportError(`Request ${method} timed out after ${timeout}ms`))
        }, timeout)
        entry.timer.unref()
      }
      this.pending.set(id, entry)

      this.channel.send(encode(request)).catch((error: unknown) => {
        this.settle(id)
        reject(error instanceof McpError ? error : new TransportError(`Failed to send ${method}`, { cause: error }))
      })
    })
  }

  private settle (id: RequestId): PendingRequest | undefined {
    const entry = this.pending.get(id)
    if (entry) {
      clearTimeout(entry.timer)
      this.pending.delete(id)
    }
    return entry
  }

  private rejectPending (error: Error): void {
    for (const id of [...this.pending.keys()]) {
      this.settle(id)?.reject(error)
    }
  }

  private async read (): Promise<void> {
    try {
      for await (const frame of this.channel.receive()) {
        this.handleFrame(frame)
      }
      this.rejectPending(new TransportError('Connection closed'))
    } catch (error) {
      this.rejectPending(new TransportError('Connection failed', { cause: error }))
    }
  }

  private handleFrame (frame: string): void {
    const decoded = decode(frame, { requestMethods: CLIENT_METHODS })
    if (!decoded.success) {
      const { error } = decoded
      if (error instanceof UnknownMethodError && error.id !== undefined) {
        this.reply(createErrorResponse(error.id, error.toErrorObject()))
      }
      return
    }

    const message = decoded.message
    if (isRequest(message)) {
      this.answer(message)
    } else if (isNotification(message)) {
      this.route(message)
    } else {
      this.resolve(message)
    }
  }

  private reply (message: JSONRPCResponse | JSONRPCError): void {
    this.channel.send(encode(message)).catch(() => {
      this.rejectPending(new TransportError('Connection lost while answering the server'))
    })
  }

  private answer (request: JSONRPCRequest): void {
    if (request.method === 'roots/list') {
      this.reply(createResponse(request.id, { roots: this.declaredRoots }))
    } else {
      this.reply(createResponse(request.id, {}))
    }
  }

  private route (notification: JSONRPCNotification): void {
    let owner: RequestId | undefined
    if (notification.method === 'notifications/progress' && check(ProgressParamsSchema, notification.params)) {
      owner = notification.params.progressToken
    } else if (notification.method === 'notifications/message' && check(LogMessageParamsSchema, notification.params)) {
      owner = notification.params._meta?.requestId
    }

    const listener = owner === undefined ? undefined : this.pending.get(owner)?.onNotification
    if (listener) {
      listener(notification)
    } else {
      this.options.onNotification?.(notification)
    }
  }

  private resolve (message: JSONRPCResponse | JSONRPCError): void {
    const entry = this.settle(message.id)
    if (entry === undefined) {
      return
    }
    if (isErrorResponse(message)) {
      entry.reject(fromErrorObject(message.error))
    } else {
      entry.resolve(message.result)
    }
  }
}
