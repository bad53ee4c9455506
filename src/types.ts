import type { FastifyBaseLogger } from 'fastify'
import type { Static, TObject } from '@sinclair/typebox'
import type {
  Implementation,
  LoggingLevel,
  RequestId,
  Root
} from './schema.ts'
import type { ContentValue, PromptValue } from './features/content.ts'
import type { Registry } from './registry.ts'
import type { Session } from './session/session.ts'
import type { Channel } from './transports/transport.ts'

/**
 * Handles a handler may use besides its arguments, e.g. a database pool.
 *
 * Extend it through declaration merging:
 *
 * ```ts
 * declare module 'fastify-mcp-capabilities' {
 *   interface HandlerServices { db: Pool }
 * }
 * ```
 */
export interface HandlerServices {}

/**
 * The per-invocation view of the calling client.
 *
 * `progress` and `log` send notifications tagged with the originating request
 * and throw a CancelledError once the request has been cancelled.
 */
export interface ClientContext {
  readonly requestId: RequestId
  readonly roots: readonly Root[]
  readonly signal: AbortSignal
  readonly cancelled: boolean
  progress (progress: number, total?: number, message?: string): void
  log (level: LoggingLevel, data: unknown, logger?: string): void
  throwIfCancelled (): void
}

export interface HandlerContext {
  sessionId: string
  requestId: RequestId
  client: ClientContext
  services: HandlerServices
  log: FastifyBaseLogger
}

export interface CompletionContext {
  /**
   * Name of the parameter being completed.
   */
  argument: string
  /**
   * Values already chosen for the other parameters.
   */
  arguments: Record<string, string>
}

/**
 * Suggests values for one parameter from what has been typed so far.
 */
export type CompletionProvider = (
  value: string,
  context: CompletionContext
) => Promise<string[]> | string[]

export type Completions = Record<string, CompletionProvider>

export type Awaitable<T> = T | Promise<T>

export interface ToolDefinition<TInput extends TObject = TObject> {
  name: string
  description?: string
  inputSchema: TInput
  completions?: Completions
  /**
   * Reject undeclared arguments instead of dropping them.
   */
  strict?: boolean
}

export type ToolHandler<TInput extends TObject = TObject> = (
  args: Static<TInput>,
  context: HandlerContext
) => Awaitable<ContentValue>

interface ResourceDefinitionBase {
  name: string
  description?: string
  mimeType?: string
  completions?: Completions
}

export interface DirectResourceDefinition extends ResourceDefinitionBase {
  uri: string
  uriTemplate?: never
}

export interface TemplateResourceDefinition extends ResourceDefinitionBase {
  uriTemplate: string
  uri?: never
}

export type ResourceDefinition = DirectResourceDefinition | TemplateResourceDefinition

export type ResourceHandler = (
  uri: string,
  params: Record<string, string>,
  context: HandlerContext
) => Awaitable<ContentValue>

export interface PromptDefinition<TArgs extends TObject = TObject> {
  name: string
  description?: string
  argumentSchema: TArgs
  completions?: Completions
  strict?: boolean
}

export type PromptHandler<TArgs extends TObject = TObject> = (
  name: string,
  args: Static<TArgs>,
  context: HandlerContext
) => Awaitable<PromptValue>

export interface MCPPluginOptions {
  serverInfo?: Implementation
  instructions?: string
  /**
   * Mount point of the SSE routes, `/mcp` by default.
   */
  path?: string
  enableSSE?: boolean
  heartbeatInterval?: number
  requestTimeout?: number
  maxCompletionValues?: number
  defaultLogLevel?: LoggingLevel
  registry?: Registry
  services?: HandlerServices
}

export interface ConnectOptions {
  logger?: FastifyBaseLogger
}

declare module 'fastify' {
  interface FastifyInstance {
    mcpRegistry: Registry
    mcpAddTool<TInput extends TObject>(definition: ToolDefinition<TInput>, handler: ToolHandler<TInput>): void
    mcpAddResource(definition: ResourceDefinition, handler: ResourceHandler): void
    mcpAddPrompt<TArgs extends TObject>(definition: PromptDefinition<TArgs>, handler: PromptHandler<TArgs>): void
    mcpSessions: ReadonlyMap<string, Session>
    mcpConnect(channel: Channel, options?: ConnectOptions): Session
  }
}
