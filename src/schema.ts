/* JSON-RPC types */

/**
 * Refers to any valid JSON-RPC object that can be decoded off the wire, or encoded to be sent.
 */
export type JSONRPCMessage =
  | JSONRPCRequest
  | JSONRPCNotification
  | JSONRPCResponse
  | JSONRPCError

export const PROTOCOL_VERSION = '2024-11-05'
export const JSONRPC_VERSION = '2.0'

/**
 * A progress token, used to associate progress notifications with the original request.
 */
export type ProgressToken = string | number

/**
 * A uniquely identifying ID for a request in JSON-RPC.
 */
export type RequestId = string | number

export interface RequestParams {
  [key: string]: unknown
}

export interface Result {
  [key: string]: unknown
}

export interface JSONRPCRequest {
  jsonrpc: typeof JSONRPC_VERSION
  id: RequestId
  method: string
  params?: RequestParams
}

export interface JSONRPCNotification {
  jsonrpc: typeof JSONRPC_VERSION
  method: string
  params?: { [key: string]: unknown }
}

export interface JSONRPCResponse {
  jsonrpc: typeof JSONRPC_VERSION
  id: RequestId
  result: Result
}

export interface ErrorObject {
  code: number
  message: string
  data?: { [key: string]: unknown }
}

export interface JSONRPCError {
  jsonrpc: typeof JSONRPC_VERSION
  id: RequestId
  error: ErrorObject
}

// Standard JSON-RPC error codes
export const PARSE_ERROR = -32700
export const INVALID_REQUEST = -32600
export const METHOD_NOT_FOUND = -32601
export const INVALID_PARAMS = -32602
export const INTERNAL_ERROR = -32603

// Server-defined error codes
export const SESSION_NOT_INITIALIZED = -32000
export const REQUEST_CANCELLED = -32001
export const RESOURCE_NOT_FOUND = -32002

/**
 * Requests a client may send to the server.
 */
export const CLIENT_REQUEST_METHODS = [
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/templates/list',
  'resources/read',
  'prompts/list',
  'prompts/get',
  'roots/list',
  'completion/complete',
  'logging/setLevel',
  'shutdown'
] as const

export type ClientRequestMethod = typeof CLIENT_REQUEST_METHODS[number]

/**
 * Requests the server may send to the client.
 */
export const SERVER_REQUEST_METHODS = ['ping', 'roots/list'] as const

/* Lifecycle */

export interface Implementation {
  name: string
  version: string
}

/**
 * Capabilities declared by the client at initialize, e.g. `{ roots: { listChanged: true } }`.
 */
export type ClientCapabilities = { readonly [key: string]: unknown }

export interface ServerCapabilities {
  tools?: { listChanged?: boolean }
  resources?: { subscribe?: boolean, listChanged?: boolean }
  prompts?: { listChanged?: boolean }
  roots?: { listChanged?: boolean }
  completions?: object
  logging?: object
}

export interface InitializeResult extends Result {
  protocolVersion: string
  capabilities: ServerCapabilities
  serverInfo: Implementation
  instructions?: string
}

/* Logging */

export type LoggingLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency'

/* Content */

export interface TextContent {
  type: 'text'
  text: string
}

export interface ImageContent {
  type: 'image'
  data: string
  mimeType: string
}

export interface AudioContent {
  type: 'audio'
  data: string
  mimeType: string
}

export interface TextResourceContents {
  uri: string
  mimeType?: string
  text: string
}

export interface BlobResourceContents {
  uri: string
  mimeType?: string
  blob: string
}

export type ResourceContents = TextResourceContents | BlobResourceContents

export interface EmbeddedResource {
  type: 'resource'
  resource: ResourceContents
}

export type ContentBlock = TextContent | ImageContent | AudioContent | EmbeddedResource

/* Catalog */

export interface ParameterSpec {
  name: string
  type: string
  description?: string
  required: boolean
  default?: unknown
}

export interface CatalogMeta {
  /**
   * Names of the parameters that have a completion provider.
   */
  completions: string[]
}

export interface Tool {
  name: string
  description?: string
  inputSchema: { type: 'object', properties?: { [key: string]: object }, required?: string[] }
  _meta?: CatalogMeta
}

export interface Resource {
  uri: string
  name: string
  description?: string
  mimeType?: string
  _meta?: CatalogMeta
}

export interface ResourceTemplate {
  uriTemplate: string
  name: string
  description?: string
  mimeType?: string
  _meta?: CatalogMeta
}

export interface PromptArgument {
  name: string
  description?: string
  required?: boolean
}

export interface Prompt {
  name: string
  description?: string
  arguments?: PromptArgument[]
  _meta?: CatalogMeta
}

export type Role = 'user' | 'assistant'

export interface PromptMessage {
  role: Role
  content: ContentBlock
}

export interface Root {
  uri: string
  name?: string
}

/* Results */

export interface CallToolResult extends Result {
  content: ContentBlock[]
  isError?: boolean
}

export interface ReadResourceResult extends Result {
  contents: ResourceContents[]
}

export interface GetPromptResult extends Result {
  description?: string
  messages: PromptMessage[]
}

export interface ListToolsResult extends Result {
  tools: Tool[]
}

export interface ListResourcesResult extends Result {
  resources: Resource[]
}

export interface ListResourceTemplatesResult extends Result {
  resourceTemplates: ResourceTemplate[]
}

export interface ListPromptsResult extends Result {
  prompts: Prompt[]
}

export interface ListRootsResult extends Result {
  roots: Root[]
}

export interface CompleteResult extends Result {
  completion: {
    values: string[]
    total?: number
    hasMore?: boolean
  }
}

/* References for completion */

export interface PromptReference {
  type: 'ref/prompt'
  name: string
}

export interface ResourceReference {
  type: 'ref/resource'
  uri: string
}

export interface ToolReference {
  type: 'ref/tool'
  name: string
}

export type CompletionReference = PromptReference | ResourceReference | ToolReference
