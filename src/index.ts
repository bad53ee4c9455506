import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import type { MCPPluginOptions } from './types.ts'
import { resolveConfig } from './config.ts'
import { Registry } from './registry.ts'
import { MemoryMessageBroker } from './brokers/memory-message-broker.ts'
import metaDecorators from './decorators/meta.ts'
import sessionDecorators from './decorators/sessions.ts'
import sseRoutes from './routes/mcp.ts'

const mcpPlugin = fp(async function (app: FastifyInstance, opts: MCPPluginOptions) {
  const config = resolveConfig(opts)
  const registry = opts.registry ?? new Registry()

  await app.register(metaDecorators, { registry })
  await app.register(sessionDecorators, {
    config,
    registry,
    services: opts.services ?? {}
  })

  if (config.enableSSE) {
    const broker = new MemoryMessageBroker()

    await app.register(sseRoutes, {
      prefix: config.path,
      broker,
      heartbeatInterval: config.heartbeatInterval,
      connect: channel => app.mcpConnect(channel)
    })

    app.addHook('onClose', async () => {
      await broker.close()
    })
  }

  app.log.debug({ path: config.path, enableSSE: config.enableSSE }, 'MCP plugin registered')
}, {
  fastify: '5.x',
  name: 'fastify-mcp-capabilities'
})

// Export the plugin as both default and named export
export default mcpPlugin
export { mcpPlugin }

export { resolveConfig, PluginConfigSchema } from './config.ts'
export type { PluginConfig } from './config.ts'

export { Registry } from './registry.ts'
export type { RegisteredTool, RegisteredResource, RegisteredPrompt, RegisteredCapability, ResourceMatch } from './registry.ts'
export { UriTemplate } from './uri-template.ts'

export { Session } from './session/session.ts'
export type { SessionOptions, SessionState } from './session/session.ts'

export {
  encode,
  decode,
  createRequest,
  createNotification,
  createResponse,
  createErrorResponse,
  isRequest,
  isNotification,
  isResponse,
  isErrorResponse
} from './codec.ts'
export type { DecodeResult, DecodeOptions } from './codec.ts'

export { AsyncQueue } from './transports/transport.ts'
export type { Channel } from './transports/transport.ts'
export { createChannelPair } from './transports/memory.ts'
export { StdioChannel } from './transports/stdio.ts'
export type { StdioChannelOptions } from './transports/stdio.ts'
export { SseChannel } from './transports/sse.ts'
export { MemoryMessageBroker } from './brokers/memory-message-broker.ts'
export type { MessageBroker } from './brokers/message-broker.ts'

export {
  StdioTransport,
  createStdioTransport,
  runStdioServer
} from './stdio.ts'
export type { StdioTransportOptions } from './stdio.ts'

export {
  text,
  binary,
  stream,
  embedded,
  userMessage,
  assistantMessage,
  TextValue,
  BinaryValue,
  StreamValue,
  EmbeddedValue,
  PromptMessageValue
} from './features/content.ts'
export type { ContentValue, PromptValue, StreamChunk } from './features/content.ts'

export {
  McpError,
  ProtocolError,
  DecodeError,
  UnknownMethodError,
  OutOfOrderError,
  InvalidParamsError,
  NotFoundError,
  ResourceNotFoundError,
  ToolError,
  ResourceError,
  PromptError,
  CancelledError,
  TransportError,
  RegistrationError,
  InternalError,
  fromErrorObject
} from './errors.ts'
export type { ErrorKind } from './errors.ts'

export { Type } from '@sinclair/typebox'

export type {
  MCPPluginOptions,
  ConnectOptions,
  HandlerServices,
  HandlerContext,
  ClientContext,
  CompletionContext,
  CompletionProvider,
  Completions,
  ToolDefinition,
  ToolHandler,
  ResourceDefinition,
  DirectResourceDefinition,
  TemplateResourceDefinition,
  ResourceHandler,
  PromptDefinition,
  PromptHandler
} from './types.ts'

export type {
  JSONRPCMessage,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONRPCError,
  JSONRPCNotification,
  ServerCapabilities,
  ClientCapabilities,
  Implementation,
  LoggingLevel,
  ContentBlock,
  Tool,
  Resource,
  ResourceTemplate,
  Prompt,
  PromptMessage,
  Root,
  CallToolResult,
  ReadResourceResult,
  GetPromptResult,
  CompleteResult
} from './schema.ts'
