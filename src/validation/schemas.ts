import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'

// Error response schema
export const ValidationErrorSchema = Type.Object({
  code: Type.Literal('VALIDATION_ERROR'),
  message: Type.String(),
  errors: Type.Array(Type.Object({
    path: Type.String(),
    message: Type.String(),
    expected: Type.String(),
    received: Type.Unknown()
  }))
})

export type ValidationError = Static<typeof ValidationErrorSchema>

// JSON-RPC envelope schemas
export const RequestIdSchema = Type.Union([Type.String(), Type.Integer()])

const JSONRPCVersionSchema = Type.Optional(Type.Literal('2.0'))
const ParamsSchema = Type.Optional(Type.Record(Type.String(), Type.Unknown()))

export const JSONRPCRequestSchema = Type.Object({
  jsonrpc: JSONRPCVersionSchema,
  id: RequestIdSchema,
  method: Type.String({ minLength: 1 }),
  params: ParamsSchema
})

export const JSONRPCNotificationSchema = Type.Object({
  jsonrpc: JSONRPCVersionSchema,
  method: Type.String({ minLength: 1 }),
  params: ParamsSchema
})

export const JSONRPCResponseSchema = Type.Object({
  jsonrpc: JSONRPCVersionSchema,
  id: RequestIdSchema,
  result: Type.Record(Type.String(), Type.Unknown())
})

export const ErrorObjectSchema = Type.Object({
  code: Type.Integer(),
  message: Type.String(),
  data: Type.Optional(Type.Record(Type.String(), Type.Unknown()))
})

export const JSONRPCErrorSchema = Type.Object({
  jsonrpc: JSONRPCVersionSchema,
  id: RequestIdSchema,
  error: ErrorObjectSchema
})

// MCP request params
export const ImplementationSchema = Type.Object({
  name: Type.String(),
  version: Type.String()
})

export const InitializeParamsSchema = Type.Object({
  protocolVersion: Type.String(),
  capabilities: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
  clientInfo: Type.Optional(ImplementationSchema)
})

export const CallToolParamsSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  arguments: Type.Optional(Type.Record(Type.String(), Type.Unknown()))
})

export const ReadResourceParamsSchema = Type.Object({
  uri: Type.String({ minLength: 1 })
})

export const GetPromptParamsSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  arguments: Type.Optional(Type.Record(Type.String(), Type.String()))
})

export const LoggingLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('notice'),
  Type.Literal('warning'),
  Type.Literal('error'),
  Type.Literal('critical'),
  Type.Literal('alert'),
  Type.Literal('emergency')
])

export const SetLevelParamsSchema = Type.Object({
  level: LoggingLevelSchema
})

export const CompletionReferenceSchema = Type.Union([
  Type.Object({ type: Type.Literal('ref/prompt'), name: Type.String() }),
  Type.Object({ type: Type.Literal('ref/resource'), uri: Type.String() }),
  Type.Object({ type: Type.Literal('ref/tool'), name: Type.String() })
])

export const CompleteParamsSchema = Type.Object({
  ref: CompletionReferenceSchema,
  argument: Type.Object({
    name: Type.String(),
    value: Type.String()
  }),
  context: Type.Optional(Type.Object({
    arguments: Type.Optional(Type.Record(Type.String(), Type.String()))
  }))
})

export const RootSchema = Type.Object({
  uri: Type.String(),
  name: Type.Optional(Type.String())
})

export const RootsListSchema = Type.Object({
  roots: Type.Array(RootSchema)
})

export const CancelledParamsSchema = Type.Object({
  requestId: RequestIdSchema,
  reason: Type.Optional(Type.String())
})

export const ProgressParamsSchema = Type.Object({
  progressToken: Type.Union([Type.String(), Type.Number()]),
  progress: Type.Number(),
  total: Type.Optional(Type.Number()),
  message: Type.Optional(Type.String())
})

export const LogMessageParamsSchema = Type.Object({
  level: LoggingLevelSchema,
  logger: Type.Optional(Type.String()),
  data: Type.Unknown(),
  _meta: Type.Optional(Type.Object({
    requestId: Type.Optional(RequestIdSchema)
  }))
})

export type InitializeParams = Static<typeof InitializeParamsSchema>
export type CallToolParams = Static<typeof CallToolParamsSchema>
export type ReadResourceParams = Static<typeof ReadResourceParamsSchema>
export type GetPromptParams = Static<typeof GetPromptParamsSchema>
export type SetLevelParams = Static<typeof SetLevelParamsSchema>
export type CompleteParams = Static<typeof CompleteParamsSchema>
export type CancelledParams = Static<typeof CancelledParamsSchema>
export type ProgressParams = Static<typeof ProgressParamsSchema>
export type LogMessageParams = Static<typeof LogMessageParamsSchema>
