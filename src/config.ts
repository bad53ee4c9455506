import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import type { MCPPluginOptions } from './types.ts'
import { ImplementationSchema, LoggingLevelSchema } from './validation/schemas.ts'
import { transform, formatValidationErrors } from './validation/validator.ts'
import { DEFAULT_MAX_COMPLETION_VALUES } from './features/completion.ts'

export const PluginConfigSchema = Type.Object({
  serverInfo: ImplementationSchema,
  instructions: Type.Optional(Type.String()),
  path: Type.String({ default: '/mcp', pattern: '^(/[^/]+)*$' }),
  enableSSE: Type.Boolean({ default: true }),
  heartbeatInterval: Type.Integer({ minimum: 1, default: 30_000 }),
  requestTimeout: Type.Integer({ minimum: 1, default: 30_000 }),
  maxCompletionValues: Type.Integer({ minimum: 1, default: DEFAULT_MAX_COMPLETION_VALUES }),
  defaultLogLevel: Type.Union(LoggingLevelSchema.anyOf, { default: 'error' })
})

export type PluginConfig = Static<typeof PluginConfigSchema>

const DEFAULT_SERVER_INFO = { name: 'fastify-mcp-capabilities', version: '0.1.0' }

/**
 * Applies defaults to the plain plugin options and validates them.
 * `registry` and `services` are handed over untouched.
 */
export function resolveConfig (options: MCPPluginOptions = {}): PluginConfig {
  const { registry: _registry, services: _services, ...plain } = options
  const result = transform(PluginConfigSchema, {
    ...plain,
    serverInfo: plain.serverInfo ?? DEFAULT_SERVER_INFO
  })
  if (!result.success) {
    throw new Error(`Invalid MCP plugin options: ${formatValidationErrors(result.error.errors)}`)
  }
  return result.data
}
