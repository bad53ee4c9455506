import type { TSchema, Static } from '@sinclair/typebox'
import type {
  JSONRPCRequest,
  ListPromptsResult,
  ListResourcesResult,
  ListResourceTemplatesResult,
  ListRootsResult,
  ListToolsResult,
  Result,
  Root
} from './schema.ts'
import type { HandlerContext } from './types.ts'
import type { Registry } from './registry.ts'
import type { CompletionService } from './features/completion.ts'
import type { LoggingService } from './features/logging.ts'
import {
  CallToolParamsSchema,
  CompleteParamsSchema,
  GetPromptParamsSchema,
  ReadResourceParamsSchema,
  SetLevelParamsSchema
} from './validation/schemas.ts'
import { validate, formatValidationErrors } from './validation/validator.ts'
import { InvalidParamsError, NotFoundError, ProtocolError, ResourceNotFoundError, UnknownMethodError } from './errors.ts'
import { getPrompt, invokeTool, readResource } from './features/invocation.ts'

/**
 * Everything a request handler may touch: the shared registry and the state of
 * the session the request arrived on.
 */
export interface RequestScope {
  registry: Registry
  completion: CompletionService
  logging: LoggingService
  roots: () => readonly Root[]
  context: HandlerContext
}

function parseParams<T extends TSchema> (schema: T, params: unknown): Static<T> {
  const result = validate(schema, params ?? {})
  if (!result.success) {
    throw new InvalidParamsError(`Invalid params: ${formatValidationErrors(result.error.errors)}`)
  }
  return result.data
}

/**
 * Dispatches one request of an initialized session to its handler.
 */
export async function handleRequest (request: JSONRPCRequest, scope: RequestScope): Promise<Result> {
  const { registry, context } = scope

  switch (request.method) {
    case 'ping':
    case 'shutdown':
      return {}

    case 'tools/list': {
      const result: ListToolsResult = { tools: registry.listTools() }
      return result
    }

    case 'tools/call': {
      const params = parseParams(CallToolParamsSchema, request.params)
      const tool = registry.lookupTool(params.name)
      if (!tool) {
        throw new NotFoundError(`Tool not found: ${params.name}`)
      }
      return invokeTool(tool, params.arguments ?? {}, context)
    }

    case 'resources/list': {
      const result: ListResourcesResult = { resources: registry.listResources() }
      return result
    }

    case 'resources/templates/list': {
      const result: ListResourceTemplatesResult = { resourceTemplates: registry.listResourceTemplates() }
      return result
    }

    case 'resources/read': {
      const params = parseParams(ReadResourceParamsSchema, request.params)
      const match = registry.lookupResource(params.uri)
      if (!match) {
        throw new ResourceNotFoundError(params.uri)
      }
      return readResource(match.resource, params.uri, match.params, context)
    }

    case 'prompts/list': {
      const result: ListPromptsResult = { prompts: registry.listPrompts() }
      return result
    }

    case 'prompts/get': {
      const params = parseParams(GetPromptParamsSchema, request.params)
      const prompt = registry.lookupPrompt(params.name)
      if (!prompt) {
        throw new NotFoundError(`Prompt not found: ${params.name}`)
      }
      return getPrompt(prompt, params.arguments ?? {}, context)
    }

    case 'roots/list': {
      const result: ListRootsResult = { roots: [...scope.roots()] }
      return result
    }

    case 'completion/complete':
      return scope.completion.complete(parseParams(CompleteParamsSchema, request.params))

    case 'logging/setLevel': {
      const params = parseParams(SetLevelParamsSchema, request.params)
      scope.logging.setLevel(params.level)
      return {}
    }

    case 'initialize':
      throw new ProtocolError('Session already initialized')

    default:
      throw new UnknownMethodError(request.method, request.id)
  }
}
