import type { Static, TObject } from '@sinclair/typebox'
import type {
  CallToolResult,
  GetPromptResult,
  ParameterSpec,
  ReadResourceResult
} from '../schema.ts'
import type { HandlerContext } from '../types.ts'
import type { RegisteredPrompt, RegisteredResource, RegisteredTool } from '../registry.ts'
import {
  CancelledError,
  InvalidParamsError,
  McpError,
  PromptError,
  ResourceError,
  ToolError,
  errorMessage
} from '../errors.ts'
import { transform, formatValidationErrors } from '../validation/validator.ts'
import { normalize, toContentBlocks, toPromptMessages, toResourceContents } from './content.ts'

/**
 * Binds supplied arguments to the declared parameters.
 *
 * Defaults are applied, a missing required parameter or a value of the wrong
 * type is an InvalidParams error, and undeclared arguments are dropped (or
 * rejected in strict mode).
 */
export function bindArguments<T extends TObject> (
  schema: T,
  parameters: readonly ParameterSpec[],
  supplied: Record<string, unknown>,
  strict: boolean
): Static<T> {
  const declared = new Set(parameters.map(parameter => parameter.name))
  const extras = Object.keys(supplied).filter(name => !declared.has(name))
  if (strict && extras.length > 0) {
    throw new InvalidParamsError(`Unexpected parameters: ${extras.join(', ')}`, { parameters: extras })
  }

  const bound: Record<string, unknown> = {}
  for (const parameter of parameters) {
    if (Object.hasOwn(supplied, parameter.name) && supplied[parameter.name] !== undefined) {
      bound[parameter.name] = supplied[parameter.name]
    }
  }

  const missing = parameters
    .filter(parameter => parameter.required && !Object.hasOwn(bound, parameter.name))
    .map(parameter => parameter.name)
  if (missing.length > 0) {
    throw new InvalidParamsError(`Missing required parameters: ${missing.join(', ')}`, { parameters: missing })
  }

  const result = transform(schema, bound)
  if (!result.success) {
    throw new InvalidParamsError(`Invalid parameters: ${formatValidationErrors(result.error.errors)}`)
  }
  return result.data
}

/**
 * Maps a failure inside an invocation to the error reported to the client.
 * A handler that stopped because its request was cancelled reports Cancelled.
 */
function toInvocationError (error: unknown, context: HandlerContext, wrap: (message: string, cause: unknown) => McpError): McpError {
  if (context.client.cancelled) {
    return error instanceof CancelledError ? error : new CancelledError()
  }
  if (error instanceof McpError) {
    return error
  }
  context.log.debug({ err: error }, 'capability handler failed')
  return wrap(errorMessage(error), error)
}

export async function invokeTool (
  tool: RegisteredTool,
  args: Record<string, unknown>,
  context: HandlerContext
): Promise<CallToolResult> {
  try {
    const value = await tool.invoke(args, context)
    const parts = await normalize(value, context.client.signal)
    return { content: toContentBlocks(parts, `tool://${tool.name}`) }
  } catch (error) {
    throw toInvocationError(error, context, (message, cause) => new ToolError(message, { cause }))
  }
}

export async function readResource (
  resource: RegisteredResource,
  uri: string,
  params: Record<string, string>,
  context: HandlerContext
): Promise<ReadResourceResult> {
  try {
    const value = await resource.invoke(uri, params, context)
    const parts = await normalize(value, context.client.signal)
    return { contents: toResourceContents(parts, uri, resource.mimeType) }
  } catch (error) {
    throw toInvocationError(error, context, (message, cause) => new ResourceError(message, { cause }))
  }
}

export async function getPrompt (
  prompt: RegisteredPrompt,
  args: Record<string, string>,
  context: HandlerContext
): Promise<GetPromptResult> {
  try {
    const value = await prompt.invoke(args, context)
    const messages = await toPromptMessages(value, `prompt://${prompt.name}`, context.client.signal)
    return {
      ...(prompt.description !== undefined && { description: prompt.description }),
      messages
    }
  } catch (error) {
    throw toInvocationError(error, context, (message, cause) => new PromptError(message, { cause }))
  }
}
