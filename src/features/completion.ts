import type { CompleteResult } from '../schema.ts'
import type { CompleteParams } from '../validation/schemas.ts'
import type { Registry, RegisteredCapability } from '../registry.ts'
import { NotFoundError } from '../errors.ts'

export const DEFAULT_MAX_COMPLETION_VALUES = 100

/**
 * Completion service for MCP servers.
 *
 * Resolves a completion reference to a registered prompt, resource or tool
 * and delegates to the provider registered for the requested parameter.
 */
export class CompletionService {
  private readonly registry: Registry
  private readonly maxValues: number

  constructor (registry: Registry, maxValues: number = DEFAULT_MAX_COMPLETION_VALUES) {
    this.registry = registry
    this.maxValues = maxValues
  }

  private resolve (ref: CompleteParams['ref']): RegisteredCapability {
    let capability: RegisteredCapability | undefined
    switch (ref.type) {
      case 'ref/prompt':
        capability = this.registry.lookupPrompt(ref.name)
        break
      case 'ref/tool':
        capability = this.registry.lookupTool(ref.name)
        break
      case 'ref/resource':
        capability = this.registry.findResource(ref.uri)
        break
    }
    if (capability === undefined) {
      throw new NotFoundError(`Completion target not found: ${ref.type === 'ref/resource' ? ref.uri : ref.name}`)
    }
    return capability
  }

  /**
   * Processes a completion request and returns matching values.
   *
   * A capability without a provider for the parameter completes to no values.
   */
  async complete (params: CompleteParams): Promise<CompleteResult> {
    const { ref, argument, context } = params
    const provider = this.resolve(ref).completions.get(argument.name)

    if (!provider) {
      return {
        completion: {
          values: [],
          total: 0,
          hasMore: false
        }
      }
    }

    let values = await provider(argument.value, {
      argument: argument.name,
      arguments: context?.arguments ?? {}
    })

    // Ensure we don't exceed the configured limit
    const total = values.length
    const hasMore = values.length > this.maxValues
    if (hasMore) {
      values = values.slice(0, this.maxValues)
    }

    return {
      completion: {
        values,
        total,
        hasMore
      }
    }
  }

}
