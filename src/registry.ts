import type { TObject } from '@sinclair/typebox'
import type {
  ParameterSpec,
  Prompt,
  Resource,
  ResourceTemplate,
  Tool
} from './schema.ts'
import type {
  CompletionProvider,
  Completions,
  HandlerContext,
  PromptDefinition,
  PromptHandler,
  ResourceDefinition,
  ResourceHandler,
  ToolDefinition,
  ToolHandler
} from './types.ts'
import { RegistrationError } from './errors.ts'
import { UriTemplate } from './uri-template.ts'
import { schemaToArguments, schemaToParameters, toInputSchema } from './validation/converter.ts'
import { bindArguments } from './features/invocation.ts'

interface Capability {
  readonly name: string
  readonly description?: string
  readonly parameters: readonly ParameterSpec[]
  readonly completions: ReadonlyMap<string, CompletionProvider>
}

export interface RegisteredTool extends Capability {
  readonly kind: 'tool'
  readonly inputSchema: TObject
  readonly strict: boolean
  invoke (args: Record<string, unknown>, context: HandlerContext): Promise<unknown>
}

export interface RegisteredResource extends Capability {
  readonly kind: 'resource'
  /**
   * The literal URI, or the pattern of a template.
   */
  readonly uri: string
  readonly template?: UriTemplate
  readonly mimeType?: string
  invoke (uri: string, params: Record<string, string>, context: HandlerContext): Promise<unknown>
}

export interface RegisteredPrompt extends Capability {
  readonly kind: 'prompt'
  readonly argumentSchema: TObject
  invoke (args: Record<string, string>, context: HandlerContext): Promise<unknown>
}

export type RegisteredCapability = RegisteredTool | RegisteredResource | RegisteredPrompt

export interface ResourceMatch {
  resource: RegisteredResource
  params: Record<string, string>
}

function freezeCompletions (name: string, parameters: readonly ParameterSpec[], completions: Completions = {}): ReadonlyMap<string, CompletionProvider> {
  const declared = new Set(parameters.map(parameter => parameter.name))
  const map = new Map<string, CompletionProvider>()
  for (const [parameter, provider] of Object.entries(completions)) {
    if (!declared.has(parameter)) {
      throw new RegistrationError(`Completion provider for unknown parameter "${parameter}" of "${name}"`)
    }
    map.set(parameter, provider)
  }
  return map
}

function freezeParameters (parameters: ParameterSpec[]): readonly ParameterSpec[] {
  return Object.freeze(parameters.map(parameter => Object.freeze(parameter)))
}

function catalogMeta (capability: Capability): { _meta?: { completions: string[] } } {
  if (capability.completions.size === 0) {
    return {}
  }
  return { _meta: { completions: [...capability.completions.keys()] } }
}

/**
 * The tools, resources and prompts a server exposes.
 *
 * Capabilities are turned into immutable records when registered; after
 * `seal()` the registry only serves lookups.
 */
export class Registry {
  private readonly tools = new Map<string, RegisteredTool>()
  private readonly prompts = new Map<string, RegisteredPrompt>()
  private readonly resources = new Map<string, RegisteredResource>()
  private readonly templates: RegisteredResource[] = []
  private isSealed = false

  get sealed (): boolean {
    return this.isSealed
  }

  get hasTools (): boolean {
    return this.tools.size > 0
  }

  get hasResources (): boolean {
    return this.resources.size > 0 || this.templates.length > 0
  }

  get hasPrompts (): boolean {
    return this.prompts.size > 0
  }

  seal (): void {
    this.isSealed = true
  }

  private assertOpen (what: string): void {
    if (this.isSealed) {
      throw new RegistrationError(`Cannot register ${what}: the registry is sealed`)
    }
  }

  registerTool<TInput extends TObject> (definition: ToolDefinition<TInput>, handler: ToolHandler<TInput>): RegisteredTool {
    const { name } = definition
    this.assertOpen(`tool "${name}"`)
    if (!name) {
      throw new RegistrationError('Tool definition must have a name')
    }
    if (this.tools.has(name)) {
      throw new RegistrationError(`Tool "${name}" is already registered`)
    }

    const { inputSchema } = definition
    const parameters = freezeParameters(schemaToParameters(inputSchema))
    const strict = definition.strict ?? false

    const tool = Object.freeze<RegisteredTool>({
      kind: 'tool',
      name,
      description: definition.description,
      parameters,
      completions: freezeCompletions(name, parameters, definition.completions),
      inputSchema,
      strict,
      invoke: async (args, context) => handler(bindArguments(inputSchema, parameters, args, strict), context)
    })
    this.tools.set(name, tool)
    return tool
  }

  registerResource (definition: ResourceDefinition, handler: ResourceHandler): RegisteredResource {
    const uri = definition.uri ?? definition.uriTemplate
    this.assertOpen(`resource "${uri}"`)
    if (!uri) {
      throw new RegistrationError('Resource definition must have a uri or uriTemplate')
    }

    let template: UriTemplate | undefined
    if (definition.uriTemplate !== undefined) {
      template = new UriTemplate(definition.uriTemplate)
      if (template.params.length === 0) {
        throw new RegistrationError(`Resource template "${uri}" has no parameters`)
      }
      if (this.templates.some(existing => existing.uri === uri)) {
        throw new RegistrationError(`Resource template "${uri}" is already registered`)
      }
    } else {
      if (UriTemplate.isTemplate(uri)) {
        throw new RegistrationError(`Resource "${uri}" looks like a template; register it with uriTemplate`)
      }
      if (this.resources.has(uri)) {
        throw new RegistrationError(`Resource "${uri}" is already registered`)
      }
    }

    const parameters = freezeParameters((template?.params ?? []).map(param => ({
      name: param,
      type: 'string',
      required: true
    })))

    const resource = Object.freeze<RegisteredResource>({
      kind: 'resource',
      name: definition.name,
      description: definition.description,
      parameters,
      completions: freezeCompletions(uri, parameters, definition.completions),
      uri,
      template,
      mimeType: definition.mimeType,
      invoke: async (target, params, context) => handler(target, params, context)
    })

    if (template === undefined) {
      this.resources.set(uri, resource)
    } else {
      this.templates.push(resource)
    }
    return resource
  }

  registerPrompt<TArgs extends TObject> (definition: PromptDefinition<TArgs>, handler: PromptHandler<TArgs>): RegisteredPrompt {
    const { name } = definition
    this.assertOpen(`prompt "${name}"`)
    if (!name) {
      throw new RegistrationError('Prompt definition must have a name')
    }
    if (this.prompts.has(name)) {
      throw new RegistrationError(`Prompt "${name}" is already registered`)
    }

    const { argumentSchema } = definition
    const parameters = freezeParameters(schemaToParameters(argumentSchema))
    const strict = definition.strict ?? false

    const prompt = Object.freeze<RegisteredPrompt>({
      kind: 'prompt',
      name,
      description: definition.description,
      parameters,
      completions: freezeCompletions(name, parameters, definition.completions),
      argumentSchema,
      invoke: async (args, context) => handler(name, bindArguments(argumentSchema, parameters, args, strict), context)
    })
    this.prompts.set(name, prompt)
    return prompt
  }

  lookupTool (name: string): RegisteredTool | undefined {
    return this.tools.get(name)
  }

  lookupPrompt (name: string): RegisteredPrompt | undefined {
    return this.prompts.get(name)
  }

  /**
   * Direct resources first, then templates in registration order.
   */
  lookupResource (uri: string): ResourceMatch | undefined {
    const direct = this.resources.get(uri)
    if (direct !== undefined) {
      return { resource: direct, params: {} }
    }
    for (const resource of this.templates) {
      const params = resource.template?.match(uri)
      if (params !== undefined) {
        return { resource, params }
      }
    }
    return undefined
  }

  /**
   * A resource by its literal URI or template pattern, as named in completion references.
   */
  findResource (uriOrPattern: string): RegisteredResource | undefined {
    return this.resources.get(uriOrPattern) ?? this.templates.find(resource => resource.uri === uriOrPattern)
  }

  listTools (): Tool[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      inputSchema: toInputSchema(tool.inputSchema),
      ...catalogMeta(tool)
    }))
  }

  listResources (): Resource[] {
    return [...this.resources.values()].map(resource => ({
      uri: resource.uri,
      name: resource.name,
      ...(resource.description !== undefined && { description: resource.description }),
      ...(resource.mimeType !== undefined && { mimeType: resource.mimeType }),
      ...catalogMeta(resource)
    }))
  }

  listResourceTemplates (): ResourceTemplate[] {
    return this.templates.map(resource => ({
      uriTemplate: resource.uri,
      name: resource.name,
      ...(resource.description !== undefined && { description: resource.description }),
      ...(resource.mimeType !== undefined && { mimeType: resource.mimeType }),
      ...catalogMeta(resource)
    }))
  }

  listPrompts (): Prompt[] {
    return [...this.prompts.values()].map(prompt => ({
      name: prompt.name,
      ...(prompt.description !== undefined && { description: prompt.description }),
      arguments: schemaToArguments(prompt.argumentSchema),
      ...catalogMeta(prompt)
    }))
  }
}
