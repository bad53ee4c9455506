import type { FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'
import type { TObject } from '@sinclair/typebox'
import type { Registry } from '../registry.ts'
import type {
  PromptDefinition,
  PromptHandler,
  ResourceDefinition,
  ResourceHandler,
  ToolDefinition,
  ToolHandler
} from '../types.ts'

interface MCPDecoratorsOptions {
  registry: Registry
}

const mcpDecoratorsPlugin: FastifyPluginAsync<MCPDecoratorsOptions> = async (app, options) => {
  const { registry } = options

  app.decorate('mcpRegistry', registry)

  app.decorate('mcpAddTool', <TInput extends TObject>(
    definition: ToolDefinition<TInput>,
    handler: ToolHandler<TInput>
  ) => {
    const tool = registry.registerTool(definition, handler)
    app.log.debug({ tool: tool.name, parameters: tool.parameters.length }, 'MCP tool registered')
  })

  app.decorate('mcpAddResource', (
    definition: ResourceDefinition,
    handler: ResourceHandler
  ) => {
    const resource = registry.registerResource(definition, handler)
    app.log.debug({ resource: resource.uri, template: resource.template !== undefined }, 'MCP resource registered')
  })

  app.decorate('mcpAddPrompt', <TArgs extends TObject>(
    definition: PromptDefinition<TArgs>,
    handler: PromptHandler<TArgs>
  ) => {
    const prompt = registry.registerPrompt(definition, handler)
    app.log.debug({ prompt: prompt.name }, 'MCP prompt registered')
  })

  // Capabilities are fixed once the server is ready.
  app.addHook('onReady', async () => {
    registry.seal()
    app.log.debug({
      tools: registry.listTools().length,
      resources: registry.listResources().length + registry.listResourceTemplates().length,
      prompts: registry.listPrompts().length
    }, 'MCP registry sealed')
  })
}

export default fp(mcpDecoratorsPlugin, {
  name: 'mcp-decorators'
})
