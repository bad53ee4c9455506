import { Type } from '@sinclair/typebox'
import type { Static } from '@sinclair/typebox'
import { ImplementationSchema } from '../validation/schemas.ts'

// Results as seen by a client; unknown extra fields are kept.

const CatalogMetaSchema = Type.Optional(Type.Object({
  completions: Type.Array(Type.String())
}))

const TextResourceContentsSchema = Type.Object({
  uri: Type.String(),
  mimeType: Type.Optional(Type.String()),
  text: Type.String()
})

const BlobResourceContentsSchema = Type.Object({
  uri: Type.String(),
  mimeType: Type.Optional(Type.String()),
  blob: Type.String()
})

export const ResourceContentsSchema = Type.Union([TextResourceContentsSchema, BlobResourceContentsSchema])

export const ContentBlockSchema = Type.Union([
  Type.Object({ type: Type.Literal('text'), text: Type.String() }),
  Type.Object({ type: Type.Literal('image'), data: Type.String(), mimeType: Type.String() }),
  Type.Object({ type: Type.Literal('audio'), data: Type.String(), mimeType: Type.String() }),
  Type.Object({ type: Type.Literal('resource'), resource: ResourceContentsSchema })
])

export const InitializeResultSchema = Type.Object({
  protocolVersion: Type.String(),
  capabilities: Type.Record(Type.String(), Type.Unknown()),
  serverInfo: ImplementationSchema,
  instructions: Type.Optional(Type.String())
})

export const ListToolsResultSchema = Type.Object({
  tools: Type.Array(Type.Object({
    name: Type.String(),
    description: Type.Optional(Type.String()),
    inputSchema: Type.Object({
      type: Type.Literal('object'),
      properties: Type.Optional(Type.Record(Type.String(), Type.Record(Type.String(), Type.Unknown()))),
      required: Type.Optional(Type.Array(Type.String()))
    }),
    _meta: CatalogMetaSchema
  }))
})

export const CallToolResultSchema = Type.Object({
  content: Type.Array(ContentBlockSchema),
  isError: Type.Optional(Type.Boolean())
})

export const ListResourcesResultSchema = Type.Object({
  resources: Type.Array(Type.Object({
    uri: Type.String(),
    name: Type.String(),
    description: Type.Optional(Type.String()),
    mimeType: Type.Optional(Type.String()),
    _meta: CatalogMetaSchema
  }))
})

export const ListResourceTemplatesResultSchema = Type.Object({
  resourceTemplates: Type.Array(Type.Object({
    uriTemplate: Type.String(),
    name: Type.String(),
    description: Type.Optional(Type.String()),
    mimeType: Type.Optional(Type.String()),
    _meta: CatalogMetaSchema
  }))
})

export const ReadResourceResultSchema = Type.Object({
  contents: Type.Array(ResourceContentsSchema)
})

export const ListPromptsResultSchema = Type.Object({
  prompts: Type.Array(Type.Object({
    name: Type.String(),
    description: Type.Optional(Type.String()),
    arguments: Type.Optional(Type.Array(Type.Object({
      name: Type.String(),
      description: Type.Optional(Type.String()),
      required: Type.Optional(Type.Boolean())
    }))),
    _meta: CatalogMetaSchema
  }))
})

export const GetPromptResultSchema = Type.Object({
  description: Type.Optional(Type.String()),
  messages: Type.Array(Type.Object({
    role: Type.Union([Type.Literal('user'), Type.Literal('assistant')]),
    content: ContentBlockSchema
  }))
})

export const CompleteResultSchema = Type.Object({
  completion: Type.Object({
    values: Type.Array(Type.String()),
    total: Type.Optional(Type.Integer()),
    hasMore: Type.Optional(Type.Boolean())
  })
})

export type InitializeResponse = Static<typeof InitializeResultSchema>
export type ToolList = Static<typeof ListToolsResultSchema>
export type ToolCallResponse = Static<typeof CallToolResultSchema>
export type ResourceList = Static<typeof ListResourcesResultSchema>
export type ResourceTemplateList = Static<typeof ListResourceTemplatesResultSchema>
export type ResourceReadResponse = Static<typeof ReadResourceResultSchema>
export type PromptList = Static<typeof ListPromptsResultSchema>
export type PromptResponse = Static<typeof GetPromptResultSchema>
export type CompletionResponse = Static<typeof CompleteResultSchema>
