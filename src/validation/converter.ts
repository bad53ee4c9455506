import type { TObject, TSchema } from '@sinclair/typebox'
import type { ParameterSpec, PromptArgument, Tool } from '../schema.ts'

/**
 * Derive the ordered parameter specs of a capability from its TypeBox object schema.
 *
 * A parameter is required when the schema lists it as required and gives it no default.
 */
export function schemaToParameters (schema: TObject): ParameterSpec[] {
  const properties = schema.properties ?? {}
  const required: string[] = schema.required ?? []

  return Object.entries(properties).map(([name, propSchema]) => {
    const spec: ParameterSpec = {
      name,
      type: getSchemaType(propSchema),
      description: getSchemaDescription(propSchema),
      required: required.includes(name) && propSchema.default === undefined
    }
    if (propSchema.default !== undefined) {
      spec.default = propSchema.default
    }
    return spec
  })
}

/**
 * Convert a TypeBox schema to MCP prompt arguments array
 */
export function schemaToArguments (schema: TObject): PromptArgument[] {
  return schemaToParameters(schema).map(({ name, description, required }) => ({
    name,
    description,
    required
  }))
}

/**
 * Plain JSON Schema form of a tool input schema, as listed to clients.
 */
export function toInputSchema (schema: TObject): Tool['inputSchema'] {
  const json: unknown = JSON.parse(JSON.stringify(schema))
  const properties: { [key: string]: object } = {}
  if (isRecord(json) && isRecord(json.properties)) {
    for (const [name, value] of Object.entries(json.properties)) {
      if (isRecord(value)) {
        properties[name] = value
      }
    }
  }
  const inputSchema: Tool['inputSchema'] = { type: 'object', properties }
  if (schema.required !== undefined && schema.required.length > 0) {
    inputSchema.required = [...schema.required]
  }
  return inputSchema
}

function isRecord (value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON type name of a property schema, `union` for alternatives.
 */
export function getSchemaType (schema: TSchema): string {
  if ('const' in schema) {
    return typeof schema.const
  }
  if (Array.isArray(schema.anyOf)) {
    return 'union'
  }
  return typeof schema.type === 'string' ? schema.type : 'unknown'
}

/**
 * Extract description from a TypeBox schema
 */
function getSchemaDescription (schema: TSchema): string {
  if (typeof schema.description === 'string') {
    return schema.description
  }

  if ('const' in schema) {
    return `Literal value: ${String(schema.const)}`
  }

  if (Array.isArray(schema.anyOf)) {
    const types = schema.anyOf.map((s: TSchema) => getSchemaDescription(s))
    return `One of: ${types.join(' | ')}`
  }

  switch (schema.type) {
    case 'string':
      return describe('String', stringConstraints(schema))
    case 'number':
      return describe('Number', numberConstraints(schema))
    case 'integer':
      return describe('Integer', numberConstraints(schema))
    case 'boolean':
      return 'Boolean value'
    case 'array':
      return `Array of ${getSchemaDescription(schema.items)}`
    case 'object':
      return 'Object value'
    default:
      return `Parameter of type ${getSchemaType(schema)}`
  }
}

function describe (base: string, constraints: string[]): string {
  return constraints.length > 0 ? `${base} (${constraints.join(', ')})` : base
}

function stringConstraints (schema: TSchema): string[] {
  if (Array.isArray(schema.enum)) {
    return [`one of: ${schema.enum.join(', ')}`]
  }
  const constraints: string[] = []
  if (schema.minLength !== undefined) {
    constraints.push(`min length: ${schema.minLength}`)
  }
  if (schema.maxLength !== undefined) {
    constraints.push(`max length: ${schema.maxLength}`)
  }
  if (schema.pattern) {
    constraints.push(`pattern: ${schema.pattern}`)
  }
  if (schema.format) {
    constraints.push(`format: ${schema.format}`)
  }
  return constraints
}

function numberConstraints (schema: TSchema): string[] {
  const constraints: string[] = []
  if (schema.minimum !== undefined) {
    constraints.push(`min: ${schema.minimum}`)
  }
  if (schema.maximum !== undefined) {
    constraints.push(`max: ${schema.maximum}`)
  }
  if (schema.exclusiveMinimum !== undefined) {
    constraints.push(`exclusive min: ${schema.exclusiveMinimum}`)
  }
  if (schema.exclusiveMaximum !== undefined) {
    constraints.push(`exclusive max: ${schema.exclusiveMaximum}`)
  }
  if (schema.multipleOf !== undefined) {
    constraints.push(`multiple of: ${schema.multipleOf}`)
  }
  return constraints
}
