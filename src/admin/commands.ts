import { parseArgs } from 'node:util'
import { stringify } from 'yaml'
import type { FastifyBaseLogger } from 'fastify'
import type { JSONRPCNotification, Root } from '../schema.ts'
import type { Channel } from '../transports/transport.ts'
import { McpClient } from '../client/client.ts'
import { openSseChannel } from '../client/sse-channel.ts'
import { spawnStdioChannel } from '../client/stdio-channel.ts'
import type { ToolList } from '../client/schemas.ts'
import { InvalidParamsError, NotFoundError, errorMessage } from '../errors.ts'
import { LogMessageParamsSchema, ProgressParamsSchema } from '../validation/schemas.ts'
import { check } from '../validation/validator.ts'

export const USAGE = `
Usage: mcp-admin <command> <endpoint> [args] [options]

Commands:
  info <endpoint>                              Show server info and capabilities
  tools list <endpoint>                        List tools
  tools call <endpoint> <name> [-p k=v ...]    Call a tool
  resources list <endpoint>                    List direct resources
  resources templates <endpoint>               List resource templates
  resources read <endpoint> <uri> [-n index]   Read a resource, or only its n-th content
  prompts list <endpoint>                      List prompts
  prompts get <endpoint> <name> [-p k=v ...]   Render a prompt

Options:
  -p, --param <key=value>    Parameter (repeatable)
  -n, --index <n>            Only print the n-th content item (from 1, 0 for all)
  --root <name> <uri>        Declare a root before invoking (repeatable)
  -h, --help                 Display help

An http(s):// endpoint is the SSE subscribe URL of a server; anything else is
a command line started as a stdio server.
`

export interface AdminIO {
  stdout: (chunk: string | Uint8Array) => void
  stderr: (text: string) => void
}

export type Connector = (endpoint: string) => Promise<Channel>

export interface AdminDependencies {
  io?: AdminIO
  connect?: Connector
  logger?: FastifyBaseLogger
}

const defaultIO: AdminIO = {
  stdout: chunk => { process.stdout.write(chunk) },
  stderr: text => { process.stderr.write(text) }
}

/**
 * SSE for http(s) URLs, a spawned stdio server otherwise.
 */
export async function connectEndpoint (endpoint: string): Promise<Channel> {
  if (/^https?:\/\//i.test(endpoint)) {
    return openSseChannel(endpoint)
  }
  return spawnStdioChannel(endpoint)
}

/**
 * Removes every `--root <name> <uri>` triple from argv.
 */
export function extractRoots (argv: readonly string[]): { roots: Root[], rest: string[] } {
  const roots: Root[] = []
  const rest: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--root') {
      const name = argv[i + 1]
      const uri = argv[i + 2]
      if (name === undefined || uri === undefined) {
        throw new InvalidParamsError('--root expects a name and a uri')
      }
      roots.push({ name, uri })
      i += 2
    } else if (arg !== undefined) {
      rest.push(arg)
    }
  }
  return { roots, rest }
}

export function parseParams (params: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {}
  for (const param of params) {
    const separator = param.indexOf('=')
    if (separator <= 0) {
      throw new InvalidParamsError(`Invalid parameter "${param}", expected key=value`)
    }
    parsed[param.slice(0, separator)] = param.slice(separator + 1)
  }
  return parsed
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on'])
const FALSE_VALUES = new Set(['false', '0', 'no', 'off'])

/**
 * Converts a command line value to the JSON type the tool declares.
 */
export function coerceValue (name: string, raw: string, type: unknown): unknown {
  switch (type) {
    case 'integer': {
      const value = Number(raw)
      if (raw.trim() === '' || !Number.isInteger(value)) {
        throw new InvalidParamsError(`Parameter ${name} must be an integer, got "${raw}"`)
      }
      return value
    }
    case 'number': {
      const value = Number(raw)
      if (raw.trim() === '' || Number.isNaN(value)) {
        throw new InvalidParamsError(`Parameter ${name} must be a number, got "${raw}"`)
      }
      return value
    }
    case 'boolean': {
      const normalized = raw.toLowerCase()
      if (TRUE_VALUES.has(normalized)) {
        return true
      }
      if (FALSE_VALUES.has(normalized)) {
        return false
      }
      throw new InvalidParamsError(`Parameter ${name} must be a boolean, got "${raw}"`)
    }
    case 'array':
    case 'object':
      try {
        return JSON.parse(raw)
      } catch (error) {
        throw new InvalidParamsError(`Parameter ${name} must be JSON: ${errorMessage(error)}`)
      }
    default:
      return raw
  }
}

export function coerceToolArguments (tool: ToolList['tools'][number], params: Record<string, string>): Record<string, unknown> {
  const properties = tool.inputSchema.properties ?? {}
  const args: Record<string, unknown> = {}
  for (const [name, raw] of Object.entries(params)) {
    args[name] = coerceValue(name, raw, properties[name]?.type)
  }
  return args
}

export function formatNotification (notification: JSONRPCNotification): string | undefined {
  const { method, params } = notification
  if (method === 'notifications/progress' && check(ProgressParamsSchema, params)) {
    const total = params.total === undefined ? '' : `/${params.total}`
    const message = params.message === undefined ? '' : ` ${params.message}`
    return `progress: ${params.progress}${total}${message}\n`
  }
  if (method === 'notifications/message' && check(LogMessageParamsSchema, params)) {
    const logger = params.logger === undefined ? '' : ` ${params.logger}:`
    const data = typeof params.data === 'string' ? params.data : JSON.stringify(params.data)
    return `[${params.level}]${logger} ${data}\n`
  }
  return undefined
}

/**
 * The item at a 1-based index; `undefined` when no index or 0 was given.
 */
function select<T> (items: readonly T[], index: string | undefined): T | undefined {
  if (index === undefined) {
    return undefined
  }
  const position = Number(index)
  if (!Number.isInteger(position) || position < 0) {
    throw new InvalidParamsError(`Invalid index "${index}"`)
  }
  if (position === 0) {
    return undefined
  }
  const item = items[position - 1]
  if (item === undefined) {
    throw new InvalidParamsError(`Only ${items.length} item(s) available`)
  }
  return item
}

class UsageError extends Error {}

/**
 * Runs one admin command and returns the process exit code.
 */
export async function runAdmin (argv: readonly string[], dependencies: AdminDependencies = {}): Promise<number> {
  const io = dependencies.io ?? defaultIO
  const connect = dependencies.connect ?? connectEndpoint
  const log = dependencies.logger

  let client: McpClient | undefined
  try {
    const { roots, rest } = extractRoots(argv)
    const { values, positionals } = parseArgs({
      args: rest,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        param: { type: 'string', short: 'p', multiple: true, default: [] },
        index: { type: 'string', short: 'n' }
      },
      allowPositionals: true,
      strict: true
    })

    if (values.help) {
      io.stdout(USAGE)
      return 0
    }

    const [group, second, third, fourth] = positionals
    const command = group === 'info' ? 'info' : `${group ?? ''} ${second ?? ''}`
    const endpoint = group === 'info' ? second : third
    const target = group === 'info' ? third : fourth
    if (endpoint === undefined) {
      throw new UsageError('Missing endpoint')
    }

    log?.debug({ endpoint, command }, 'connecting')
    const notify = (notification: JSONRPCNotification): void => {
      const line = formatNotification(notification)
      if (line !== undefined) {
        io.stderr(line)
      }
    }
    client = new McpClient(await connect(endpoint), { onNotification: notify })
    if (roots.length > 0) {
      await client.declareRoots(roots)
    }
    const initialize = await client.connect()
    const params = parseParams(values.param ?? [])
    const requireTarget = (what: string): string => {
      if (target === undefined) {
        throw new UsageError(`Missing ${what}`)
      }
      return target
    }

    let output: unknown
    switch (command) {
      case 'info':
        output = initialize
        break
      case 'tools list':
        output = (await client.listTools()).tools
        break
      case 'tools call': {
        const name = requireTarget('tool name')
        const tool = (await client.listTools()).tools.find(candidate => candidate.name === name)
        if (tool === undefined) {
          throw new NotFoundError(`Tool not found: ${name}`)
        }
        const result = await client.callTool(name, coerceToolArguments(tool, params), { onNotification: notify })
        output = select(result.content, values.index) ?? result.content
        break
      }
      case 'resources list':
        output = (await client.listResources()).resources
        break
      case 'resources templates':
        output = (await client.listResourceTemplates()).resourceTemplates
        break
      case 'resources read': {
        const { contents } = await client.readResource(requireTarget('resource uri'), { onNotification: notify })
        const content = select(contents, values.index)
        if (content === undefined) {
          output = contents.map(item => 'blob' in item ? { ...item, blob: '...' } : item)
          break
        }
        io.stdout('blob' in content ? Buffer.from(content.blob, 'base64') : `${content.text}\n`)
        return 0
      }
      case 'prompts list':
        output = (await client.listPrompts()).prompts
        break
      case 'prompts get': {
        const result = await client.getPrompt(requireTarget('prompt name'), params, { onNotification: notify })
        output = select(result.messages, values.index) ?? result
        break
      }
      default:
        throw new UsageError(`Unknown command: ${command.trim() || '(none)'}`)
    }

    io.stdout(stringify(output))
    return 0
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}\n${USAGE}`)
    } else {
      log?.debug({ err: error }, 'admin command failed')
      io.stderr(`Error: ${errorMessage(error)}\n`)
    }
    return 1
  } finally {
    if (client !== undefined) {
      await client.close()
    }
  }
}
