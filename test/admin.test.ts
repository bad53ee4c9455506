import { describe, test } from 'node:test'
import type { TestContext } from 'node:test'
import assert from 'node:assert'
import { parse } from 'yaml'
import { Type } from '@sinclair/typebox'
import { Registry } from '../src/registry.ts'
import { Session } from '../src/session/session.ts'
import { createChannelPair } from '../src/transports/memory.ts'
import { USAGE, coerceValue, extractRoots, formatNotification, parseParams, runAdmin } from '../src/admin/commands.ts'
import type { Channel } from '../src/transports/transport.ts'
import { field, serverInfo, silentLogger } from './helpers.ts'

function createRegistry (): Registry {
  const registry = new Registry()
  registry.registerTool({
    name: 'add',
    inputSchema: Type.Object({ a: Type.Integer(), b: Type.Integer() })
  }, ({ a, b }, { client }) => {
    client.progress(1, 2, 'half')
    client.log('error', 'adding')
    return a + b
  })
  registry.registerTool({ name: 'roots', inputSchema: Type.Object({}) }, (_args, { client }) =>
    client.roots.map(root => `${root.name ?? ''}=${root.uri}`).join(','))
  registry.registerResource({ uriTemplate: 'notes://{id}', name: 'Note' }, (_uri, { id }) => `note ${id}`)
  registry.registerResource({ uri: 'multi://x', name: 'Two parts' }, () => ['first', 'second'])
  registry.registerResource({ uri: 'bin://x', name: 'Bytes' }, () => Buffer.from('hi'))
  registry.registerPrompt({
    name: 'greet',
    argumentSchema: Type.Object({ name: Type.String() })
  }, (_prompt, { name }) => `Hello ${name}`)
  return registry
}

async function run (t: TestContext, argv: string[]) {
  const registry = createRegistry()
  const endpoints: string[] = []
  const sessions: Session[] = []
  let stdout = ''
  let stderr = ''

  t.after(async () => {
    for (const session of sessions) {
      await session.close()
    }
  })

  const code = await runAdmin(argv, {
    io: {
      stdout: chunk => { stdout += typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8') },
      stderr: text => { stderr += text }
    },
    connect: async (endpoint: string): Promise<Channel> => {
      endpoints.push(endpoint)
      const [serverEnd, clientEnd] = createChannelPair()
      const session = new Session(serverEnd, { registry, logger: silentLogger, serverInfo })
      sessions.push(session)
      session.start().catch((error: unknown) => {
        stderr += `session failed: ${String(error)}\n`
      })
      return clientEnd
    },
    logger: silentLogger
  })
  return { code, stdout, stderr, endpoints }
}

describe('runAdmin', () => {
  test('should print server info', async (t) => {
    const { code, stdout, endpoints } = await run(t, ['info', 'mem://server'])
    assert.strictEqual(code, 0)
    assert.deepStrictEqual(endpoints, ['mem://server'])
    assert.deepStrictEqual(field(parse(stdout), 'serverInfo'), serverInfo)
  })

  test('should call a tool with coerced parameters', async (t) => {
    const { code, stdout, stderr } = await run(t, ['tools', 'call', 'mem://server', 'add', '-p', 'a=10', '-p', 'b=20'])
    assert.strictEqual(code, 0)
    assert.deepStrictEqual(parse(stdout), [{ type: 'text', text: '30' }])
    assert.strictEqual(stderr, 'progress: 1/2 half\n[error] adding\n')
  })

  test('should list tools', async (t) => {
    const { code, stdout } = await run(t, ['tools', 'list', 'mem://server'])
    assert.strictEqual(code, 0)
    const tools = parse(stdout)
    assert.ok(Array.isArray(tools))
    assert.deepStrictEqual(tools.map(tool => field(tool, 'name')), ['add', 'roots'])
  })

  test('should declare roots before invoking', async (t) => {
    const { code, stdout } = await run(t, ['--root', 'work', 'file:///work', 'tools', 'call', 'mem://server', 'roots'])
    assert.strictEqual(code, 0)
    assert.deepStrictEqual(parse(stdout), [{ type: 'text', text: 'work=file:///work' }])
  })

  test('should print the n-th content of a resource, counting from 1', async (t) => {
    const first = await run(t, ['resources', 'read', 'mem://server', 'multi://x', '-n', '1'])
    assert.strictEqual(first.code, 0)
    assert.strictEqual(first.stdout, 'first\n')

    const second = await run(t, ['resources', 'read', 'mem://server', 'multi://x', '-n', '2'])
    assert.strictEqual(second.stdout, 'second\n')
  })

  test('should print every content when no index or 0 is given', async (t) => {
    const { code, stdout } = await run(t, ['resources', 'read', 'mem://server', 'multi://x', '-n', '0'])
    assert.strictEqual(code, 0)
    assert.deepStrictEqual(parse(stdout), [
      { uri: 'multi://x', mimeType: 'text/plain', text: 'first' },
      { uri: 'multi://x', mimeType: 'text/plain', text: 'second' }
    ])
  })

  test('should elide blobs in listings and decode a selected one', async (t) => {
    const listed = await run(t, ['resources', 'read', 'mem://server', 'bin://x'])
    assert.deepStrictEqual(parse(listed.stdout), [
      { uri: 'bin://x', mimeType: 'application/octet-stream', blob: '...' }
    ])

    const selected = await run(t, ['resources', 'read', 'mem://server', 'bin://x', '-n', '1'])
    assert.strictEqual(selected.code, 0)
    assert.strictEqual(selected.stdout, 'hi')
  })

  test('should list resource templates', async (t) => {
    const { stdout } = await run(t, ['resources', 'templates', 'mem://server'])
    assert.deepStrictEqual(parse(stdout), [{ uriTemplate: 'notes://{id}', name: 'Note' }])
  })

  test('should render a prompt', async (t) => {
    const { code, stdout } = await run(t, ['prompts', 'get', 'mem://server', 'greet', '-p', 'name=Ada'])
    assert.strictEqual(code, 0)
    assert.deepStrictEqual(parse(stdout), {
      messages: [{ role: 'user', content: { type: 'text', text: 'Hello Ada' } }]
    })
  })

  test('should report an unknown tool', async (t) => {
    const { code, stdout, stderr } = await run(t, ['tools', 'call', 'mem://server', 'nope'])
    assert.strictEqual(code, 1)
    assert.strictEqual(stdout, '')
    assert.strictEqual(stderr, 'Error: Tool not found: nope\n')
  })

  test('should report parameters of the wrong type', async (t) => {
    const { code, stderr } = await run(t, ['tools', 'call', 'mem://server', 'add', '-p', 'a=ten', '-p', 'b=1'])
    assert.strictEqual(code, 1)
    assert.strictEqual(stderr, 'Error: Parameter a must be an integer, got "ten"\n')
  })

  test('should report an index out of range', async (t) => {
    const { code, stderr } = await run(t, ['resources', 'read', 'mem://server', 'notes://7', '-n', '5'])
    assert.strictEqual(code, 1)
    assert.strictEqual(stderr, 'Error: Only 1 item(s) available\n')
  })

  test('should report an index that is not a count', async (t) => {
    const { code, stderr } = await run(t, ['resources', 'read', 'mem://server', 'notes://7', '-n', 'x'])
    assert.strictEqual(code, 1)
    assert.strictEqual(stderr, 'Error: Invalid index "x"\n')
  })

  test('should print usage when the endpoint is missing', async (t) => {
    const { code, stderr, endpoints } = await run(t, ['tools', 'list'])
    assert.strictEqual(code, 1)
    assert.strictEqual(stderr, `Error: Missing endpoint\n${USAGE}`)
    assert.deepStrictEqual(endpoints, [])
  })

  test('should print help', async (t) => {
    const { code, stdout } = await run(t, ['--help'])
    assert.strictEqual(code, 0)
    assert.strictEqual(stdout, USAGE)
  })
})

describe('Admin helpers', () => {
  test('should extract roots from argv', () => {
    assert.deepStrictEqual(extractRoots(['--root', 'w', 'file:///w', 'info', 'x']), {
      roots: [{ name: 'w', uri: 'file:///w' }],
      rest: ['info', 'x']
    })
    assert.throws(() => extractRoots(['info', '--root', 'w']), { message: '--root expects a name and a uri' })
  })

  test('should split parameters on the first equals sign', () => {
    assert.deepStrictEqual(parseParams(['a=b=c', 'empty=']), { a: 'b=c', empty: '' })
    assert.throws(() => parseParams(['=x']), { message: 'Invalid parameter "=x", expected key=value' })
  })

  test('should coerce values to the declared type', () => {
    assert.strictEqual(coerceValue('flag', 'yes', 'boolean'), true)
    assert.strictEqual(coerceValue('flag', 'OFF', 'boolean'), false)
    assert.strictEqual(coerceValue('ratio', '2.5', 'number'), 2.5)
    assert.deepStrictEqual(coerceValue('filter', '{"a":1}', 'object'), { a: 1 })
    assert.strictEqual(coerceValue('name', '42', undefined), '42')
    assert.throws(() => coerceValue('count', '1.5', 'integer'), { message: 'Parameter count must be an integer, got "1.5"' })
  })

  test('should format progress and log notifications', () => {
    assert.strictEqual(
      formatNotification({ jsonrpc: '2.0', method: 'notifications/progress', params: { progressToken: 1, progress: 3 } }),
      'progress: 3\n'
    )
    assert.strictEqual(
      formatNotification({ jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info', logger: 'db', data: { rows: 2 } } }),
      '[info] db: {"rows":2}\n'
    )
    assert.strictEqual(formatNotification({ jsonrpc: '2.0', method: 'notifications/other' }), undefined)
  })
})
