import { describe, test } from 'node:test'
import type { TestContext } from 'node:test'
import assert from 'node:assert'
import { once } from 'node:events'
import { Type } from '@sinclair/typebox'
import { Registry } from '../src/registry.ts'
import { Session } from '../src/session/session.ts'
import { createChannelPair } from '../src/transports/memory.ts'
import { McpClient } from '../src/client/client.ts'
import type { McpClientOptions } from '../src/client/client.ts'
import { SseParser } from '../src/client/sse-channel.ts'
import { splitCommandLine } from '../src/client/stdio-channel.ts'
import { CancelledError, NotFoundError, TransportError } from '../src/errors.ts'
import type { JSONRPCNotification } from '../src/schema.ts'
import { gate, serverInfo, silentLogger } from './helpers.ts'

function createRegistry (started: () => void = () => {}): Registry {
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
    client.roots.map(root => root.uri).join(','))
  registry.registerTool({ name: 'wait', inputSchema: Type.Object({}) }, async (_args, { client }) => {
    started()
    if (!client.signal.aborted) {
      await once(client.signal, 'abort')
    }
    return 'done'
  })
  registry.registerResource({ uriTemplate: 'notes://{id}', name: 'Note' }, (_uri, { id }) => `note ${id}`)
  registry.registerPrompt({
    name: 'greet',
    argumentSchema: Type.Object({ name: Type.String() }),
    completions: {
      name: value => ['Ada', 'Alan', 'Grace'].filter(name => name.startsWith(value))
    }
  }, (_prompt, { name }) => `Hello ${name}`)
  return registry
}

function setup (t: TestContext, registry: Registry = createRegistry(), options: McpClientOptions = {}) {
  const [serverEnd, clientEnd] = createChannelPair('client-session')
  const session = new Session(serverEnd, { registry, logger: silentLogger, serverInfo })
  const done = session.start()
  const client = new McpClient(clientEnd, options)
  t.after(async () => {
    await client.close()
    await session.close()
  })
  return { session, client, done }
}

describe('McpClient', () => {
  test('should perform the handshake', async (t) => {
    const { client } = setup(t)
    assert.strictEqual(client.connected, false)

    const result = await client.connect()
    assert.deepStrictEqual(result.serverInfo, serverInfo)
    assert.strictEqual(result.protocolVersion, '2024-11-05')
    assert.deepStrictEqual(client.serverInfo, serverInfo)
    assert.deepStrictEqual(client.serverCapabilities?.tools, { listChanged: false })
    assert.strictEqual(client.connected, true)
    assert.strictEqual(await client.connect(), result)
  })

  test('should call tools and route their notifications', async (t) => {
    const global: JSONRPCNotification[] = []
    const { client, session } = setup(t, createRegistry(), { onNotification: notification => global.push(notification) })
    await client.connect()

    const id = client.peekNextId()
    const own: JSONRPCNotification[] = []
    const result = await client.callTool('add', { a: 10, b: 20 }, { onNotification: notification => own.push(notification) })

    assert.deepStrictEqual(result, { content: [{ type: 'text', text: '30' }] })
    assert.deepStrictEqual(own, [
      { jsonrpc: '2.0', method: 'notifications/progress', params: { progressToken: id, progress: 1, total: 2, message: 'half' } },
      { jsonrpc: '2.0', method: 'notifications/message', params: { level: 'error', data: 'adding', _meta: { requestId: id } } }
    ])
    assert.deepStrictEqual(global, [])

    session.logging.log('critical', 'idle')
    await client.ping()
    assert.deepStrictEqual(global, [
      { jsonrpc: '2.0', method: 'notifications/message', params: { level: 'critical', data: 'idle' } }
    ])
  })

  test('should rebuild server errors', async (t) => {
    const { client } = setup(t)
    await client.connect()

    await assert.rejects(client.callTool('nope'), (error: unknown) => {
      assert.ok(error instanceof NotFoundError)
      assert.strictEqual(error.code, -32602)
      assert.strictEqual(error.message, 'Tool not found: nope')
      return true
    })
  })

  test('should push roots declared before the handshake', async (t) => {
    const { client } = setup(t)
    await client.declareRoots([{ uri: 'file:///work', name: 'work' }])
    await client.connect()

    assert.deepStrictEqual(await client.callTool('roots'), { content: [{ type: 'text', text: 'file:///work' }] })
  })

  test('should push roots declared after the handshake', async (t) => {
    const { client } = setup(t)
    await client.connect()
    await client.declareRoots([{ uri: 'file:///a' }, { uri: 'file:///b' }])

    assert.deepStrictEqual(client.roots, [{ uri: 'file:///a' }, { uri: 'file:///b' }])
    assert.deepStrictEqual(await client.callTool('roots'), { content: [{ type: 'text', text: 'file:///a,file:///b' }] })
  })

  test('should read resources and list templates', async (t) => {
    const { client } = setup(t)
    await client.connect()

    assert.deepStrictEqual(await client.listResourceTemplates(), {
      resourceTemplates: [{ uriTemplate: 'notes://{id}', name: 'Note' }]
    })
    assert.deepStrictEqual(await client.readResource('notes://7'), {
      contents: [{ uri: 'notes://7', mimeType: 'text/plain', text: 'note 7' }]
    })
  })

  test('should render prompts and complete their arguments', async (t) => {
    const { client } = setup(t)
    await client.connect()

    assert.deepStrictEqual(await client.getPrompt('greet', { name: 'Ada' }), {
      messages: [{ role: 'user', content: { type: 'text', text: 'Hello Ada' } }]
    })
    assert.deepStrictEqual(await client.complete({ type: 'ref/prompt', name: 'greet' }, { name: 'name', value: 'A' }), {
      completion: { values: ['Ada', 'Alan'], total: 2, hasMore: false }
    })
  })

  test('should cancel a request in flight', async (t) => {
    const started = gate()
    const { client } = setup(t, createRegistry(started.open))
    await client.connect()

    const id = client.peekNextId()
    const call = client.callTool('wait')
    await started.promise
    await client.cancel(id, 'user stop')

    await assert.rejects(call, (error: unknown) => {
      assert.ok(error instanceof CancelledError)
      assert.strictEqual(error.code, -32001)
      assert.strictEqual(error.message, 'Request cancelled')
      return true
    })
  })

  test('should end the session on shutdown', async (t) => {
    const { client, session, done } = setup(t)
    await client.connect()
    await client.shutdown()
    await done

    assert.strictEqual(session.state, 'closed')
    assert.strictEqual(client.connected, false)
    await assert.rejects(client.ping(), { name: 'TransportError', message: 'Client closed' })
  })

  test('should time out requests nobody answers', async (t) => {
    const [, clientEnd] = createChannelPair()
    const client = new McpClient(clientEnd, { requestTimeout: 20 })
    t.after(() => client.close())

    await assert.rejects(client.ping(), (error: unknown) => {
      assert.ok(error instanceof TransportError)
      assert.strictEqual(error.message, 'Request ping timed out after 20ms')
      return true
    })
  })
})

test('SseParser', async (t) => {
  await t.test('should parse events across chunks', () => {
    const parser = new SseParser()
    const events = parser.feed('event: endpoint\r\ndata: /mcp/pub/1\r\n\r\n: heartbeat\n\nid: 3\ndata: {"a":\ndata: 1}\n\ndata: partial')
    assert.deepStrictEqual(events, [
      { event: 'endpoint', data: '/mcp/pub/1' },
      { event: 'message', data: '{"a":\n1}', id: '3' }
    ])
    assert.deepStrictEqual(parser.feed('\n\n'), [{ event: 'message', data: 'partial' }])
  })
})

test('splitCommandLine', async (t) => {
  await t.test('should keep quoted words together', () => {
    assert.deepStrictEqual(
      splitCommandLine('node "my server.ts" --name \'a b\' plain'),
      ['node', 'my server.ts', '--name', 'a b', 'plain']
    )
  })

  await t.test('should return nothing for a blank line', () => {
    assert.deepStrictEqual(splitCommandLine('   '), [])
  })
})
