import { test } from 'node:test'
import type { TestContext } from 'node:test'
import * as assert from 'node:assert'
import { once } from 'node:events'
import { Type } from '@sinclair/typebox'
import { Registry } from '../src/registry.ts'
import { gate, openSession } from './helpers.ts'

function setup (t: TestContext) {
  const started = gate()
  const resume = gate()
  const registry = new Registry()

  registry.registerTool({ name: 'wait', inputSchema: Type.Object({}) }, async (_args, { client }) => {
    started.open()
    if (!client.signal.aborted) {
      await once(client.signal, 'abort')
    }
    client.progress(1, 1, 'after cancel')
    return 'done'
  })

  registry.registerResource({ uri: 'feed://slow', name: 'Slow feed' }, () => {
    async function * chunks () {
      yield 'first'
      started.open()
      await resume.promise
      yield 'second'
    }
    return chunks()
  })

  const opened = openSession(registry)
  t.after(async () => {
    resume.open()
    await opened.session.close()
  })
  return { ...opened, started: started.promise, resume: resume.open }
}

test('Cancellation', async (t) => {
  await t.test('should answer a cancelled request with a Cancelled error', async (t) => {
    const { peer, session, started } = setup(t)
    await peer.initialize()

    await peer.request(1, 'tools/call', { name: 'wait', _meta: { progressToken: 'p' } })
    await started
    await peer.notify('notifications/cancelled', { requestId: 1, reason: 'user stop' })

    assert.deepStrictEqual(await peer.next(), {
      jsonrpc: '2.0',
      id: 1,
      error: {
        code: -32001,
        message: 'Request cancelled',
        data: { reason: 'user stop', kind: 'Cancelled' }
      }
    })

    await peer.request(2, 'ping')
    assert.deepStrictEqual(await peer.next(), { jsonrpc: '2.0', id: 2, result: {} })

    await session.settled()
    assert.strictEqual(session.pendingRequests, 0)
  })

  await t.test('should stop reading a stream once cancelled', async (t) => {
    const { peer, started, resume } = setup(t)
    await peer.initialize()

    await peer.request('read', 'resources/read', { uri: 'feed://slow' })
    await started
    await peer.notify('notifications/cancelled', { requestId: 'read' })
    await peer.request('after', 'ping')
    assert.deepStrictEqual(await peer.next(), { jsonrpc: '2.0', id: 'after', result: {} })

    resume()
    assert.deepStrictEqual(await peer.next(), {
      jsonrpc: '2.0',
      id: 'read',
      error: { code: -32001, message: 'Request cancelled', data: { kind: 'Cancelled' } }
    })
  })

  await t.test('should ignore cancellation of an unknown request', async (t) => {
    const { peer } = setup(t)
    await peer.initialize()
    await peer.notify('notifications/cancelled', { requestId: 99 })
    await peer.notify('notifications/cancelled', { reason: 'no id' })
    await peer.request(3, 'ping')
    assert.deepStrictEqual(await peer.next(), { jsonrpc: '2.0', id: 3, result: {} })
  })
})
