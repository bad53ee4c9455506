import { test } from 'node:test'
import * as assert from 'node:assert'
import { resolveConfig } from '../src/config.ts'
import { Registry } from '../src/registry.ts'

test('resolveConfig', async (t) => {
  await t.test('should apply the defaults', () => {
    assert.deepStrictEqual(resolveConfig(), {
      serverInfo: { name: 'fastify-mcp-capabilities', version: '0.1.0' },
      path: '/mcp',
      enableSSE: true,
      heartbeatInterval: 30000,
      requestTimeout: 30000,
      maxCompletionValues: 100,
      defaultLogLevel: 'error'
    })
  })

  await t.test('should keep the given values', () => {
    const config = resolveConfig({
      serverInfo: { name: 'weather', version: '2.0.0' },
      instructions: 'Ask about the weather',
      path: '/api/mcp',
      enableSSE: false,
      heartbeatInterval: 5000,
      defaultLogLevel: 'warning'
    })
    assert.deepStrictEqual(config.serverInfo, { name: 'weather', version: '2.0.0' })
    assert.strictEqual(config.instructions, 'Ask about the weather')
    assert.strictEqual(config.path, '/api/mcp')
    assert.strictEqual(config.enableSSE, false)
    assert.strictEqual(config.heartbeatInterval, 5000)
    assert.strictEqual(config.requestTimeout, 30000)
    assert.strictEqual(config.defaultLogLevel, 'warning')
  })

  await t.test('should leave the registry and services out', () => {
    const config = resolveConfig({ registry: new Registry(), services: {} })
    assert.strictEqual('registry' in config, false)
    assert.strictEqual('services' in config, false)
  })

  await t.test('should accept the root path', () => {
    assert.strictEqual(resolveConfig({ path: '' }).path, '')
  })

  await t.test('should reject invalid values', () => {
    assert.throws(() => resolveConfig({ heartbeatInterval: 0 }), /^Error: Invalid MCP plugin options: \/heartbeatInterval: /)
    assert.throws(() => resolveConfig({ path: 'mcp' }), /Invalid MCP plugin options: \/path: /)
    assert.throws(() => resolveConfig({ maxCompletionValues: 1.5 }), /\/maxCompletionValues/)
  })
})
