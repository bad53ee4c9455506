import fastify from 'fastify'
import { setTimeout as sleep } from 'node:timers/promises'
import mcpPlugin, { Type, text } from '../src/index.ts'
import { runStdioServer } from '../src/stdio.ts'

// stdout carries protocol frames only
const app = fastify({
  logger: false
})

await app.register(mcpPlugin, {
  serverInfo: {
    name: 'mcp-stdio-example',
    version: '1.0.0'
  },
  enableSSE: false,
  instructions: 'Example MCP server running over stdio.'
})

app.mcpAddTool({
  name: 'add',
  description: 'Add two integers',
  inputSchema: Type.Object({
    a: Type.Integer({ description: 'First operand' }),
    b: Type.Integer({ description: 'Second operand' })
  })
}, ({ a, b }) => a + b)

app.mcpAddTool({
  name: 'countdown',
  description: 'Counts down, reporting progress',
  inputSchema: Type.Object({
    from: Type.Integer({ minimum: 1, default: 3 })
  })
}, async ({ from }, { client }) => {
  for (let i = from; i > 0; i--) {
    client.progress(from - i + 1, from, `${i}...`)
    await sleep(100, undefined, { signal: client.signal })
  }
  return 'liftoff'
})

app.mcpAddResource({
  uri: 'system://info',
  name: 'System Information',
  description: 'Basic system information',
  mimeType: 'application/json'
}, () => ({
  platform: process.platform,
  nodeVersion: process.version,
  pid: process.pid
}))

app.mcpAddResource({
  uriTemplate: 'roots://{index}',
  name: 'Declared root',
  description: 'A root declared by the client'
}, (_uri, { index }, { client }) => {
  const root = client.roots[Number(index)]
  return root === undefined ? text('no such root') : text(root.uri, 'text/uri-list')
})

app.mcpAddPrompt({
  name: 'greeting',
  description: 'A greeting prompt',
  argumentSchema: Type.Object({
    name: Type.String({ description: 'Name to greet' })
  }),
  completions: {
    name: value => ['Ada', 'Alan', 'Grace'].filter(name => name.startsWith(value))
  }
}, (_name, { name }) => `Hello, ${name}! How can I help you today?`)

await runStdioServer(app)
