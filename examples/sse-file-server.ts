import Fastify from 'fastify'
import { createReadStream, promises as fs } from 'node:fs'
import { join, resolve, sep } from 'node:path'
import mcpPlugin, { NotFoundError, Type, stream } from '../src/index.ts'

const baseDir = resolve(process.env.FILES_DIR ?? process.cwd())

const fastify = Fastify({
  logger: {
    level: 'info'
  }
})

// Subscribe at GET /mcp/sub, publish at the URL announced in the endpoint event
await fastify.register(mcpPlugin, {
  serverInfo: {
    name: 'file-listing-server',
    version: '1.0.0'
  },
  instructions: `Lists and reads the files under ${baseDir}`,
  path: '/mcp',
  heartbeatInterval: 15_000
})

function inside (name: string): string {
  const path = resolve(baseDir, name)
  if (path !== baseDir && !path.startsWith(baseDir + sep)) {
    throw new NotFoundError(`Outside of the served directory: ${name}`)
  }
  return path
}

fastify.mcpAddTool({
  name: 'list_files',
  description: 'List the entries of a directory',
  inputSchema: Type.Object({
    path: Type.String({ description: 'Directory relative to the served root', default: '.' }),
    showHidden: Type.Boolean({ default: false })
  }),
  completions: {
    path: async value => {
      const entries = await fs.readdir(baseDir, { withFileTypes: true })
      return entries
        .filter(entry => entry.isDirectory() && entry.name.startsWith(value))
        .map(entry => entry.name)
    }
  }
}, async ({ path, showHidden }, { client, log }) => {
  const entries = await fs.readdir(inside(path), { withFileTypes: true })
  const visible = entries.filter(entry => showHidden || !entry.name.startsWith('.'))
  log.info({ path, count: visible.length }, 'listed directory')
  client.log('info', { path, count: visible.length }, 'files')
  return visible.map(entry => ({
    name: entry.name,
    type: entry.isDirectory() ? 'directory' : 'file'
  }))
})

fastify.mcpAddResource({
  uriTemplate: 'file:///{name}',
  name: 'File contents',
  description: 'A file directly under the served root',
  completions: {
    name: async value => (await fs.readdir(baseDir)).filter(name => name.startsWith(value))
  }
}, (_uri, { name }) => {
  const path = inside(decodeURIComponent(name))
  return stream(createReadStream(path))
})

fastify.mcpAddPrompt({
  name: 'summarize_file',
  description: 'Ask for a summary of a file',
  argumentSchema: Type.Object({
    name: Type.String({ description: 'File name' })
  })
}, async (_prompt, { name }) => {
  const content = await fs.readFile(inside(join('.', name)), 'utf8')
  return [`Summarize the following file (${name}):`, content]
})

await fastify.listen({ port: Number(process.env.PORT ?? 3000) })
