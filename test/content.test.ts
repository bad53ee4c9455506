import { test } from 'node:test'
import * as assert from 'node:assert'
import { Readable } from 'node:stream'
import {
  assistantMessage,
  binary,
  embedded,
  normalize,
  stream,
  text,
  toContentBlocks,
  toPromptMessages,
  toResourceContents,
  userMessage
} from '../src/features/content.ts'
import { CancelledError } from '../src/errors.ts'

const signal = new AbortController().signal

// Signature, IHDR chunk and the start of an IDAT chunk
const png = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.from([0, 0, 0, 13]), Buffer.from('IHDR'), Buffer.alloc(13), Buffer.alloc(4),
  Buffer.from([0, 0, 0, 1]), Buffer.from('IDAT'), Buffer.alloc(1), Buffer.alloc(4)
])

async function blocks (value: unknown) {
  return toContentBlocks(await normalize(value, signal), 'tool://test')
}

test('Content normalization', async (t) => {
  await t.test('should produce no content for undefined and null', async () => {
    assert.deepStrictEqual(await normalize(undefined, signal), [])
    assert.deepStrictEqual(await normalize(null, signal), [])
  })

  await t.test('should turn scalars into text', async () => {
    assert.deepStrictEqual(await normalize('hi', signal), [{ kind: 'text', text: 'hi' }])
    assert.deepStrictEqual(await normalize(42, signal), [{ kind: 'text', text: '42' }])
    assert.deepStrictEqual(await normalize(true, signal), [{ kind: 'text', text: 'true' }])
    assert.deepStrictEqual(await normalize(10n, signal), [{ kind: 'text', text: '10' }])
  })

  await t.test('should serialize plain objects as JSON', async () => {
    assert.deepStrictEqual(await normalize({ a: 1, b: [true] }, signal), [
      { kind: 'text', text: '{"a":1,"b":[true]}', mimeType: 'application/json' }
    ])
  })

  await t.test('should flatten arrays in order', async () => {
    assert.deepStrictEqual(await blocks(['first', 2, ['third']]), [
      { type: 'text', text: 'first' },
      { type: 'text', text: '2' },
      { type: 'text', text: 'third' }
    ])
  })

  await t.test('should map binary content by MIME family', async () => {
    const bytes = new Uint8Array([1, 2, 3])
    assert.deepStrictEqual(await blocks(binary(bytes, 'image/png')), [
      { type: 'image', data: 'AQID', mimeType: 'image/png' }
    ])
    assert.deepStrictEqual(await blocks(binary(bytes, 'audio/wav')), [
      { type: 'audio', data: 'AQID', mimeType: 'audio/wav' }
    ])
    assert.deepStrictEqual(await blocks(bytes), [
      { type: 'resource', resource: { uri: 'tool://test', mimeType: 'application/octet-stream', blob: 'AQID' } }
    ])
  })

  await t.test('should embed content that carries a uri', async () => {
    assert.deepStrictEqual(await blocks(embedded('docs://readme', '# Readme', 'text/markdown')), [
      { type: 'resource', resource: { uri: 'docs://readme', mimeType: 'text/markdown', text: '# Readme' } }
    ])
  })

  await t.test('should concatenate a text stream', async () => {
    async function * chunks () {
      yield 'hello, '
      yield 'world'
    }
    assert.deepStrictEqual(await blocks(chunks()), [{ type: 'text', text: 'hello, world' }])
  })

  await t.test('should concatenate a mixed stream into bytes', async () => {
    async function * chunks () {
      yield 'ab'
      yield new Uint8Array([99])
    }
    assert.deepStrictEqual(await blocks(chunks()), [
      { type: 'resource', resource: { uri: 'tool://test', mimeType: 'application/octet-stream', blob: 'YWJj' } }
    ])
  })

  await t.test('should keep the MIME type of a wrapped stream', async () => {
    const parts = await normalize(stream(Readable.from(['a,b\n', '1,2\n']), 'text/csv'), signal)
    assert.deepStrictEqual(toResourceContents(parts, 'data://table'), [
      { uri: 'data://table', mimeType: 'text/csv', text: 'a,b\n1,2\n' }
    ])
  })

  await t.test('should produce no content for an empty stream', async () => {
    async function * chunks () {}
    assert.deepStrictEqual(await normalize(chunks(), signal), [])
  })

  await t.test('should stop and destroy a stream once cancelled', async () => {
    const controller = new AbortController()
    controller.abort()
    const source = Readable.from(['a', 'b'])
    await assert.rejects(normalize(source, controller.signal), CancelledError)
    assert.strictEqual(source.destroyed, true)
  })

  await t.test('should reject values it cannot represent', async () => {
    await assert.rejects(normalize(() => 'nope', signal), TypeError)
  })
})

test('Resource contents', async (t) => {
  await t.test('should fall back to the declared MIME type', async () => {
    const parts = await normalize('{"ok":true}', signal)
    assert.deepStrictEqual(toResourceContents(parts, 'config://app', 'application/json'), [
      { uri: 'config://app', mimeType: 'application/json', text: '{"ok":true}' }
    ])
  })

  await t.test('should default text and bytes', async () => {
    const parts = await normalize(['plain', new Uint8Array([255])], signal)
    assert.deepStrictEqual(toResourceContents(parts, 'mem://x'), [
      { uri: 'mem://x', mimeType: 'text/plain', text: 'plain' },
      { uri: 'mem://x', mimeType: 'application/octet-stream', blob: '/w==' }
    ])
  })

  await t.test('should use the detected MIME type after the declared one', async () => {
    const parts = await normalize(png, signal)
    assert.deepStrictEqual(toResourceContents(parts, 'img://logo'), [
      { uri: 'img://logo', mimeType: 'image/png', blob: png.toString('base64') }
    ])
    assert.deepStrictEqual(toResourceContents(parts, 'img://logo', 'application/x-raw'), [
      { uri: 'img://logo', mimeType: 'application/x-raw', blob: png.toString('base64') }
    ])
  })

  await t.test('should prefer the MIME type of the value', async () => {
    const parts = await normalize(text('# Title', 'text/markdown'), signal)
    assert.deepStrictEqual(toResourceContents(parts, 'docs://a', 'text/plain'), [
      { uri: 'docs://a', mimeType: 'text/markdown', text: '# Title' }
    ])
  })
})

test('Prompt messages', async (t) => {
  await t.test('should make plain values user messages', async () => {
    assert.deepStrictEqual(await toPromptMessages(['Hello', assistantMessage('Hi there')], 'prompt://p', signal), [
      { role: 'user', content: { type: 'text', text: 'Hello' } },
      { role: 'assistant', content: { type: 'text', text: 'Hi there' } }
    ])
  })

  await t.test('should keep images in messages', async () => {
    const messages = await toPromptMessages(userMessage(binary(new Uint8Array([1, 2, 3]), 'image/png')), 'prompt://p', signal)
    assert.deepStrictEqual(messages, [
      { role: 'user', content: { type: 'image', data: 'AQID', mimeType: 'image/png' } }
    ])
  })

  await t.test('should embed other bytes under the prompt uri', async () => {
    const messages = await toPromptMessages(new Uint8Array([1, 2, 3]), 'prompt://p', signal)
    assert.deepStrictEqual(messages, [
      { role: 'user', content: { type: 'resource', resource: { uri: 'prompt://p', mimeType: 'application/octet-stream', blob: 'AQID' } } }
    ])
  })

  await t.test('should recognize untagged image bytes', async () => {
    const messages = await toPromptMessages(png, 'prompt://p', signal)
    assert.deepStrictEqual(messages, [
      { role: 'user', content: { type: 'image', data: png.toString('base64'), mimeType: 'image/png' } }
    ])
  })
})
