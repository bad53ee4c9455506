import type { ContentBlock, PromptMessage, ResourceContents, Role } from '../schema.ts'
import { fileTypeFromBuffer } from 'file-type'
import { CancelledError } from '../errors.ts'

export type StreamChunk = string | Uint8Array

/**
 * Text with an explicit MIME type.
 */
export class TextValue {
  readonly text: string
  readonly mimeType?: string

  constructor (text: string, mimeType?: string) {
    this.text = text
    this.mimeType = mimeType
  }
}

/**
 * Raw bytes with an explicit MIME type.
 */
export class BinaryValue {
  readonly data: Uint8Array
  readonly mimeType?: string

  constructor (data: Uint8Array, mimeType?: string) {
    this.data = data
    this.mimeType = mimeType
  }
}

/**
 * A source read chunk by chunk (a file stream, a generator). It is destroyed
 * once consumed.
 */
export class StreamValue {
  readonly source: AsyncIterable<unknown>
  readonly mimeType?: string

  constructor (source: AsyncIterable<unknown>, mimeType?: string) {
    this.source = source
    this.mimeType = mimeType
  }
}

/**
 * Content that carries its own URI, such as a document attached to a prompt.
 */
export class EmbeddedValue {
  readonly uri: string
  readonly content: string | Uint8Array
  readonly mimeType?: string

  constructor (uri: string, content: string | Uint8Array, mimeType?: string) {
    this.uri = uri
    this.content = content
    this.mimeType = mimeType
  }
}

export class PromptMessageValue {
  readonly role: Role
  readonly content: ContentValue

  constructor (role: Role, content: ContentValue) {
    this.role = role
    this.content = content
  }
}

/**
 * Anything a handler may return.
 */
export type ContentValue =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined
  | Uint8Array
  | TextValue
  | BinaryValue
  | StreamValue
  | EmbeddedValue
  | AsyncIterable<StreamChunk>
  | { [key: string]: unknown }
  | readonly ContentValue[]

export type PromptValue = ContentValue | PromptMessageValue | ReadonlyArray<PromptValue>

export function text (value: string, mimeType?: string): TextValue {
  return new TextValue(value, mimeType)
}

export function binary (data: Uint8Array, mimeType?: string): BinaryValue {
  return new BinaryValue(data, mimeType)
}

export function stream (source: AsyncIterable<StreamChunk>, mimeType?: string): StreamValue {
  return new StreamValue(source, mimeType)
}

export function embedded (uri: string, content: string | Uint8Array, mimeType?: string): EmbeddedValue {
  return new EmbeddedValue(uri, content, mimeType)
}

export function userMessage (content: ContentValue): PromptMessageValue {
  return new PromptMessageValue('user', content)
}

export function assistantMessage (content: ContentValue): PromptMessageValue {
  return new PromptMessageValue('assistant', content)
}

export type ContentPart =
  | { kind: 'text', text: string, mimeType?: string, uri?: string }
  | { kind: 'binary', data: Uint8Array, mimeType?: string, uri?: string, detectedMimeType?: string }

function isAsyncIterable (value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === 'function'
}

function destroy (source: object): void {
  if ('destroy' in source && typeof source.destroy === 'function') {
    source.destroy()
  }
}

async function consumeStream (source: AsyncIterable<unknown>, mimeType: string | undefined, signal: AbortSignal): Promise<ContentPart[]> {
  const chunks: StreamChunk[] = []
  let textOnly = true

  try {
    for await (const chunk of source) {
      if (signal.aborted) {
        throw new CancelledError()
      }
      if (typeof chunk === 'string') {
        chunks.push(chunk)
      } else if (chunk instanceof Uint8Array) {
        textOnly = false
        chunks.push(chunk)
      } else {
        throw new TypeError(`Unsupported stream chunk of type ${typeof chunk}`)
      }
    }
  } finally {
    destroy(source)
  }

  if (chunks.length === 0) {
    return []
  }
  if (textOnly) {
    return [{ kind: 'text', text: chunks.join(''), mimeType }]
  }
  const data = Buffer.concat(chunks.map(chunk => typeof chunk === 'string' ? Buffer.from(chunk) : chunk))
  return [{ kind: 'binary', data, mimeType }]
}

async function detectMimeType (part: ContentPart): Promise<ContentPart> {
  if (part.kind !== 'binary' || part.mimeType !== undefined) {
    return part
  }
  const detected = await fileTypeFromBuffer(part.data)
  return detected === undefined ? part : { ...part, detectedMimeType: detected.mime }
}

/**
 * Turns a handler's return value into an ordered list of content parts.
 * Binary parts without a MIME type get the one their bytes reveal, if any.
 */
export async function normalize (value: unknown, signal: AbortSignal): Promise<ContentPart[]> {
  const parts = await collectParts(value, signal)
  return Promise.all(parts.map(detectMimeType))
}

async function collectParts (value: unknown, signal: AbortSignal): Promise<ContentPart[]> {
  if (value === undefined || value === null) {
    return []
  }

  switch (typeof value) {
    case 'string':
      return [{ kind: 'text', text: value }]
    case 'number':
    case 'boolean':
    case 'bigint':
      return [{ kind: 'text', text: String(value) }]
    case 'object':
      break
    default:
      throw new TypeError(`Unsupported result of type ${typeof value}`)
  }

  if (value instanceof TextValue) {
    return [{ kind: 'text', text: value.text, mimeType: value.mimeType }]
  }
  if (value instanceof BinaryValue) {
    return [{ kind: 'binary', data: value.data, mimeType: value.mimeType }]
  }
  if (value instanceof EmbeddedValue) {
    return typeof value.content === 'string'
      ? [{ kind: 'text', text: value.content, mimeType: value.mimeType, uri: value.uri }]
      : [{ kind: 'binary', data: value.content, mimeType: value.mimeType, uri: value.uri }]
  }
  if (value instanceof StreamValue) {
    return consumeStream(value.source, value.mimeType, signal)
  }
  if (value instanceof Uint8Array) {
    return [{ kind: 'binary', data: value }]
  }
  if (Array.isArray(value)) {
    const parts: ContentPart[] = []
    for (const item of value) {
      parts.push(...await collectParts(item, signal))
    }
    return parts
  }
  if (isAsyncIterable(value)) {
    return consumeStream(value, undefined, signal)
  }

  return [{ kind: 'text', text: JSON.stringify(value), mimeType: 'application/json' }]
}

function toBase64 (data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64')
}

/**
 * Content blocks of a tool result or prompt message. Binary parts become image
 * or audio blocks by MIME family, otherwise a resource embedded under `fallbackUri`.
 */
export function toContentBlocks (parts: ContentPart[], fallbackUri: string): ContentBlock[] {
  return parts.map((part): ContentBlock => {
    if (part.kind === 'text') {
      if (part.uri !== undefined) {
        return { type: 'resource', resource: { uri: part.uri, mimeType: part.mimeType ?? 'text/plain', text: part.text } }
      }
      return { type: 'text', text: part.text }
    }

    const mimeType = part.mimeType ?? part.detectedMimeType ?? 'application/octet-stream'
    const data = toBase64(part.data)
    if (part.uri === undefined && mimeType.startsWith('image/')) {
      return { type: 'image', data, mimeType }
    }
    if (part.uri === undefined && mimeType.startsWith('audio/')) {
      return { type: 'audio', data, mimeType }
    }
    return { type: 'resource', resource: { uri: part.uri ?? fallbackUri, mimeType, blob: data } }
  })
}

/**
 * Contents of a resource read; MIME types fall back to the declared one, then
 * the detected one, then
 * `text/plain` or `application/octet-stream`.
 */
export function toResourceContents (parts: ContentPart[], uri: string, declaredMimeType?: string): ResourceContents[] {
  return parts.map((part): ResourceContents => {
    if (part.kind === 'text') {
      return { uri: part.uri ?? uri, mimeType: part.mimeType ?? declaredMimeType ?? 'text/plain', text: part.text }
    }
    const mimeType = part.mimeType ?? declaredMimeType ?? part.detectedMimeType ?? 'application/octet-stream'
    return { uri: part.uri ?? uri, mimeType, blob: toBase64(part.data) }
  })
}

/**
 * Messages of a prompt. Plain values become user messages, one per content part.
 */
export async function toPromptMessages (value: unknown, fallbackUri: string, signal: AbortSignal): Promise<PromptMessage[]> {
  if (Array.isArray(value)) {
    const messages: PromptMessage[] = []
    for (const item of value) {
      messages.push(...await toPromptMessages(item, fallbackUri, signal))
    }
    return messages
  }

  const role: Role = value instanceof PromptMessageValue ? value.role : 'user'
  const content: unknown = value instanceof PromptMessageValue ? value.content : value
  const blocks = toContentBlocks(await normalize(content, signal), fallbackUri)
  return blocks.map(block => ({ role, content: block }))
}
