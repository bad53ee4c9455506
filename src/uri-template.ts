import { RegistrationError } from './errors.ts'

type Segment = { literal: string } | { param: string }

const PLACEHOLDER = /^\{([A-Za-z_][A-Za-z0-9_.-]*)\}$/

/**
 * Splits a URI into its `scheme://` prefix and its `/`-separated segments.
 * An escaped separator (`%2F`) stays inside its segment.
 */
function splitUri (uri: string): { scheme: string, segments: string[] } {
  const index = uri.indexOf('://')
  if (index === -1) {
    return { scheme: '', segments: uri.split('/') }
  }
  return {
    scheme: uri.slice(0, index + 3),
    segments: uri.slice(index + 3).split('/')
  }
}

/**
 * A resource URI pattern made of literal segments and `{param}` placeholders,
 * each placeholder standing for exactly one non-empty segment.
 */
export class UriTemplate {
  readonly pattern: string
  readonly params: readonly string[]
  private readonly scheme: string
  private readonly segments: readonly Segment[]

  constructor (pattern: string) {
    const { scheme, segments } = splitUri(pattern)
    if (scheme.includes('{') || scheme.includes('}')) {
      throw new RegistrationError(`Invalid URI template "${pattern}": placeholders are not allowed in the scheme`)
    }

    const params: string[] = []
    const parsed: Segment[] = []
    for (const segment of segments) {
      const match = PLACEHOLDER.exec(segment)
      if (match !== null) {
        const name = match[1]
        if (params.includes(name)) {
          throw new RegistrationError(`Invalid URI template "${pattern}": duplicate parameter "${name}"`)
        }
        params.push(name)
        parsed.push({ param: name })
      } else if (segment.includes('{') || segment.includes('}')) {
        throw new RegistrationError(`Invalid URI template "${pattern}": a placeholder must span a whole segment`)
      } else {
        parsed.push({ literal: segment })
      }
    }

    this.pattern = pattern
    this.scheme = scheme
    this.segments = Object.freeze(parsed)
    this.params = Object.freeze(params)
  }

  static isTemplate (uri: string): boolean {
    return uri.includes('{')
  }

  /**
   * Binds the placeholders to the segments of `uri`, or returns undefined when
   * the URI does not have the template's shape.
   */
  match (uri: string): Record<string, string> | undefined {
    const { scheme, segments } = splitUri(uri)
    if (scheme !== this.scheme || segments.length !== this.segments.length) {
      return undefined
    }

    const params: Record<string, string> = {}
    for (let i = 0; i < segments.length; i++) {
      const expected = this.segments[i]
      const actual = segments[i]
      if ('literal' in expected) {
        if (expected.literal !== actual) {
          return undefined
        }
      } else {
        if (actual.length === 0) {
          return undefined
        }
        params[expected.param] = actual
      }
    }
    return params
  }

  toString (): string {
    return this.pattern
  }
}
