import { ClientInputError } from './errors.ts'
import { logger } from './logger.ts'
import type {
  TCallOptions,
  THeaders,
  THttpMethod,
  TOptionSet,
  TRequestBody,
  TRequestDescription,
} from './types.ts'
import { normalizeBaseUrl } from './utils.ts'

export type TBodyEncoding = 'none' | 'json' | 'form'

/** Declarative wire mapping of one remote operation. */
export type TRouteDefinition = {
  method: THttpMethod
  /** Path template; `{name}` segments are substituted from `TRouteArguments.path`. */
  path: string
  /** Named query parameters, in the order they are written to the URL. */
  query?: readonly string[]
  /** Whether an Option Set may be merged after the named query parameters. */
  acceptsOptionSet?: boolean
  body: TBodyEncoding
}

export type TRouteArguments = {
  path?: Readonly<Record<string, string | number>>
  query?: Readonly<Record<string, string | number>>
  options?: TOptionSet
  body?: TRequestBody
}

const CONTENT_TYPES: Record<Exclude<TBodyEncoding, 'none'>, string> = {
  json: 'application/json',
  form: 'application/x-www-form-urlencoded',
}

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g

/**
 * Interprets a route definition into a concrete request.
 *
 * Values are stringified and percent-encoded as needed to sit in the URL; nothing is
 * trimmed or case-folded. On an Option Set key that collides with a named query
 * parameter the named parameter wins and the colliding entry is dropped.
 */
export function buildRequest(
  baseUrl: string,
  route: TRouteDefinition,
  args: TRouteArguments = {},
  callOptions: TCallOptions = {},
): TRequestDescription {
  const path = route.path.replace(PLACEHOLDER, (_match, name: string) => {
    const value = args.path?.[name]
    if (value === undefined) throw new ClientInputError(`Missing path parameter: ${name}`)
    return encodeURIComponent(String(value))
  })

  const url = new URL(normalizeBaseUrl(baseUrl) + path)
  const namedQuery = route.query ?? []

  for (const name of namedQuery) {
    const value = args.query?.[name]
    if (value === undefined) throw new ClientInputError(`Missing query parameter: ${name}`)
    url.searchParams.append(name, String(value))
  }

  if (route.acceptsOptionSet && args.options) {
    for (const [key, value] of Object.entries(args.options)) {
      if (namedQuery.includes(key)) {
        logger.warn(`Option "${key}" collides with a named query parameter and was dropped`)
        continue
      }
      url.searchParams.append(key, value)
    }
  }

  const headers: THeaders = {}
  let body: TRequestBody | undefined
  if (route.body !== 'none') {
    body = expectBody(route.body, args.body)
    headers['content-type'] = CONTENT_TYPES[route.body]
  }

  return {
    method: route.method,
    url,
    headers,
    ...(body !== undefined ? { body } : {}),
    ...(callOptions.authorization !== undefined
      ? { authorization: callOptions.authorization }
      : {}),
    ...(callOptions.signal ? { signal: callOptions.signal } : {}),
  }
}

function expectBody(encoding: 'json' | 'form', body: TRequestBody | undefined): TRequestBody {
  if (encoding === 'json' && typeof body === 'string') return body
  if (encoding === 'form' && body instanceof URLSearchParams) return body
  throw new ClientInputError(`Route expects a ${encoding} body`)
}
