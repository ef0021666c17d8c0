import type { THeaders, TRequestDescription } from './types.ts'

export type TNext = (request: TRequestDescription) => Promise<Response>

/**
 * Chain (onion) interceptor. Receives the outgoing request and the rest of the chain;
 * returns whatever `next` returns. Faults from `next` must propagate unchanged.
 */
export type TInterceptor = (request: TRequestDescription, next: TNext) => Promise<Response>

/**
 * Wraps `terminal` so that interceptors run in array order on the way out:
 * interceptors[0] → interceptors[1] → … → terminal.
 */
export function composeInterceptors(interceptors: readonly TInterceptor[], terminal: TNext): TNext {
  return interceptors.reduceRight<TNext>(
    (next, interceptor) => (request) => interceptor(request, next),
    terminal,
  )
}

export type TStaticHeadersOptions = {
  /** Value of the `x-platform` header, e.g. `Node`. */
  platform: string
  /** Value of the `x-auth-token` header. */
  authToken: string
}

/**
 * Adds the fixed header set to every request:
 *   content-type: application/json   (only when no content type is present)
 *   x-platform:   <platform>
 *   x-auth-token: <authToken>
 *   authorization: <per-call value>  (only when the call supplied one)
 */
export function createStaticHeadersInterceptor(options: TStaticHeadersOptions): TInterceptor {
  return (request, next) => {
    const headers: THeaders = { ...request.headers }
    if (headers['content-type'] === undefined) headers['content-type'] = 'application/json'
    headers['x-platform'] = options.platform
    headers['x-auth-token'] = options.authToken
    if (request.authorization !== undefined) headers.authorization = request.authorization

    return next({ ...request, headers })
  }
}
