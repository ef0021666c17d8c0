import { AbortOperationError, ResponseDecodeError } from './errors.ts'
import { composeInterceptors, type TInterceptor, type TNext } from './interceptors.ts'
import { logger } from './logger.ts'
import { failure, isSuccessStatus, success, transportError, type TCallResult } from './result.ts'
import { USER_AGENT } from './sdk-info.ts'
import type { TBodyDecoder, TRequestDescription } from './types.ts'
import { headersToRecord, resolveFetch } from './utils.ts'

export type TTransportOptions = {
  interceptors?: TInterceptor[]
  fetchImplementation?: typeof fetch | undefined
}

/**
 * Runs requests through the interceptor chain and hands them to fetch.
 * No retries, no timeout of its own: a call runs to completion or to a transport fault.
 */
export class Transport {
  private fetchImplementation: typeof fetch
  private userAgent: string = USER_AGENT
  private chain: TNext

  constructor(options: TTransportOptions = {}) {
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
    this.chain = composeInterceptors(options.interceptors ?? [], (request) => this.send(request))
  }

  /** Raw pipeline: returns the server response as-is and lets any fault propagate. */
  public execute(request: TRequestDescription): Promise<Response> {
    return this.chain(request)
  }

  /**
   * Executes the request and classifies the outcome. A 2xx body is decoded with `decode`;
   * any other status yields a bodiless failure carrying the status code.
   */
  public async call<T>(
    request: TRequestDescription,
    decode: TBodyDecoder<T>,
  ): Promise<TCallResult<T>> {
    let response: Response
    try {
      response = await this.execute(request)
    } catch (caughtError) {
      return this.toTransportError(request, caughtError)
    }

    const headers = headersToRecord(response.headers)
    if (!isSuccessStatus(response.status)) {
      // Release the connection; a failure carries no body.
      await response.body?.cancel()
      return failure(response.status, headers)
    }

    let body: T
    try {
      body = decode(parseJson(await response.text()))
    } catch (caughtError) {
      return this.toTransportError(request, caughtError)
    }
    return success(response.status, headers, body)
  }

  private send(request: TRequestDescription): Promise<Response> {
    return this.fetchImplementation(request.url, {
      method: request.method,
      headers: { 'user-agent': this.userAgent, ...request.headers },
      body: request.body,
      signal: request.signal,
    })
  }

  private toTransportError(request: TRequestDescription, caughtError: unknown) {
    const cause: Error = request.signal?.aborted
      ? new AbortOperationError()
      : caughtError instanceof Error
        ? caughtError
        : new Error(String(caughtError))
    logger.warn(`Transport fault on ${request.method} ${request.url.pathname}:`, cause.message)
    return transportError(cause)
  }
}

function parseJson(text: string): unknown {
  if (text === '') return undefined
  try {
    return JSON.parse(text)
  } catch (caughtError) {
    const detail = caughtError instanceof Error ? caughtError.message : String(caughtError)
    throw new ResponseDecodeError(`Malformed JSON body: ${detail}`)
  }
}
