export type THttpMethod = 'GET' | 'POST'

/** Lowercase header name to value. */
export type THeaders = Record<string, string>

/** Extra query parameters merged after an operation's named parameters. */
export type TOptionSet = Readonly<Record<string, string>>

export type TRequestBody = string | URLSearchParams

/** A fully built request, as it travels through the interceptor chain. */
export type TRequestDescription = {
  method: THttpMethod
  url: URL
  headers: THeaders
  body?: TRequestBody
  /** Per-call authorization value; the static headers interceptor turns it into a header. */
  authorization?: string
  signal?: AbortSignal
}

export type TCallOptions = {
  signal?: AbortSignal
  authorization?: string
}

export type TBodyDecoder<T> = (value: unknown) => T
