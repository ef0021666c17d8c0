import type { THeaders } from './types.ts'

export type TCallSuccess<T> = {
  kind: 'success'
  statusCode: number
  headers: THeaders
  body: T
}

export type TCallFailure = {
  kind: 'failure'
  statusCode: number
  headers: THeaders
}

/** No usable response was received: network fault, abort, or an undecodable 2xx body. */
export type TCallTransportError = {
  kind: 'transport-error'
  cause: Error
}

/** Outcome of one remote operation. */
export type TCallResult<T> = TCallSuccess<T> | TCallFailure | TCallTransportError

export const success = <T>(statusCode: number, headers: THeaders, body: T): TCallSuccess<T> => ({
  kind: 'success',
  statusCode,
  headers,
  body,
})

export const failure = (statusCode: number, headers: THeaders = {}): TCallFailure => ({
  kind: 'failure',
  statusCode,
  headers,
})

export const transportError = (cause: Error): TCallTransportError => ({
  kind: 'transport-error',
  cause,
})

export function isSuccess<T>(result: TCallResult<T>): result is TCallSuccess<T> {
  return result.kind === 'success'
}
export function isFailure<T>(result: TCallResult<T>): result is TCallFailure {
  return result.kind === 'failure'
}
export function isTransportError<T>(result: TCallResult<T>): result is TCallTransportError {
  return result.kind === 'transport-error'
}

export type TResultHandlers<T, R> = {
  success: (result: TCallSuccess<T>) => R
  failure: (result: TCallFailure) => R
  transportError: (result: TCallTransportError) => R
}

/** Exhaustive branch over the three outcomes; none of them may be left unhandled. */
export function foldResult<T, R>(result: TCallResult<T>, handlers: TResultHandlers<T, R>): R {
  switch (result.kind) {
    case 'success':
      return handlers.success(result)
    case 'failure':
      return handlers.failure(result)
    case 'transport-error':
      return handlers.transportError(result)
  }
}

/** Status 200..299 counts as success. */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode <= 299
}
