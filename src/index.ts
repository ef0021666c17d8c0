// Client wiring
export { createPostsRepository, createPostsViewModel } from './client/posts-client.ts'

// Configuration
export {
  loadPostsClientConfig,
  validatePostsClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_PLATFORM,
} from './core/config.ts'
export type { TPostsClientConfig } from './core/config.ts'

// Posts domain
export { PostsApi } from './domains/posts/posts.api.ts'
export type { TPostsApi, TPostsApiOptions } from './domains/posts/posts.api.ts'
export { PostsRepository } from './domains/posts/posts.repository.ts'
export type { TPostsRepository } from './domains/posts/posts.repository.ts'
export { PostsViewModel } from './domains/posts/posts.view-model.ts'
export { POST_ROUTES } from './domains/posts/posts.routes.ts'
export type { TPostOperation } from './domains/posts/posts.routes.ts'
export {
  decodePost,
  decodePostList,
  encodePost,
  encodePostForm,
} from './domains/posts/posts.codec.ts'

// Transport pipeline
export { Transport } from './core/transport.ts'
export type { TTransportOptions } from './core/transport.ts'
export { composeInterceptors, createStaticHeadersInterceptor } from './core/interceptors.ts'
export type { TInterceptor, TNext, TStaticHeadersOptions } from './core/interceptors.ts'
export { buildRequest } from './core/request-builder.ts'
export type { TRouteDefinition, TRouteArguments, TBodyEncoding } from './core/request-builder.ts'

// Results
export { ResultCell } from './core/result-cell.ts'
export type { TObserver } from './core/result-cell.ts'
export {
  success,
  failure,
  transportError,
  isSuccess,
  isFailure,
  isTransportError,
  foldResult,
} from './core/result.ts'
export type {
  TCallResult,
  TCallSuccess,
  TCallFailure,
  TCallTransportError,
  TResultHandlers,
} from './core/result.ts'

// Errors
export {
  ConfigurationError,
  ClientInputError,
  ResponseDecodeError,
  AbortOperationError,
} from './core/errors.ts'

// Types
export type {
  THttpMethod,
  THeaders,
  TOptionSet,
  TRequestBody,
  TRequestDescription,
  TCallOptions,
} from './core/types.ts'
export type { TPost } from './types/api.ts'
