import { ConfigurationError } from './errors.ts'
import type { TInterceptor } from './interceptors.ts'
import { normalizeBaseUrl, validateRequiredStrings } from './utils.ts'

export const DEFAULT_BASE_URL = 'https://jsonplaceholder.typicode.com'
export const DEFAULT_PLATFORM = 'Node'

/**
 * Client configuration. Built once by the application at startup and passed in
 * explicitly; nothing here is process-global.
 */
export type TPostsClientConfig = {
  baseUrl: string
  /** Sent as `x-platform` on every request. */
  platform: string
  /** Sent as `x-auth-token` on every request. */
  authToken: string
  fetchImplementation?: typeof fetch | undefined
  /** Extra interceptors, run after the static headers interceptor. */
  interceptors?: TInterceptor[]
}

/**
 * Reads the configuration from environment variables:
 * POSTS_API_BASE_URL, POSTS_API_PLATFORM and POSTS_API_AUTH_TOKEN (required).
 */
export function loadPostsClientConfig(env: NodeJS.ProcessEnv = process.env): TPostsClientConfig {
  const config: TPostsClientConfig = {
    baseUrl: normalizeBaseUrl(env.POSTS_API_BASE_URL || DEFAULT_BASE_URL),
    platform: env.POSTS_API_PLATFORM || DEFAULT_PLATFORM,
    authToken: env.POSTS_API_AUTH_TOKEN ?? '',
  }
  validatePostsClientConfig(config)
  return config
}

export function validatePostsClientConfig(config: TPostsClientConfig): void {
  validateRequiredStrings(config, ['baseUrl', 'platform', 'authToken'])
  if (!URL.canParse(config.baseUrl)) {
    throw new ConfigurationError(`baseUrl is not a valid URL: ${config.baseUrl}`)
  }
}
