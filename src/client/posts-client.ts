import { validatePostsClientConfig, type TPostsClientConfig } from '../core/config.ts'
import { createStaticHeadersInterceptor } from '../core/interceptors.ts'
import { Transport } from '../core/transport.ts'
import { PostsApi } from '../domains/posts/posts.api.ts'
import { PostsRepository } from '../domains/posts/posts.repository.ts'
import { PostsViewModel } from '../domains/posts/posts.view-model.ts'

/**
 * Wires the pipeline for one configuration:
 *   static headers interceptor → extra interceptors → fetch
 */
export function createPostsRepository(config: TPostsClientConfig): PostsRepository {
  validatePostsClientConfig(config)

  const transport = new Transport({
    fetchImplementation: config.fetchImplementation,
    interceptors: [
      createStaticHeadersInterceptor({ platform: config.platform, authToken: config.authToken }),
      ...(config.interceptors ?? []),
    ],
  })
  const api = new PostsApi({ baseUrl: config.baseUrl, transport })

  return new PostsRepository({ api })
}

export function createPostsViewModel(config: TPostsClientConfig): PostsViewModel {
  return new PostsViewModel({ repository: createPostsRepository(config) })
}
