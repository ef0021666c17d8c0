import type { TCallResult } from '../../core/result.ts'
import type { TCallOptions, TOptionSet } from '../../core/types.ts'
import type { TPost } from '../../types/api.ts'
import type { TPostsApi } from './posts.api.ts'

/** Substitution seam between callers and the HTTP wiring. Same signatures as TPostsApi. */
export type TPostsRepository = TPostsApi

export type TPostsRepositoryOptions = {
  api: TPostsApi
}

/** Forwards every call to the API unchanged. */
export class PostsRepository implements TPostsRepository {
  private api: TPostsApi

  constructor(options: TPostsRepositoryOptions) {
    this.api = options.api
  }

  public fetchDefault(options?: TCallOptions): Promise<TCallResult<TPost>> {
    return this.api.fetchDefault(options)
  }

  public fetchById(id: number, options?: TCallOptions): Promise<TCallResult<TPost>> {
    return this.api.fetchById(id, options)
  }

  public fetchByOwner(userId: number, options?: TCallOptions): Promise<TCallResult<TPost[]>> {
    return this.api.fetchByOwner(userId, options)
  }

  public fetchByOwnerFiltered(
    userId: number,
    optionSet: TOptionSet,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost[]>> {
    return this.api.fetchByOwnerFiltered(userId, optionSet, options)
  }

  public create(post: TPost, options?: TCallOptions): Promise<TCallResult<TPost>> {
    return this.api.create(post, options)
  }

  public createForm(
    userId: number,
    id: number,
    title: string,
    body: string,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost>> {
    return this.api.createForm(userId, id, title, body, options)
  }
}
