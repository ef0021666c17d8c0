import { ResultCell } from '../../core/result-cell.ts'
import type { TCallResult } from '../../core/result.ts'
import type { TOptionSet } from '../../core/types.ts'
import type { TPost } from '../../types/api.ts'
import type { TPostsRepository } from './posts.repository.ts'

export type TPostsViewModelOptions = {
  repository: TPostsRepository
}

/**
 * Owns one result cell per call shape and publishes each call's outcome into it.
 * Overlapping calls on the same cell are not ordered: whichever completes last is kept.
 */
export class PostsViewModel {
  readonly post = new ResultCell<TCallResult<TPost>>()
  readonly postById = new ResultCell<TCallResult<TPost>>()
  readonly postsByOwner = new ResultCell<TCallResult<TPost[]>>()
  readonly postsByOwnerFiltered = new ResultCell<TCallResult<TPost[]>>()
  readonly createdPost = new ResultCell<TCallResult<TPost>>()
  readonly createdFormPost = new ResultCell<TCallResult<TPost>>()

  private repository: TPostsRepository

  constructor(options: TPostsViewModelOptions) {
    this.repository = options.repository
  }

  public async loadPost(authorization?: string, signal?: AbortSignal): Promise<void> {
    this.post.set(await this.repository.fetchDefault({ authorization, signal }))
  }

  public async loadPostById(id: number, signal?: AbortSignal): Promise<void> {
    this.postById.set(await this.repository.fetchById(id, { signal }))
  }

  public async loadPostsByOwner(userId: number, signal?: AbortSignal): Promise<void> {
    this.postsByOwner.set(await this.repository.fetchByOwner(userId, { signal }))
  }

  public async loadPostsByOwnerFiltered(
    userId: number,
    optionSet: TOptionSet,
    signal?: AbortSignal,
  ): Promise<void> {
    this.postsByOwnerFiltered.set(
      await this.repository.fetchByOwnerFiltered(userId, optionSet, { signal }),
    )
  }

  public async pushPost(post: TPost, signal?: AbortSignal): Promise<void> {
    this.createdPost.set(await this.repository.create(post, { signal }))
  }

  public async pushPostForm(
    userId: number,
    id: number,
    title: string,
    body: string,
    signal?: AbortSignal,
  ): Promise<void> {
    this.createdFormPost.set(
      await this.repository.createForm(userId, id, title, body, { signal }),
    )
  }
}
