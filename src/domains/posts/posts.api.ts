import { buildRequest } from '../../core/request-builder.ts'
import type { TCallResult } from '../../core/result.ts'
import { Transport } from '../../core/transport.ts'
import type { TCallOptions, TOptionSet } from '../../core/types.ts'
import { assertInteger } from '../../core/utils.ts'
import type { TPost } from '../../types/api.ts'
import { decodePost, decodePostList, encodePost, encodePostForm, validatePost } from './posts.codec.ts'
import { POST_ROUTES } from './posts.routes.ts'

export type TPostsApiOptions = {
  baseUrl: string
  transport: Transport
}

/**
 * Posts endpoints. Mirrors the API exactly: no caching, no retries.
 * Malformed arguments reject with ClientInputError before anything is sent.
 */
export interface TPostsApi {
  fetchDefault(options?: TCallOptions): Promise<TCallResult<TPost>>
  fetchById(id: number, options?: TCallOptions): Promise<TCallResult<TPost>>
  fetchByOwner(userId: number, options?: TCallOptions): Promise<TCallResult<TPost[]>>
  fetchByOwnerFiltered(
    userId: number,
    optionSet: TOptionSet,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost[]>>
  create(post: TPost, options?: TCallOptions): Promise<TCallResult<TPost>>
  createForm(
    userId: number,
    id: number,
    title: string,
    body: string,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost>>
}

export class PostsApi implements TPostsApi {
  private baseUrl: string
  private transport: Transport

  constructor(options: TPostsApiOptions) {
    this.baseUrl = options.baseUrl
    this.transport = options.transport
  }

  public async fetchDefault(options?: TCallOptions): Promise<TCallResult<TPost>> {
    const request = buildRequest(this.baseUrl, POST_ROUTES.fetchDefault, {}, options)
    return await this.transport.call(request, decodePost)
  }

  public async fetchById(id: number, options?: TCallOptions): Promise<TCallResult<TPost>> {
    assertInteger('id', id)
    const request = buildRequest(this.baseUrl, POST_ROUTES.fetchById, { path: { id } }, options)
    return await this.transport.call(request, decodePost)
  }

  public async fetchByOwner(
    userId: number,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost[]>> {
    assertInteger('userId', userId)
    const request = buildRequest(
      this.baseUrl,
      POST_ROUTES.fetchByOwner,
      { query: { userId } },
      options,
    )
    return await this.transport.call(request, decodePostList)
  }

  public async fetchByOwnerFiltered(
    userId: number,
    optionSet: TOptionSet,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost[]>> {
    assertInteger('userId', userId)
    const request = buildRequest(
      this.baseUrl,
      POST_ROUTES.fetchByOwnerFiltered,
      { query: { userId }, options: optionSet },
      options,
    )
    return await this.transport.call(request, decodePostList)
  }

  public async create(post: TPost, options?: TCallOptions): Promise<TCallResult<TPost>> {
    validatePost(post)
    const request = buildRequest(
      this.baseUrl,
      POST_ROUTES.create,
      { body: encodePost(post) },
      options,
    )
    return await this.transport.call(request, decodePost)
  }

  public async createForm(
    userId: number,
    id: number,
    title: string,
    body: string,
    options?: TCallOptions,
  ): Promise<TCallResult<TPost>> {
    const post: TPost = { userId, id, title, body }
    validatePost(post)
    const request = buildRequest(
      this.baseUrl,
      POST_ROUTES.createForm,
      { body: encodePostForm(post) },
      options,
    )
    return await this.transport.call(request, decodePost)
  }
}
