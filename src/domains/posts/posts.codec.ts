import { ClientInputError, ResponseDecodeError } from '../../core/errors.ts'
import { assertInteger } from '../../core/utils.ts'
import type { TPost } from '../../types/api.ts'

const INTEGER_TEXT = /^-?\d+$/

// Form-encoded creates are echoed back with their fields as strings, so integer
// fields also accept integer text.
function readInteger(source: object, key: 'userId' | 'id'): number {
  const value: unknown = Reflect.get(source, key)
  const parsed = typeof value === 'string' && INTEGER_TEXT.test(value) ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new ResponseDecodeError(`Post field "${key}" must be an integer`)
  }
  return parsed
}

function readString(source: object, key: 'title' | 'body'): string {
  const value: unknown = Reflect.get(source, key)
  if (typeof value !== 'string') {
    throw new ResponseDecodeError(`Post field "${key}" must be a string`)
  }
  return value
}

/** Validates a decoded JSON value as a post. Unknown extra fields are ignored. */
export function decodePost(value: unknown): TPost {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ResponseDecodeError('Expected a post object')
  }
  return {
    userId: readInteger(value, 'userId'),
    id: readInteger(value, 'id'),
    title: readString(value, 'title'),
    body: readString(value, 'body'),
  }
}

export function decodePostList(value: unknown): TPost[] {
  if (!Array.isArray(value)) throw new ResponseDecodeError('Expected an array of posts')
  return value.map((item: unknown) => decodePost(item))
}

/** Rejects a caller-built post before it is sent. */
export function validatePost(post: TPost): void {
  assertInteger('userId', post.userId)
  assertInteger('id', post.id)
  if (typeof post.title !== 'string') throw new ClientInputError('title must be a string')
  if (typeof post.body !== 'string') throw new ClientInputError('body must be a string')
}

export function encodePost(post: TPost): string {
  return JSON.stringify({ userId: post.userId, id: post.id, title: post.title, body: post.body })
}

export function encodePostForm(post: TPost): URLSearchParams {
  return new URLSearchParams([
    ['userId', String(post.userId)],
    ['id', String(post.id)],
    ['title', post.title],
    ['body', post.body],
  ])
}
