import type { TRouteDefinition } from '../../core/request-builder.ts'

/** Wire mapping of every posts operation. */
export const POST_ROUTES = {
  fetchDefault: { method: 'GET', path: '/posts/1', body: 'none' },
  fetchById: { method: 'GET', path: '/posts/{id}', body: 'none' },
  fetchByOwner: { method: 'GET', path: '/posts', query: ['userId'], body: 'none' },
  fetchByOwnerFiltered: {
    method: 'GET',
    path: '/posts',
    query: ['userId'],
    acceptsOptionSet: true,
    body: 'none',
  },
  create: { method: 'POST', path: '/posts', body: 'json' },
  createForm: { method: 'POST', path: '/posts', body: 'form' },
} as const satisfies Record<string, TRouteDefinition>

export type TPostOperation = keyof typeof POST_ROUTES
