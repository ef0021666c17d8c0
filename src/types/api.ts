/** One remote "post" resource, mirrored 1:1 onto its JSON object. */
export type TPost = Readonly<{
  userId: number
  id: number
  title: string
  body: string
}>
