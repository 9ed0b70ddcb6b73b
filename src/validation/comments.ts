import { z } from 'zod'

export const submitCommentSchema = z.object({
  url: z.string().min(1),
  comment_author: z.string().min(1),
  comment_author_email: z.string().default(''),
  comment_author_url: z.string().default(''),
  comment_content: z.string().min(1),
  user_ip: z.string().default(''),
  user_agent: z.string().default(''),
  referrer: z.string().default(''),
})

export type CommentSubmission = z.input<typeof submitCommentSchema>

export const listCommentsQuerySchema = z.object({
  url: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).optional(),
})

export const commentFormSchema = submitCommentSchema.pick({
  url: true,
  comment_author: true,
  comment_author_email: true,
  comment_author_url: true,
  comment_content: true,
})

/** Name the first offending field the way the form reports it, e.g. "bad url value". */
export function describeIssue(error: z.ZodError): string {
  const field = error.issues[0]?.path[0]
  return `bad ${typeof field === 'string' ? field : 'request'} value`
}
