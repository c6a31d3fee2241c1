import { z } from 'zod'

/**
 * A job read from a file, before registration. The spec itself is checked
 * by `register`, which knows the scheduler's timezone.
 */
export const jobDefinitionSchema = z.object({
  name: z.string().min(1, 'Job name is required').max(200),
  spec: z.string().min(1, 'Cron spec is required'),
  body: z.string(),
  path: z.string().min(1),
})

export type JobDefinition = z.infer<typeof jobDefinitionSchema>

/**
 * Join zod issues into one line: `spec: Cron spec is required; name: ...`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
