import { z } from 'zod';

export const VERDICTS = ['name-not-resolved', 'timeout', 'connection-reset'] as const;

export const verdictSchema = z.enum(VERDICTS);

export const precheckLogEntrySchema = z.object({
  timestamp: z.string(),
  error: verdictSchema.nullable(),
  urls: z.array(z.string()),
});

export const precheckLogSchema = z.record(z.string(), precheckLogEntrySchema);

export const exemptionScopeSchema = z.enum(['url', 'host', 'domain']);

export const precheckExemptionsSchema = z.object({
  scope: exemptionScopeSchema,
  entries: z.array(z.string()),
});

/** One list of URLs per reason, e.g. `deadServers`. */
export const ignoreListSchema = z.record(z.string(), z.array(z.string()));

export const pagesResponseSchema = z.object({
  data: z.array(z.object({ url: z.string() })),
  links: z
    .object({ next: z.string().nullish() })
    .optional(),
});

export const importJobResponseSchema = z.object({
  data: z.object({
    id: z.number(),
    status: z.string(),
    processing_errors: z.array(z.unknown()).nullish(),
  }),
});

/**
 * Locates the first problem in a failed parse, e.g. `"x.gov.error"`. The
 * returned details carry zod's own wording for the log.
 */
export function describeIssue(error: z.ZodError): { path: string; details: Record<string, unknown> } {
  const [issue] = error.issues;
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return { path, details: { path, issue: issue?.message } };
}
