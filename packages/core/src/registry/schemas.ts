import { z } from "zod";

/**
 * Tag entry as returned by the GitHub and GitLab tag listings.
 * Only the name is used; other fields are dropped.
 */
export const TagSchema = z.object({
  name: z.string(),
});

export const TagListSchema = z.array(TagSchema);

/**
 * One page of `GET /2.0/repositories/{repo}/refs/tags`.
 */
export const BitbucketTagPageSchema = z.object({
  values: z.array(TagSchema),
  next: z.string().url().optional(),
});

export type Tag = z.infer<typeof TagSchema>;
export type BitbucketTagPage = z.infer<typeof BitbucketTagPageSchema>;
