import { z } from 'zod';
import { REVIEW_STATES } from './types.js';

/** Schema for one element of the `/pulls/{n}/reviews` response */
export const RawReviewSchema = z.looseObject({
  user: z.object({ login: z.string() }).nullable().catch(null),
  state: z.enum(REVIEW_STATES),
  submitted_at: z.string().nullable().catch(null),
});

/**
 * Schema for a search-issues item, with the `reviews` array we attach after fetching.
 * Every field falls back to a default so one odd payload never drops the whole list.
 */
export const RawPullRequestSchema = z.looseObject({
  title: z.string().catch(''),
  user: z.object({ login: z.string() }).nullable().catch(null),
  html_url: z.string().catch(''),
  draft: z.boolean().catch(false),
  repository_url: z.string().catch(''),
  created_at: z.string().nullable().catch(null),
  pull_request: z.object({ url: z.string() }).optional().catch(undefined),
  reviews: z.array(z.unknown()).catch([]),
});

/** Schema for the search response envelope */
export const SearchResponseSchema = z.object({
  items: z.array(z.unknown()).catch([]),
});

/** Schema for an error body returned by the GitHub API */
export const ApiErrorSchema = z.object({
  message: z.string().catch(''),
});

/** Schema for one entry of the on-disk cache file */
export const CacheEntrySchema = z.object({
  timestamp: z.string(),
  prs: z.array(z.unknown()),
});

/** Schema for the whole cache file */
export const CacheFileSchema = z.record(z.string(), z.unknown());

export type RawReview = z.infer<typeof RawReviewSchema>;

export type RawPullRequest = z.infer<typeof RawPullRequestSchema>;

export type CacheFileEntry = z.infer<typeof CacheEntrySchema>;
