import { RawPullRequestSchema, RawReviewSchema } from './schemas.js';
import type { PullRequest, Review, ReviewState } from './types.js';

function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Reviews are equal when reviewer, state and submission time all match */
export function sameReview(a: Review, b: Review): boolean {
  return (
    a.user === b.user &&
    a.state === b.state &&
    (a.submittedAt?.getTime() ?? null) === (b.submittedAt?.getTime() ?? null)
  );
}

/**
 * Parse a raw reviews array.
 * Entries with an unknown state (e.g. DISMISSED) or a non-object shape are skipped,
 * as are exact duplicates.
 */
export function toReviews(raw: unknown[]): Review[] {
  const reviews: Review[] = [];
  for (const item of raw) {
    const parsed = RawReviewSchema.safeParse(item);
    if (!parsed.success) continue;

    const review: Review = {
      user: parsed.data.user?.login ?? '',
      state: parsed.data.state,
      submittedAt: parseDate(parsed.data.submitted_at),
    };
    if (!reviews.some((r) => sameReview(r, review))) {
      reviews.push(review);
    }
  }
  return reviews;
}

/**
 * Normalize raw search items (as fetched or as cached) into pull requests.
 * Items that are not objects are skipped; missing fields get empty defaults.
 */
export function toPullRequests(raw: unknown[]): PullRequest[] {
  const prs: PullRequest[] = [];
  for (const item of raw) {
    const parsed = RawPullRequestSchema.safeParse(item);
    if (!parsed.success) continue;

    const pr = parsed.data;
    prs.push({
      title: pr.title,
      author: pr.user?.login ?? '',
      url: pr.html_url,
      draft: pr.draft,
      // repository_url looks like https://api.github.com/repos/<owner>/<repo>
      repo: pr.repository_url.split('/').pop() ?? '',
      createdAt: parseDate(pr.created_at),
      reviews: toReviews(pr.reviews),
    });
  }
  return prs;
}

/** Number of APPROVED reviews. Re-approvals after new pushes count again. */
export function numApprovals(pr: PullRequest): number {
  return pr.reviews.filter((r) => r.state === 'APPROVED').length;
}

/** Drop pull requests whose url was already seen, keeping the first occurrence */
export function dedupeByUrl(prs: PullRequest[]): PullRequest[] {
  const seen = new Set<string>();
  const unique: PullRequest[] = [];
  for (const pr of prs) {
    if (seen.has(pr.url)) continue;
    seen.add(pr.url);
    unique.push(pr);
  }
  return unique;
}

/**
 * State of the most recent submitted review by `me` (case-insensitive), or null
 * when `me` has not reviewed the pull request.
 */
export function myReviewStatus(pr: PullRequest, me: string): ReviewState | null {
  const login = me.toLowerCase();
  let latest: Review | null = null;
  for (const review of pr.reviews) {
    if (review.user.toLowerCase() !== login || !review.submittedAt) continue;
    if (!latest?.submittedAt || review.submittedAt > latest.submittedAt) {
      latest = review;
    }
  }
  return latest?.state ?? null;
}
