export const GITHUB_API_URL = 'https://api.github.com';

/** Search results per page. The search API caps this at 100. */
const SEARCH_PAGE_SIZE = 100;

/** Organization filter and time window shared by every search */
export interface QueryScope {
  org?: string;
  daysBack: number;
  now?: Date;
}

function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Calendar-date range `<start>..<end>` covering the last `daysBack` days.
 * Uses local dates, so the window always spans whole days.
 */
export function buildDateFilter(daysBack: number, now: Date = new Date()): string {
  const start = new Date(now);
  start.setDate(start.getDate() - daysBack);
  return `${formatDate(start)}..${formatDate(now)}`;
}

/**
 * Append the filters every query shares to a subject clause:
 * open pull requests created in the window, optionally limited to one org.
 * Clauses are joined with `+`, which the search API reads as a space.
 */
export function buildQuery(subjectClause: string, scope: QueryScope): string {
  const clauses = [
    subjectClause,
    'type:pr',
    'is:open',
    `created:${buildDateFilter(scope.daysBack, scope.now)}`,
  ];
  if (scope.org) {
    clauses.push(`org:${scope.org}`);
  }
  return clauses.join('+');
}

/** Open pull requests authored by `username` */
export function authoredQuery(username: string, scope: QueryScope): string {
  return buildQuery(`author:${username}`, scope);
}

/** Open pull requests waiting on a review from `username` */
export function reviewRequestedQuery(username: string, scope: QueryScope): string {
  return buildQuery(`review-requested:${username}`, scope);
}

/** Open pull requests waiting on a review from `team` (`org/team-slug`) */
export function teamReviewRequestedQuery(team: string, scope: QueryScope): string {
  return buildQuery(`team-review-requested:${team}`, scope);
}

/** Full search endpoint URL for a query */
export function searchUrl(query: string): string {
  return `${GITHUB_API_URL}/search/issues?q=${query}&per_page=${SEARCH_PAGE_SIZE}`;
}
