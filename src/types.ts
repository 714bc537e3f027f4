/** Review states the GitHub reviews endpoint reports for submitted and draft reviews */
export const REVIEW_STATES = ['COMMENTED', 'PENDING', 'CHANGES_REQUESTED', 'APPROVED'] as const;

export type ReviewState = (typeof REVIEW_STATES)[number];

/** A single review left on a pull request */
export interface Review {
  user: string;
  state: ReviewState;
  submittedAt: Date | null;
}

/** Normalized pull request. Identity is the html url. */
export interface PullRequest {
  title: string;
  author: string;
  url: string;
  draft: boolean;
  repo: string;
  createdAt: Date | null;
  reviews: Review[];
}

/** A cache entry as handed back to callers: raw payloads plus fetch time */
export interface CachedPullRequests {
  timestamp: Date;
  prs: unknown[];
}

/** Outcome of a search request after rate-limit handling */
export type FetchResult =
  | { ok: true; items: unknown[] }
  | { ok: false; reason: string };

/** Receives human-readable progress text (rate-limit countdowns, errors) */
export interface StatusReporter {
  reportStatus(text: string): void;
}

/** Everything the display layer has to implement to follow a sync */
export interface NotificationSink extends StatusReporter {
  markAllUpdating(): void;
  setUserPullRequests(user: string, prs: PullRequest[], timestamp: Date): void;
  setReviewRequested(prs: PullRequest[]): void;
  addUser(user: string, cached: { prs: PullRequest[]; timestamp: Date } | null): void;
}

/** Settings the sync engine runs with */
export interface SyncSettings {
  usernames: string[];
  org?: string;
  daysBack: number;
  me?: string;
  myTeam?: string;
  retentionDays: number;
  fetchOnStartup: boolean;
}
