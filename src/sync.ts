import { REQUESTED_KEY_PREFIX, requestedKey, truncateToSeconds, type PRCache } from './cache.js';
import { CacheWriteError, ConfigError } from './errors.js';
import { dedupeByUrl, toPullRequests } from './model.js';
import {
  authoredQuery,
  reviewRequestedQuery,
  searchUrl,
  teamReviewRequestedQuery,
  type QueryScope,
} from './query.js';
import type { RateLimitedClient } from './client.js';
import type { NotificationSink, PullRequest, SyncSettings } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `pull_request.url` of a search item: the API url its reviews hang off */
function pullRequestApiUrl(item: Record<string, unknown>): string | null {
  const pr = item.pull_request;
  if (!isRecord(pr) || typeof pr.url !== 'string' || !pr.url) return null;
  return pr.url;
}

/**
 * Drives sync cycles: authored pull requests per tracked user, then review requests
 * for `me` and `myTeam`.
 *
 * Every request goes through one client, one at a time. The rate limit budget is
 * shared by all of them, so there is nothing to gain from running them in parallel.
 * A refresh requested while a cycle is running is ignored.
 */
export class SyncOrchestrator {
  /** True while a cycle is in flight */
  updating = false;

  private readonly usernames: string[];

  constructor(
    private readonly client: RateLimitedClient,
    private readonly sink: NotificationSink,
    private readonly cache: PRCache | null,
    private readonly settings: SyncSettings,
    private readonly now: () => Date = () => new Date(),
  ) {
    for (const user of settings.usernames) {
      if (user.startsWith(REQUESTED_KEY_PREFIX)) {
        throw new ConfigError(
          `Username '${user}' collides with the '${REQUESTED_KEY_PREFIX}' cache key prefix`,
        );
      }
    }
    this.usernames = [...new Set(settings.usernames)];
  }

  /**
   * Purge expired cache entries, show cached data, then run the first cycle
   * when fetchOnStartup is set.
   */
  async start(): Promise<void> {
    if (this.cache) {
      try {
        this.cache.cleanup(this.settings.retentionDays * DAY_MS, this.now());
      } catch (error: unknown) {
        this.handleCacheError(error);
      }
    }

    for (const user of this.usernames) {
      const cached = this.cache?.load(user) ?? null;
      this.sink.addUser(
        user,
        cached ? { prs: toPullRequests(cached.prs), timestamp: cached.timestamp } : null,
      );
    }

    const cachedRequested = this.requestedSubjects().flatMap((name) => {
      const cached = this.cache?.load(requestedKey(name));
      return cached ? toPullRequests(cached.prs) : [];
    });
    if (cachedRequested.length > 0) {
      this.sink.setReviewRequested(dedupeByUrl(cachedRequested));
    }

    if (this.settings.fetchOnStartup) {
      await this.refresh();
    }
  }

  /**
   * Run one full cycle.
   *
   * @returns false when a cycle was already running and this call did nothing
   */
  async refresh(): Promise<boolean> {
    if (this.updating) return false;

    this.updating = true;
    this.sink.markAllUpdating();
    try {
      await this.client.session(() => this.runCycle());
    } finally {
      this.updating = false;
      this.sink.reportStatus('');
    }
    return true;
  }

  private async runCycle(): Promise<void> {
    const scope: QueryScope = {
      org: this.settings.org,
      daysBack: this.settings.daysBack,
      now: this.now(),
    };

    for (const user of this.usernames) {
      this.sink.reportStatus(`Fetching open PRs for ${user}`);
      const { prs, timestamp } = await this.fetchSubject(user, searchUrl(authoredQuery(user, scope)));
      this.sink.setUserPullRequests(user, prs, timestamp);
    }

    const requested: PullRequest[] = [];
    if (this.settings.me) {
      const me = this.settings.me;
      this.sink.reportStatus(`Fetching review requested PRs for ${me}`);
      const { prs } = await this.fetchSubject(requestedKey(me), searchUrl(reviewRequestedQuery(me, scope)));
      requested.push(...prs);
    }
    if (this.settings.myTeam) {
      const team = this.settings.myTeam;
      this.sink.reportStatus(`Fetching review requested PRs for ${team}`);
      const { prs } = await this.fetchSubject(
        requestedKey(team),
        searchUrl(teamReviewRequestedQuery(team, scope)),
      );
      requested.push(...prs);
    }
    if (this.requestedSubjects().length > 0) {
      this.sink.setReviewRequested(dedupeByUrl(requested));
    }
  }

  /**
   * Search, attach reviews to every item, cache the raw items under `key` and
   * return them normalized with the fetch time. A failed search yields no pull
   * requests and leaves the cache alone.
   */
  private async fetchSubject(
    key: string,
    url: string,
  ): Promise<{ prs: PullRequest[]; timestamp: Date }> {
    const result = await this.client.execute(url, this.sink);
    if (!result.ok) return { prs: [], timestamp: this.fetchTime() };

    const items: unknown[] = [];
    for (const item of result.items) {
      if (!isRecord(item)) {
        items.push(item);
        continue;
      }
      const apiUrl = pullRequestApiUrl(item);
      const reviews = apiUrl ? await this.client.fetchReviews(apiUrl, this.sink) : [];
      items.push({ ...item, reviews });
    }

    const timestamp = this.fetchTime();
    if (this.cache) {
      try {
        this.cache.save(key, items, timestamp);
      } catch (error: unknown) {
        this.handleCacheError(error);
      }
    }

    return { prs: toPullRequests(items), timestamp };
  }

  /** Shown to the user and stored in the cache, so both agree to the second */
  private fetchTime(): Date {
    return truncateToSeconds(this.now());
  }

  private requestedSubjects(): string[] {
    return [this.settings.me, this.settings.myTeam].filter((name): name is string => !!name);
  }

  /** Cache write failures are reported and the cycle goes on with in-memory data */
  private handleCacheError(error: unknown): void {
    if (error instanceof CacheWriteError) {
      this.sink.reportStatus(error.message);
      return;
    }
    throw error;
  }
}
