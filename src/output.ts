import pc from 'picocolors';
import { myReviewStatus, numApprovals } from './model.js';
import { scrubSecrets } from './errors.js';
import type { NotificationSink, PullRequest, ReviewState } from './types.js';

export type Palette = ReturnType<typeof pc.createColors>;

/** Marker shown for the viewer's own latest review */
const MY_REVIEW_MARKERS: Record<ReviewState, string> = {
  APPROVED: 'v',
  COMMENTED: '@',
  PENDING: '.',
  CHANGES_REQUESTED: 'X',
};

const HELP_LINE = 'q - exit, r - refresh';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Group timestamp, local time: `2024.02.10. 14:05` */
export function formatGroupTimestamp(date: Date): string {
  return `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())}. ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** Creation date next to a pull request: `2024 02 10` */
export function formatCreatedAt(date: Date | null): string {
  if (!date) return '';
  return `${date.getFullYear()} ${pad(date.getMonth() + 1)} ${pad(date.getDate())}`;
}

/**
 * One pull request line:
 *   `[<mine>|<approvals>] [draft|ready|<repo>] - <title>  <created>`
 * `<mine>|` is only present when `me` is known.
 */
export function formatPullRequestLine(pr: PullRequest, me: string | undefined, colors: Palette = pc): string {
  let reviewBadge = String(numApprovals(pr));
  if (me) {
    const mine = myReviewStatus(pr, me);
    reviewBadge = `${mine ? MY_REVIEW_MARKERS[mine] : ' '}|${reviewBadge}`;
  }

  const text = `[${reviewBadge}] [${pr.draft ? 'draft' : 'ready'}|${pr.repo}] - ${pr.title}`;
  const created = formatCreatedAt(pr.createdAt);
  const line = created ? `${text}  ${colors.dim(created)}` : text;
  return pr.draft ? colors.yellow(line) : colors.green(line);
}

interface UserGroup {
  user: string;
  prs: PullRequest[];
  timestamp: Date | null;
  updating: boolean;
}

export interface TerminalSinkOptions {
  /** Login used for the per-PR review marker */
  me?: string;
  /** Redraw the whole screen on every change instead of logging status lines */
  interactive?: boolean;
  /** Header line, e.g. the time window */
  title?: string;
  colors?: Palette;
  write?: (line: string) => void;
  clear?: () => void;
}

/**
 * Terminal implementation of the notification sink.
 *
 * Interactive mode redraws everything on each notification. Otherwise each status
 * line is printed as it arrives and {@link TerminalSink.printSnapshot} prints the
 * final state once a cycle is done.
 */
export class TerminalSink implements NotificationSink {
  private readonly groups: UserGroup[] = [];
  private reviewRequested: PullRequest[] | null = null;
  private status = '';
  private readonly colors: Palette;
  private readonly write: (line: string) => void;
  private readonly clear: () => void;

  constructor(private readonly options: TerminalSinkOptions = {}) {
    this.colors = options.colors ?? pc;
    this.write = options.write ?? ((line) => console.log(line));
    this.clear = options.clear ?? (() => console.clear());
  }

  reportStatus(text: string): void {
    this.status = scrubSecrets(text);
    if (this.options.interactive) {
      this.draw();
    } else if (this.status) {
      this.write(this.colors.dim(this.status));
    }
  }

  markAllUpdating(): void {
    for (const group of this.groups) {
      group.updating = true;
    }
    this.redraw();
  }

  setUserPullRequests(user: string, prs: PullRequest[], timestamp: Date): void {
    const group = this.groups.find((g) => g.user === user);
    if (group) {
      group.prs = prs;
      group.timestamp = timestamp;
      group.updating = false;
    } else {
      this.groups.push({ user, prs, timestamp, updating: false });
    }
    this.redraw();
  }

  setReviewRequested(prs: PullRequest[]): void {
    this.reviewRequested = prs;
    this.redraw();
  }

  addUser(user: string, cached: { prs: PullRequest[]; timestamp: Date } | null): void {
    if (this.groups.some((g) => g.user === user)) return;
    this.groups.push({
      user,
      prs: cached?.prs ?? [],
      timestamp: cached?.timestamp ?? null,
      updating: false,
    });
    this.redraw();
  }

  /** Current screen content, without the status line */
  render(): string[] {
    const c = this.colors;
    const lines: string[] = [];

    // Fewest pull requests first; sort is stable, so ties keep insertion order
    const ordered = [...this.groups].sort((a, b) => a.prs.length - b.prs.length);
    for (const group of ordered) {
      const when = group.timestamp ? formatGroupTimestamp(group.timestamp) : 'never';
      const title = `${group.user} ── ${when}`;
      if (group.updating) {
        lines.push(c.yellow(`Updating - ${title}`));
      } else if (group.prs.length > 0) {
        lines.push(c.bold(c.green(title)));
      } else {
        lines.push(c.bold(c.gray(title)));
      }
      for (const pr of group.prs) {
        lines.push(`  ${formatPullRequestLine(pr, this.options.me, c)}`);
      }
    }

    if (this.reviewRequested) {
      lines.push('');
      lines.push(c.bold(`Review requested (${this.reviewRequested.length})`));
      for (const pr of this.reviewRequested) {
        lines.push(`  ${formatPullRequestLine(pr, this.options.me, c)}  ${c.dim(pr.url)}`);
      }
    }

    return lines;
  }

  /** Print the current state once (non-interactive mode) */
  printSnapshot(): void {
    for (const line of this.render()) {
      this.write(line);
    }
  }

  private redraw(): void {
    if (this.options.interactive) {
      this.draw();
    }
  }

  private draw(): void {
    this.clear();
    if (this.options.title) {
      this.write(this.colors.bold(this.options.title));
    }
    this.write(this.colors.dim(HELP_LINE));
    this.write(this.status);
    for (const line of this.render()) {
      this.write(line);
    }
  }
}

/**
 * Print an error as a red line with an optional dimmed help line.
 */
export function printError(message: string, help?: string): void {
  console.error(pc.red(`✖ ${scrubSecrets(message)}`));
  if (help) {
    console.error(pc.dim(`  ${help}`));
  }
}

/** Yellow `Warning:` line on stderr */
export function printWarning(message: string): void {
  console.error(pc.yellow(`Warning: ${scrubSecrets(message)}`));
}

/** Dimmed `[debug]` line; wired up by --verbose */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${scrubSecrets(message)}`));
}

/** Elapsed time for debug lines: `1.2s`, or `1m 12s` from a minute up */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
