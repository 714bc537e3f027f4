import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { SyncSettings } from './types.js';

/** GitHub login: alphanumerics and single inner hyphens, at most 39 characters */
const LOGIN_REGEX = /^[a-zA-Z0-9](?:[a-zA-Z0-9]|-(?=[a-zA-Z0-9])){0,38}$/;

/** Team reference as used by team-review-requested: `org/team-slug` */
const TEAM_REGEX = /^[a-zA-Z0-9][a-zA-Z0-9-]*\/[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

const Login = z.string().regex(LOGIN_REGEX, 'not a valid GitHub login');

const positiveInt = (label: string) =>
  z.coerce.number().int(`${label} must be a whole number`).positive(`${label} must be positive`);

/** Raw options as commander hands them over */
export const CliOptionsSchema = z.object({
  users: z.array(Login).min(1, 'at least one user is required'),
  org: Login.optional(),
  daysBack: positiveInt('--days-back').default(14),
  me: Login.optional(),
  myTeam: z.string().regex(TEAM_REGEX, 'expected org/team-slug').optional(),
  cacheFile: z.string().min(1).optional(),
  retentionDays: positiveInt('--retention-days').default(10),
  fetchOnStartup: z.boolean().default(true),
  interval: z.coerce.number().nonnegative('--interval must not be negative').default(0),
  once: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.input<typeof CliOptionsSchema>;

/** Validated configuration for one run */
export interface AppConfig {
  settings: SyncSettings;
  /** Cache file path; undefined disables caching */
  cacheFile?: string;
  /** Minutes between automatic refreshes; 0 means manual refresh only */
  intervalMinutes: number;
  once: boolean;
  verbose: boolean;
}

/**
 * Validate CLI options and turn them into the sync configuration.
 * All problems are collected into a single ConfigError.
 */
export function parseConfig(options: CliOptions): AppConfig {
  const result = CliOptionsSchema.safeParse(options);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const field = issue.path.map(String).join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(`Invalid options: ${problems.join('; ')}`);
  }

  const o = result.data;
  return {
    settings: {
      usernames: o.users,
      org: o.org,
      daysBack: o.daysBack,
      me: o.me,
      myTeam: o.myTeam,
      retentionDays: o.retentionDays,
      fetchOnStartup: o.fetchOnStartup,
    },
    cacheFile: o.cacheFile,
    intervalMinutes: o.interval,
    once: o.once,
    verbose: o.verbose,
  };
}
