import { describe, it, expect } from 'vitest';
import { parseConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({ users: ['alice'] })).toEqual({
      settings: {
        usernames: ['alice'],
        org: undefined,
        daysBack: 14,
        me: undefined,
        myTeam: undefined,
        retentionDays: 10,
        fetchOnStartup: true,
      },
      cacheFile: undefined,
      intervalMinutes: 0,
      once: false,
      verbose: false,
    });
  });

  it('coerces numeric strings from the command line', () => {
    const config = parseConfig({
      users: ['alice', 'bob'],
      org: 'acme',
      me: 'carol',
      myTeam: 'acme/core-team',
      daysBack: '30',
      retentionDays: '3',
      interval: '2.5',
      cacheFile: '/tmp/prs.json',
      fetchOnStartup: false,
    });

    expect(config.settings).toEqual({
      usernames: ['alice', 'bob'],
      org: 'acme',
      daysBack: 30,
      me: 'carol',
      myTeam: 'acme/core-team',
      retentionDays: 3,
      fetchOnStartup: false,
    });
    expect(config.intervalMinutes).toBe(2.5);
    expect(config.cacheFile).toBe('/tmp/prs.json');
  });

  it('rejects invalid logins with the offending field', () => {
    expect(() => parseConfig({ users: ['alice', 'requested:bob'] })).toThrow(
      'Invalid options: users.1: not a valid GitHub login',
    );
  });

  it('rejects a malformed team reference', () => {
    expect(() => parseConfig({ users: ['alice'], myTeam: 'core' })).toThrow('myTeam: expected org/team-slug');
  });

  it('rejects a non-positive window', () => {
    expect(() => parseConfig({ users: ['alice'], daysBack: '0' })).toThrow('daysBack: --days-back must be positive');
  });

  it('requires at least one user', () => {
    expect(() => parseConfig({ users: [] })).toThrow('users: at least one user is required');
  });

  it('collects every problem into one ConfigError', () => {
    try {
      parseConfig({ users: ['-bad'], interval: '-1' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty(
        'message',
        'Invalid options: users.0: not a valid GitHub login; interval: --interval must not be negative',
      );
    }
  });
});
