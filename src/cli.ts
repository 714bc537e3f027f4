#!/usr/bin/env node
import { Command } from 'commander';
import { PRCache } from './cache.js';
import { RateLimitedClient } from './client.js';
import { parseConfig, type AppConfig, type CliOptions } from './config.js';
import { ConfigError, EXIT_CONFIG, EXIT_SYNC_ERROR, sanitizeError } from './errors.js';
import { createOctokit, getGitHubToken, octokitTransport } from './github.js';
import { TerminalSink, formatDuration, printDebug, printError, printWarning } from './output.js';
import { SyncOrchestrator } from './sync.js';
import { watch } from './watch.js';

const program = new Command();

program
  .name('prwatch')
  .description('Keep an eye on open GitHub pull requests of your team')
  .version('0.1.0')
  .requiredOption('-u, --users <logins...>', 'GitHub logins whose open PRs are tracked')
  .option('--org <org>', 'Only show PRs in this organization')
  .option('--days-back <days>', 'Only show PRs created in the last N days', '14')
  .option('--me <login>', 'Also list PRs waiting on your review')
  .option('--my-team <org/team>', 'Also list PRs waiting on a review from this team')
  .option('--cache-file <path>', 'Cache results in this JSON file (no caching without it)')
  .option('--retention-days <days>', 'Drop cache entries older than N days', '10')
  .option('--no-fetch-on-startup', 'Show cached results only until the first refresh')
  .option('--interval <minutes>', 'Refresh automatically every N minutes (0 = manual only)', '0')
  .option('--once', 'Fetch once, print the results and exit')
  .option('--verbose', 'Show debug info: timings and API log lines')
  .action(async (options: CliOptions) => {
    let config: AppConfig;
    let token: string;
    try {
      config = parseConfig(options);
      token = getGitHubToken();
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        printError(error.message, 'Run: prwatch --help');
        process.exit(EXIT_CONFIG);
      }
      throw error;
    }

    const debug = config.verbose ? printDebug : undefined;
    const interactive = !config.once && process.stdin.isTTY === true;
    const sink = new TerminalSink({
      me: config.settings.me,
      interactive,
      title: `Team PRs opened in the last ${config.settings.daysBack} days.`,
    });
    const client = new RateLimitedClient(() => octokitTransport(createOctokit(token, debug)));
    const cache = config.cacheFile ? new PRCache(config.cacheFile) : null;

    const fail = (error: unknown): never => {
      printError('Sync failed', sanitizeError(error));
      process.exit(EXIT_SYNC_ERROR);
    };

    // --once always fetches; there is no later refresh to wait for
    const fetchOnStartup = config.once || config.settings.fetchOnStartup;

    if (!interactive && !config.once && config.intervalMinutes > 0) {
      printWarning('--interval needs an interactive terminal; printing one snapshot instead');
    }

    let orchestrator: SyncOrchestrator;
    try {
      orchestrator = new SyncOrchestrator(client, sink, cache, {
        ...config.settings,
        // In interactive mode the key loop starts the first cycle
        fetchOnStartup: fetchOnStartup && !interactive,
      });
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        printError(error.message);
        process.exit(EXIT_CONFIG);
      }
      throw error;
    }

    const started = performance.now();
    try {
      await orchestrator.start();
    } catch (error: unknown) {
      fail(error);
    }
    debug?.(`Startup: ${formatDuration(performance.now() - started)}`);

    if (!interactive) {
      sink.printSnapshot();
      return;
    }

    await watch(orchestrator, sink, {
      intervalMs: config.intervalMinutes * 60_000,
      onError: fail,
      refreshOnStart: fetchOnStartup,
    });
    process.exit(0);
  });

program.parseAsync().catch((error: unknown) => {
  printError('Unexpected error', sanitizeError(error));
  process.exit(EXIT_SYNC_ERROR);
});
