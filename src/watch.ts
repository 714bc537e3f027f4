import * as readline from 'node:readline';
import type { SyncOrchestrator } from './sync.js';
import type { StatusReporter } from './types.js';

export type KeyAction = 'refresh' | 'quit' | 'none';

/** The parts of a readline keypress event we look at */
export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/** Map a keypress to an action: r refreshes, q or Ctrl-C quits */
export function handleKey(key: Keypress | undefined): KeyAction {
  if (!key?.name) return 'none';
  const name = key.name.toLowerCase();
  if (key.ctrl && name === 'c') return 'quit';
  if (name === 'q') return 'quit';
  if (name === 'r') return 'refresh';
  return 'none';
}

/**
 * Start a refresh unless one is already running.
 * The cycle runs in the background; failures go to `onError`.
 *
 * @returns Whether a refresh was started
 */
export function requestRefresh(
  orchestrator: SyncOrchestrator,
  reporter: StatusReporter,
  onError: (error: unknown) => void,
): boolean {
  if (orchestrator.updating) return false;
  reporter.reportStatus('Refreshing...');
  orchestrator.refresh().catch(onError);
  return true;
}

export interface WatchOptions {
  /** Automatic refresh period; 0 disables the timer */
  intervalMs: number;
  onError: (error: unknown) => void;
  /** Start the first cycle once keys are being listened to */
  refreshOnStart?: boolean;
  input?: NodeJS.ReadStream;
}

/**
 * Listen for keypresses (and the optional timer) until the user quits.
 * Cycles run in the background, so quitting works while one is in flight.
 * Resolves once the terminal is restored.
 */
export function watch(
  orchestrator: SyncOrchestrator,
  reporter: StatusReporter,
  options: WatchOptions,
): Promise<void> {
  const input = options.input ?? process.stdin;

  return new Promise((resolve) => {
    const timer =
      options.intervalMs > 0
        ? setInterval(() => requestRefresh(orchestrator, reporter, options.onError), options.intervalMs)
        : null;

    const onKeypress = (_str: string | undefined, key: Keypress | undefined) => {
      const action = handleKey(key);
      if (action === 'refresh') {
        requestRefresh(orchestrator, reporter, options.onError);
      } else if (action === 'quit') {
        stop();
      }
    };

    const stop = () => {
      if (timer) clearInterval(timer);
      input.off('keypress', onKeypress);
      if (input.isTTY) input.setRawMode(false);
      input.pause();
      resolve();
    };

    readline.emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode(true);
    input.on('keypress', onKeypress);
    input.resume();

    if (options.refreshOnStart) {
      requestRefresh(orchestrator, reporter, options.onError);
    }
  });
}
