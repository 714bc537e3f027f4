import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { RateLimitedClient, type Transport } from '../src/client.js';
import { SyncOrchestrator } from '../src/sync.js';
import { handleKey, requestRefresh, watch } from '../src/watch.js';
import type { NotificationSink, PullRequest } from '../src/types.js';

class StatusSink implements NotificationSink {
  statuses: string[] = [];
  updates: string[] = [];

  reportStatus(text: string): void {
    this.statuses.push(text);
  }
  markAllUpdating(): void {}
  setUserPullRequests(user: string, _prs: PullRequest[]): void {
    this.updates.push(user);
  }
  setReviewRequested(): void {}
  addUser(): void {}
}

const emptySearch: Transport = async () => ({ status: 200, headers: {}, data: { items: [] } });

function setup(transport: Transport = emptySearch) {
  const client = new RateLimitedClient(() => transport, { sleep: async () => {} });
  const sink = new StatusSink();
  const orchestrator = new SyncOrchestrator(client, sink, null, {
    usernames: ['alice'],
    daysBack: 7,
    retentionDays: 10,
    fetchOnStartup: false,
  });
  return { orchestrator, sink };
}

describe('handleKey', () => {
  it('maps r to refresh', () => {
    expect(handleKey({ name: 'r' })).toBe('refresh');
    expect(handleKey({ name: 'R' })).toBe('refresh');
  });

  it('maps q and Ctrl-C to quit', () => {
    expect(handleKey({ name: 'q' })).toBe('quit');
    expect(handleKey({ name: 'c', ctrl: true })).toBe('quit');
  });

  it('ignores everything else', () => {
    expect(handleKey({ name: 'c' })).toBe('none');
    expect(handleKey({ name: 'x' })).toBe('none');
    expect(handleKey({})).toBe('none');
    expect(handleKey(undefined)).toBe('none');
  });
});

describe('requestRefresh', () => {
  it('starts a cycle and reports it', async () => {
    const { orchestrator, sink } = setup();
    const onError = vi.fn();

    expect(requestRefresh(orchestrator, sink, onError)).toBe(true);
    expect(sink.statuses[0]).toBe('Refreshing...');

    await vi.waitFor(() => expect(orchestrator.updating).toBe(false));
    expect(sink.updates).toEqual(['alice']);
    expect(onError).not.toHaveBeenCalled();
  });

  it('does nothing while a cycle is in flight', () => {
    const { orchestrator, sink } = setup();
    orchestrator.updating = true;

    expect(requestRefresh(orchestrator, sink, vi.fn())).toBe(false);
    expect(sink.statuses).toEqual([]);
  });

  it('hands cycle failures to onError', async () => {
    const { orchestrator, sink } = setup();
    sink.setUserPullRequests = () => {
      throw new Error('render failed');
    };
    const onError = vi.fn();

    requestRefresh(orchestrator, sink, onError);

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError.mock.calls[0][0]).toBeInstanceOf(Error);
  });
});

describe('watch', () => {
  it('refreshes on r and resolves on q', async () => {
    const { orchestrator, sink } = setup();
    const input = new PassThrough() as unknown as NodeJS.ReadStream;

    const done = watch(orchestrator, sink, { intervalMs: 0, onError: vi.fn(), input });
    input.write('r');
    input.write('q');
    await done;

    expect(sink.statuses[0]).toBe('Refreshing...');
    await vi.waitFor(() => expect(sink.updates).toEqual(['alice']));
  });

  it('starts the first cycle itself and still quits while it is in flight', async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { orchestrator, sink } = setup(async () => {
      await gate;
      return { status: 200, headers: {}, data: { items: [] } };
    });
    const input = new PassThrough() as unknown as NodeJS.ReadStream;

    const done = watch(orchestrator, sink, { intervalMs: 0, onError: vi.fn(), refreshOnStart: true, input });
    expect(orchestrator.updating).toBe(true);

    input.write('q');
    await done;
    expect(orchestrator.updating).toBe(true);
    expect(sink.updates).toEqual([]);

    release();
    await vi.waitFor(() => expect(orchestrator.updating).toBe(false));
    expect(sink.updates).toEqual(['alice']);
  });
});
