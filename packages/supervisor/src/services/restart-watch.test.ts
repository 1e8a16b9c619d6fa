/**
 * Restart Watch Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { RestartWatchConfig } from '../config/index.js';
import { createDefaultDefinitionResolver, SessionLifecycle } from '../runtime/index.js';
import { FakeSessionController, InMemoryWorkLedger } from '../testing/index.js';
import { pollUntil } from '../utils/poll.js';
import { MailRouter } from './mail-router.js';
import { RestartWatch } from './restart-watch.js';

const lifecycleConfig = {
  agentCommand: 'agent',
  readyTimeoutMs: 20,
  stopGraceMs: 20,
  settleDelayMs: 0,
  pollInitialMs: 1,
  pollMaxMs: 5,
};

const watchConfig: RestartWatchConfig = {
  intervalMs: 5,
  handoffDelayMs: 0,
  inboxAddress: 'deacon/',
  subjectPattern: 'RESTART',
  targetAddress: 'mayor/',
};

describe('RestartWatch', () => {
  let stateDir: string;
  let controller: FakeSessionController;
  let ledger: InMemoryWorkLedger;
  let router: MailRouter;
  let watch: RestartWatch;

  beforeEach(() => {
    stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'outpost-restart-'));
    controller = new FakeSessionController();
    ledger = new InMemoryWorkLedger();
    router = new MailRouter({ ledger, controller, sessionPrefix: 'gt-' });
    watch = new RestartWatch({
      mailbox: router,
      lifecycle: new SessionLifecycle({
        controller,
        stateDir,
        sessionPrefix: 'gt-',
        lifecycle: lifecycleConfig,
        actor: 'outpost',
      }),
      definitions: createDefaultDefinitionResolver({ rootDir: '/town', lifecycle: lifecycleConfig }),
      config: watchConfig,
    });
  });

  afterEach(async () => {
    await watch.stop();
    fs.rmSync(stateDir, { recursive: true, force: true });
  });

  it('does nothing without a matching request', async () => {
    await router.send({ from: 'mayor/', to: 'deacon/', subject: 'status report', body: '' });

    expect(await watch.checkOnce()).toEqual({ triggered: false });
    expect(controller.calls).toEqual([]);
    expect(await router.inbox('deacon/')).toHaveLength(1);
  });

  it('acknowledges a request and restarts the target', async () => {
    await router.send({ from: 'mayor/', to: 'deacon/', subject: 'status report', body: '' });
    await router.send({ from: 'mayor/', to: 'deacon/', subject: 'Please restart me', body: 'context saved' });

    const result = await watch.checkOnce();

    expect(result).toMatchObject({ triggered: true, messageId: 'rec-2', restarted: true });
    expect(controller.callsOf('createSession')).toEqual([
      { method: 'createSession', id: 'gt-mayor', dir: '/town', command: 'agent' },
    ]);
    expect((await router.inbox('deacon/')).map(message => message.id)).toEqual(['rec-1']);
  });

  it('reports a failed restart after acknowledging the request', async () => {
    await router.send({ from: 'mayor/', to: 'deacon/', subject: 'RESTART', body: '' });
    controller.failOn('createSession');

    const result = await watch.checkOnce();

    expect(result).toEqual({
      triggered: true,
      messageId: 'rec-1',
      restarted: false,
      error: 'Failed to create session gt-mayor: createSession failed',
    });
    expect(await router.inbox('deacon/')).toEqual([]);
  });

  it('polls until stopped', async () => {
    watch.start();
    expect(watch.isRunning()).toBe(true);

    await router.send({ from: 'mayor/', to: 'deacon/', subject: 'restart', body: '' });
    const restarted = await pollUntil(async () => controller.callsOf('createSession').length === 1, {
      timeoutMs: 2000,
      initialDelayMs: 2,
    });
    await watch.stop();

    expect(restarted.satisfied).toBe(true);
    expect(watch.isRunning()).toBe(false);
  });
});
