/**
 * Event Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { Significance, type ActivityEvent } from '../types/index.js';
import { classifyEvent, classifySignificance, deriveRole, deriveWorkspace } from './classifier.js';
import { summarizeEvent } from './summary.js';

const options = { systemActors: ['gt'] };

function event(partial: Partial<ActivityEvent> & Pick<ActivityEvent, 'type'>): ActivityEvent {
  return {
    timestamp: '2026-03-10T12:00:00Z',
    actor: 'gastown/toast',
    payload: {},
    visibility: 'narrative',
    ...partial,
  };
}

describe('classifySignificance', () => {
  it('forces audit records to NONE', () => {
    expect(classifySignificance({ type: 'sling', visibility: 'audit' })).toBe(Significance.NONE);
  });

  it.each([
    ['sling', Significance.HIGH],
    ['mass_death', Significance.HIGH],
    ['mail', Significance.MEDIUM],
    ['session_death', Significance.MEDIUM],
    ['merge_skipped', Significance.MEDIUM],
    ['patrol_complete', Significance.LOW],
    ['worker_checked', Significance.LOW],
    ['something_new', Significance.LOW],
    ['toString', Significance.LOW],
  ])('%s is %i', (type, expected) => {
    expect(classifySignificance({ type, visibility: 'narrative' })).toBe(expected);
  });
});

describe('deriveWorkspace', () => {
  it('prefers the payload field, then the legacy field', () => {
    expect(deriveWorkspace(event({ type: 'done', payload: { workspace: 'beta' } }), options)).toBe('beta');
    expect(deriveWorkspace(event({ type: 'done', payload: { rig: 'gamma' } }), options)).toBe('gamma');
  });

  it('falls back to the first actor segment', () => {
    expect(deriveWorkspace(event({ type: 'done' }), options)).toBe('gastown');
  });

  it('skips town-level and system actors', () => {
    expect(deriveWorkspace(event({ type: 'done', actor: 'mayor/' }), options)).toBeUndefined();
    expect(deriveWorkspace(event({ type: 'done', actor: 'deacon' }), options)).toBeUndefined();
    expect(deriveWorkspace(event({ type: 'done', actor: 'gt' }), options)).toBeUndefined();
  });
});

describe('deriveRole', () => {
  it('parses the actor address', () => {
    expect(deriveRole('gastown/witness', options)).toBe('witness');
    expect(deriveRole('gastown/toast', options)).toBe('worker');
    expect(deriveRole('gastown/crew/joe', options)).toBe('human');
    expect(deriveRole('mayor', options)).toBe('mayor');
  });

  it('gives system actors and unknown single segments no role', () => {
    expect(deriveRole('gt', options)).toBeUndefined();
    expect(deriveRole('gt/', options)).toBeUndefined();
    expect(deriveRole('overseer', options)).toBeUndefined();
    expect(deriveRole('', options)).toBeUndefined();
  });

  it('accepts a trailing slash on town-level actors', () => {
    expect(deriveRole('deacon/', options)).toBe('deacon');
  });

  it.each([
    ['gastown/witness/patrol', 'witness'],
    ['gastown/refinery/queue', 'refinery'],
    ['gastown/narrator', 'narrator'],
    ['gastown/polecats/Toast/sub', 'worker'],
    ['gastown/workers/toast', 'worker'],
    ['gastown/Toast Smith', 'worker'],
    ['gastown/crew', 'human'],
    ['gastown/crew/joe/notes', 'human'],
  ])('matches %s on path segments as %s', (actor, role) => {
    expect(deriveRole(actor, options)).toBe(role);
  });
});

describe('summarizeEvent', () => {
  it('fills the per-type template', () => {
    expect(summarizeEvent({ type: 'sling', payload: { item: 'op-12', target: 'gastown/toast' } })).toBe(
      'Work op-12 slung to gastown/toast'
    );
    expect(summarizeEvent({ type: 'spawn', payload: { polecat: 'toast', rig: 'gastown' } })).toBe(
      'Spawned worker toast in gastown'
    );
    expect(summarizeEvent({ type: 'session_death', payload: { agent: 'gastown/toast', reason: 'worker exited' } })).toBe(
      'Session died: gastown/toast (worker exited)'
    );
  });

  it('falls back when fields are missing', () => {
    expect(summarizeEvent({ type: 'sling', payload: {} })).toBe('Work assignment dispatched');
    expect(summarizeEvent({ type: 'patrol_started', payload: {} })).toBe('Patrol started');
  });

  it('uses the type name for unknown types', () => {
    expect(summarizeEvent({ type: 'custom_thing', payload: { a: 1 } })).toBe('custom_thing');
  });
});

describe('classifyEvent', () => {
  it('enriches a narrative record', () => {
    const classified = classifyEvent(
      event({ type: 'sling', payload: { item: 'op-12', target: 'gastown/toast' }, actor: 'gastown/witness' }),
      options
    );
    expect(classified.significance).toBe(Significance.HIGH);
    expect(classified.workspace).toBe('gastown');
    expect(classified.role).toBe('witness');
    expect(classified.summary).toBe('Work op-12 slung to gastown/toast');
  });

  it('omits workspace and role for system actors', () => {
    const classified = classifyEvent(event({ type: 'patrol_started', actor: 'gt', visibility: 'audit' }), options);
    expect(classified.significance).toBe(Significance.NONE);
    expect('workspace' in classified).toBe(false);
    expect('role' in classified).toBe(false);
  });
});
