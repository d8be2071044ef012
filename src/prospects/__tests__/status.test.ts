import { describe, it, expect } from 'vitest';
import {
  assertRecordTransition,
  assertSyncTransition,
  canTransitionRecord,
  canTransitionSync,
  isRecordStatus,
  isTerminal,
} from '../status.js';
import { TransitionError } from '../../shared/errors.js';

describe('record status', () => {
  it('treats converted and rejected as terminal', () => {
    expect(isTerminal('converted')).toBe(true);
    expect(isTerminal('rejected')).toBe(true);
    expect(isTerminal('new')).toBe(false);
    expect(isTerminal('synced')).toBe(false);
  });

  it('moves forward only', () => {
    expect(canTransitionRecord('new', 'contacted')).toBe(true);
    expect(canTransitionRecord('contacted', 'synced')).toBe(true);
    expect(canTransitionRecord('contacted', 'new')).toBe(false);
    expect(canTransitionRecord('converted', 'new')).toBe(false);
    expect(canTransitionRecord('rejected', 'synced')).toBe(false);
  });

  it('allows staying put', () => {
    expect(canTransitionRecord('rejected', 'rejected')).toBe(true);
  });

  it('raises TransitionError on invalid moves', () => {
    expect(() => assertRecordTransition('converted', 'contacted')).toThrow(TransitionError);
    expect(() => assertRecordTransition('new', 'synced')).not.toThrow();
  });

  it('recognizes status strings', () => {
    expect(isRecordStatus('contacted')).toBe(true);
    expect(isRecordStatus('promoted')).toBe(false);
  });
});

describe('sync status', () => {
  it('follows the sync state machine', () => {
    expect(canTransitionSync('pending', 'synced')).toBe(true);
    expect(canTransitionSync('pending', 'error')).toBe(true);
    expect(canTransitionSync('error', 'error')).toBe(true);
    expect(canTransitionSync('error', 'synced')).toBe(true);
    expect(canTransitionSync('synced', 'synced')).toBe(true);
    expect(canTransitionSync('synced', 'error')).toBe(true);
  });

  it('never returns to pending', () => {
    expect(canTransitionSync('synced', 'pending')).toBe(false);
    expect(canTransitionSync('error', 'pending')).toBe(false);
    expect(canTransitionSync('pending', 'pending')).toBe(false);
    expect(() => assertSyncTransition('synced', 'pending')).toThrow(/synced to pending/);
  });
});
