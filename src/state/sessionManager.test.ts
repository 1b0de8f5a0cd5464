import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionManager } from './sessionManager';
import { parseCatalog } from '../catalog/loadCatalog';
import { select } from '../engine/select';
import { DuplicateSessionError, SessionNotFoundError } from '../errors';

const catalog = parseCatalog({
  version: 1,
  items: [
    { id: 'breathe', text: 'Breathe slowly with them', polarity: 'do', priority: 1 },
    { id: 'walk', text: 'Offer a short walk', polarity: 'do', tags: ['mood:calm'], priority: 2 },
    { id: 'argue', text: "Don't argue", polarity: 'dont', tags: ['anger'], priority: 1 }
  ]
});

const ids = (items: { id: string }[]) => items.map(i => i.id);

describe('SessionManager', () => {
  let clock: number;
  let manager: SessionManager;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    clock = 1000;
    manager = new SessionManager(catalog, {}, () => clock);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts a session with the result for its initial tags', () => {
    const session = manager.createSession('s1', ['Anger']);
    expect([...session.context]).toEqual(['anger']);
    expect(ids(session.result.do)).toEqual(['breathe']);
    expect(ids(session.result.dont)).toEqual(['argue']);
    expect(session.startTime).toBe(1000);
    expect(session.eventCount).toBe(0);
  });

  it('recomputes the result after each event', () => {
    manager.createSession('s1');
    clock = 2000;

    const result = manager.dispatch('s1', { type: 'situation', mood: 'calm' });
    expect(ids(result.do)).toEqual(['breathe', 'walk']);

    const session = manager.getSession('s1');
    expect(session?.result).toEqual(result);
    expect(session?.lastEventTime).toBe(2000);
    expect(session?.eventCount).toBe(1);

    expect(ids(manager.dispatch('s1', { type: 'clear' }).do)).toEqual(['breathe']);
    expect(manager.getSession('s1')?.eventCount).toBe(2);
  });

  it('applies its select options to every result', () => {
    const limited = new SessionManager(catalog, { limit: 1 }, () => clock);
    limited.createSession('s1', ['mood:calm']);
    expect(ids(limited.dispatch('s1', { type: 'toggle', tag: 'anger' }).do)).toEqual(['breathe']);
  });

  it('hands out copies that cannot change the stored result', () => {
    manager.createSession('s1', ['mood:calm', 'anger']);
    manager.dispatch('s1', { type: 'toggle', tag: 'grief' }).do.reverse();
    manager.getSession('s1')?.result.do.reverse();

    const session = manager.getSession('s1');
    expect(ids(session?.result.do ?? [])).toEqual(['breathe', 'walk']);
    expect(session?.result).toEqual(select(catalog.items, new Set(['mood:calm', 'anger', 'grief'])));
  });

  it('rejects duplicate and unknown session ids', () => {
    manager.createSession('s1');
    expect(() => manager.createSession('s1')).toThrow(DuplicateSessionError);
    expect(() => manager.dispatch('nope', { type: 'clear' })).toThrow(SessionNotFoundError);
  });

  it('forgets ended sessions', () => {
    manager.createSession('s1');
    manager.createSession('s2');
    expect(manager.activeSessionIds()).toEqual(['s1', 's2']);

    expect(manager.endSession('s1')).toBe(true);
    expect(manager.endSession('s1')).toBe(false);
    expect(manager.getSession('s1')).toBeNull();
    expect(manager.activeSessionIds()).toEqual(['s2']);
  });
});

describe('SessionManager defaults', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('caps results at MAX_SUGGESTIONS_PER_POLARITY', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('MAX_SUGGESTIONS_PER_POLARITY', '1');
    vi.resetModules();
    const { SessionManager: FreshManager } = await import('./sessionManager');

    const session = new FreshManager(catalog).createSession('s1', ['mood:calm']);
    expect(ids(session.result.do)).toEqual(['breathe']);
  });
});
