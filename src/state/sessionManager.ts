import { CFG } from '../config';
import { select } from '../engine/select';
import { reduceContext, type ContextEvent } from './contextEvents';
import { contextFrom } from '../situation/tags';
import { DuplicateSessionError, SessionNotFoundError } from '../errors';
import { createLogger } from '../util/logger';
import type { Catalog, SelectOptions, SituationContext, SuggestionResult } from '../types';

const logger = createLogger('SessionManager');

export interface SessionState {
  readonly sessionId: string;
  readonly context: SituationContext;
  readonly result: SuggestionResult;
  readonly startTime: number;
  readonly lastEventTime: number;
  readonly eventCount: number;
}

interface StoredSession {
  sessionId: string;
  context: SituationContext;
  result: SuggestionResult;
  startTime: number;
  lastEventTime: number;
  eventCount: number;
}

// Callers get their own arrays; the stored result stays equal to select()
function copyResult(result: SuggestionResult): SuggestionResult {
  return { do: [...result.do], dont: [...result.dont] };
}

function snapshot(session: StoredSession): SessionState {
  return { ...session, context: new Set(session.context), result: copyResult(session.result) };
}

/**
 * In-memory sessions. Every event recomputes the session's result against
 * the shared, read-only catalog. Nothing is persisted.
 */
export class SessionManager {
  private readonly sessions = new Map<string, StoredSession>();

  constructor(
    private readonly catalog: Catalog,
    private readonly selectOptions: SelectOptions = { limit: CFG.MAX_SUGGESTIONS_PER_POLARITY },
    private readonly now: () => number = Date.now
  ) {}

  createSession(sessionId: string, initialTags: Iterable<string> = []): SessionState {
    if (this.sessions.has(sessionId)) {
      throw new DuplicateSessionError(sessionId);
    }

    const context = contextFrom(initialTags);
    const startTime = this.now();
    const session: StoredSession = {
      sessionId,
      context,
      result: select(this.catalog.items, context, this.selectOptions),
      startTime,
      lastEventTime: startTime,
      eventCount: 0
    };

    this.sessions.set(sessionId, session);
    logger.info(`Created session: ${sessionId}`);
    return snapshot(session);
  }

  getSession(sessionId: string): SessionState | null {
    const session = this.sessions.get(sessionId);
    return session ? snapshot(session) : null;
  }

  dispatch(sessionId: string, event: ContextEvent): SuggestionResult {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const context = reduceContext(session.context, event);
    if (context !== session.context) {
      session.context = context;
      session.result = select(this.catalog.items, context, this.selectOptions);
    }
    session.lastEventTime = this.now();
    session.eventCount += 1;

    logger.debug(
      `${sessionId} ${event.type}: ${session.result.do.length} do, ${session.result.dont.length} dont`
    );
    return copyResult(session.result);
  }

  endSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logger.info(`Ended session: ${sessionId}`);
    }
    return removed;
  }

  activeSessionIds(): string[] {
    return [...this.sessions.keys()];
  }
}
