/**
 * In-memory interview sessions keyed by a random id.
 * Sessions do not survive a restart. Idle sessions are evicted after the TTL,
 * lazily on access and by an optional periodic sweep.
 */

import crypto from "node:crypto";
import { SessionNotFoundError } from "../errors";

export type InterviewSession = {
  id: string;
  sector: string;
  position: string;
  experienceLevel: string;
  focusArea: string | null;
  /** questions[i] is the question of round i + 1. */
  questions: string[];
  /** answers[i] answers questions[i]. */
  answers: string[];
  /** Answers submitted so far; also the index of the pending question. */
  currentQuestion: number;
  totalQuestions: number;
  createdAt: number;
  updatedAt: number;
};

export type NewInterviewSession = Omit<InterviewSession, "id" | "createdAt" | "updatedAt">;

export interface SessionStore {
  create(init: NewInterviewSession): InterviewSession;
  /** Returns a copy; changes go through mutate. */
  get(id: string): InterviewSession | null;
  /** Applies fn to the stored session in place; throws SessionNotFoundError for unknown ids. */
  mutate<T>(id: string, fn: (session: InterviewSession) => T): T;
  delete(id: string): boolean;
}

export type InMemorySessionStoreOptions = {
  ttlMs: number;
  now?: () => number;
};

function copySession(session: InterviewSession): InterviewSession {
  return { ...session, questions: [...session.questions], answers: [...session.answers] };
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, InterviewSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  create(init: NewInterviewSession): InterviewSession {
    const timestamp = this.now();
    const session: InterviewSession = {
      ...init,
      questions: [...init.questions],
      answers: [...init.answers],
      id: crypto.randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.sessions.set(session.id, session);
    return copySession(session);
  }

  get(id: string): InterviewSession | null {
    const session = this.live(id);
    if (!session) return null;
    session.updatedAt = this.now();
    return copySession(session);
  }

  mutate<T>(id: string, fn: (session: InterviewSession) => T): T {
    const session = this.live(id);
    if (!session) throw new SessionNotFoundError();
    const result = fn(session);
    session.updatedAt = this.now();
    return result;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Drops every session idle for longer than the TTL; returns how many were dropped. */
  evictExpired(): number {
    const now = this.now();
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.updatedAt > this.ttlMs) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    return evicted;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      const evicted = this.evictExpired();
      if (evicted > 0) console.info(`Evicted ${evicted} idle interview session(s)`);
    }, intervalMs);
    this.sweepTimer.unref();
  }

  close(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  private live(id: string): InterviewSession | null {
    const session = this.sessions.get(id);
    if (!session) return null;
    if (this.now() - session.updatedAt > this.ttlMs) {
      this.sessions.delete(id);
      return null;
    }
    return session;
  }
}
