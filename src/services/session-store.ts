/**
 * Session Store - in-memory conversation history
 * Bounded per-session history (FIFO) with idle expiry
 */

import type { Role, Session, SessionInfo, SessionStats, Turn } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

export interface SessionStoreOptions {
  maxHistoryLength: number;
  sessionTimeoutMs: number;
  clock?: () => number;
}

interface SessionRecord {
  id: string;
  turns: Turn[];
  createdAt: number;
  lastActivity: number;
}

/**
 * All mutations are synchronous: on Node's single event loop an append runs
 * to completion before any other request touches the map, so two appends to
 * one session are both kept and sessions never contend with each other.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly maxHistoryLength: number;
  private readonly sessionTimeoutMs: number;
  private readonly clock: () => number;

  constructor(options: SessionStoreOptions) {
    if (!Number.isInteger(options.maxHistoryLength) || options.maxHistoryLength < 1) {
      throw new RangeError(`maxHistoryLength must be a positive integer, got ${options.maxHistoryLength}`);
    }
    this.maxHistoryLength = options.maxHistoryLength;
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Append a turn, creating the session if it does not exist (or has
   * expired). Oldest turns are dropped once the bound is exceeded.
   */
  append(sessionId: string, role: Role, content: string): Session {
    const now = this.clock();
    const record = this.live(sessionId, now) ?? this.create(sessionId, now);

    const timestamp = Math.max(now, record.lastActivity);
    record.turns.push(Object.freeze({ role, content, timestamp }));
    if (record.turns.length > this.maxHistoryLength) {
      record.turns.splice(0, record.turns.length - this.maxHistoryLength);
    }
    record.lastActivity = timestamp;

    return this.view(record);
  }

  get(sessionId: string): Session | undefined {
    const record = this.live(sessionId, this.clock());
    return record ? this.view(record) : undefined;
  }

  require(sessionId: string): Session {
    const session = this.get(sessionId);
    if (!session) throw new NotFoundError('Session', sessionId);
    return session;
  }

  /**
   * Drop all turns but keep the id usable. Safe on unknown ids.
   */
  clear(sessionId: string): void {
    const now = this.clock();
    const record = this.live(sessionId, now) ?? this.create(sessionId, now);
    record.turns = [];
    record.lastActivity = Math.max(now, record.lastActivity);
    console.log(`[Sessions] Cleared history for session: ${sessionId}`);
  }

  /**
   * Remove sessions idle for longer than the timeout. A session whose
   * idle time equals the timeout exactly is kept.
   */
  evictExpired(now: number = this.clock()): number {
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (this.isExpiredAt(record, now)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[Sessions] Cleaned up ${removed} expired session(s)`);
    }
    return removed;
  }

  info(sessionId: string): SessionInfo | undefined {
    const record = this.sessions.get(sessionId);
    if (!record) return undefined;
    return {
      sessionId,
      messageCount: record.turns.length,
      createdAt: record.createdAt,
      lastActivity: record.lastActivity,
      isExpired: this.isExpiredAt(record, this.clock())
    };
  }

  stats(): SessionStats {
    const now = this.clock();
    let totalMessages = 0;
    let activeSessions = 0;
    for (const record of this.sessions.values()) {
      totalMessages += record.turns.length;
      if (!this.isExpiredAt(record, now)) activeSessions++;
    }
    return {
      totalSessions: this.sessions.size,
      activeSessions,
      totalMessages,
      avgMessagesPerSession: this.sessions.size > 0 ? totalMessages / this.sessions.size : 0
    };
  }

  /**
   * Run evictExpired periodically. The timer does not keep the process alive.
   * @returns function that stops the sweep
   */
  startSweeper(intervalMs: number): () => void {
    const timer = setInterval(() => this.evictExpired(), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private live(sessionId: string, now: number): SessionRecord | undefined {
    const record = this.sessions.get(sessionId);
    if (record && this.isExpiredAt(record, now)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return record;
  }

  private create(sessionId: string, now: number): SessionRecord {
    const record: SessionRecord = { id: sessionId, turns: [], createdAt: now, lastActivity: now };
    this.sessions.set(sessionId, record);
    return record;
  }

  private isExpiredAt(record: SessionRecord, now: number): boolean {
    return now - record.lastActivity > this.sessionTimeoutMs;
  }

  private view(record: SessionRecord): Session {
    return Object.freeze({
      id: record.id,
      turns: Object.freeze([...record.turns]),
      createdAt: record.createdAt,
      lastActivity: record.lastActivity
    });
  }
}
