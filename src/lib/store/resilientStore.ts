import { randomUUID } from 'crypto';
import { extractErrorMessage } from '@/lib/errors';
import type { FeedbackEntry, SaveResult, Session, StorageStatus } from '@/types/database';
import { classifyStoreError } from './classify';
import type { LocalFallbackStore } from './localStore';
import type { RemoteStore } from './remoteStore';
import { boundSession } from './sessionCodec';

export interface ResilientStoreOptions {
  /** Serialized size above which history is truncated */
  maxSessionBytes: number;
  /** History entries kept when truncating */
  truncatedHistoryLength: number;
  now?: () => Date;
  newId?: () => string;
}

export interface CleanupResult {
  deleted: number;
  /** Names of the remote documents selected for deletion */
  candidates: string[];
  localDeleted: number;
}

function logRemoteFailure(action: string, error: unknown): void {
  const kind = classifyStoreError(error);
  const message = extractErrorMessage(error);

  if (kind === 'quota') {
    console.error(`[store] Remote ${action} failed: storage quota or size limit reached (${message})`);
  } else if (kind !== 'not_configured') {
    console.warn(`[store] Remote ${action} failed (${kind}): ${message}`);
  }
}

function timeOf(session: Session): number {
  const time = Date.parse(session.updatedAt);
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Session persistence that prefers the remote store and falls back to the
 * local one. Writes go to the local store first, so a remote outage only
 * costs durability, never a request.
 */
export class ResilientStore {
  private readonly remote: RemoteStore;
  private readonly local: LocalFallbackStore;
  private readonly maxSessionBytes: number;
  private readonly truncatedHistoryLength: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(remote: RemoteStore, local: LocalFallbackStore, options: ResilientStoreOptions) {
    this.remote = remote;
    this.local = local;
    this.maxSessionBytes = options.maxSessionBytes;
    this.truncatedHistoryLength = options.truncatedHistoryLength;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  createSession(): Session {
    return {
      sessionId: this.newId(),
      history: [],
      currentQuestion: null,
      score: 0,
      totalAnswered: 0,
      updatedAt: this.now().toISOString(),
    };
  }

  /**
   * Load a session, or start a new one when no store knows `sessionId`.
   */
  async load(sessionId?: string | null): Promise<Session> {
    if (!sessionId) {
      return this.createSession();
    }

    let remote: Session | null = null;
    try {
      remote = await this.remote.get(sessionId);
    } catch (error) {
      logRemoteFailure(`load of session ${sessionId}`, error);
    }

    const local = await this.local.get(sessionId);

    // A local copy is newer when the last remote write failed
    if (remote && local) {
      return timeOf(local) > timeOf(remote) ? local : remote;
    }
    return remote ?? local ?? this.createSession();
  }

  async save(session: Session): Promise<SaveResult> {
    const stamped: Session = { ...session, updatedAt: this.now().toISOString() };
    const bounded = boundSession(stamped, this.maxSessionBytes, this.truncatedHistoryLength);

    if (bounded.truncated) {
      console.warn(
        `[store] Session ${session.sessionId} exceeded ${this.maxSessionBytes} bytes, history truncated to ${bounded.session.history.length} entries`
      );
    }

    await this.local.put(bounded.session, bounded.json);

    try {
      await this.remote.put(bounded.session, bounded.json);
      return { persistedRemotely: true, truncated: bounded.truncated };
    } catch (error) {
      logRemoteFailure(`save of session ${session.sessionId}`, error);
      return { persistedRemotely: false, truncated: bounded.truncated };
    }
  }

  async delete(sessionId: string): Promise<void> {
    await this.local.delete(sessionId);
    try {
      await this.remote.delete(sessionId);
    } catch (error) {
      logRemoteFailure(`delete of session ${sessionId}`, error);
    }
  }

  /**
   * Remove sessions not updated within `olderThanMs`. With `dryRun` only the
   * candidates are reported.
   */
  async cleanup(olderThanMs: number, options: { dryRun?: boolean } = {}): Promise<CleanupResult> {
    const cutoff = this.now().getTime() - olderThanMs;
    const result: CleanupResult = { deleted: 0, candidates: [], localDeleted: 0 };

    try {
      const objects = await this.remote.listSessions();
      result.candidates = objects
        .filter((object) => {
          const updated = object.updatedAt ? Date.parse(object.updatedAt) : NaN;
          return !Number.isNaN(updated) && updated < cutoff;
        })
        .map((object) => object.name);

      if (!options.dryRun && result.candidates.length > 0) {
        result.deleted = await this.remote.deleteSessionObjects(result.candidates);
      }
    } catch (error) {
      logRemoteFailure('cleanup', error);
    }

    if (!options.dryRun) {
      result.localDeleted = this.local.deleteOlderThan(new Date(cutoff).toISOString());
    }

    return result;
  }

  /**
   * Store a feedback entry locally and, when possible, remotely.
   * Resolves to whether the remote write succeeded.
   */
  async recordFeedback(entry: FeedbackEntry): Promise<boolean> {
    try {
      this.local.putFeedback(entry);
    } catch (error) {
      console.error(`[store] Local feedback write failed: ${extractErrorMessage(error)}`);
    }

    try {
      await this.remote.putFeedback(entry);
      return true;
    } catch (error) {
      logRemoteFailure(`write of feedback ${entry.feedback_id}`, error);
      return false;
    }
  }

  async feedbackEntries(): Promise<FeedbackEntry[]> {
    try {
      return await this.remote.listFeedback();
    } catch (error) {
      logRemoteFailure('feedback listing', error);
      return this.local.listFeedback();
    }
  }

  async status(): Promise<StorageStatus> {
    const localSessions = this.local.countSessions();
    const localFeedback = this.local.countFeedback();
    const base = {
      remoteConfigured: this.remote.configured,
      localSessions,
      localFeedback,
    };

    try {
      const [sessions, feedback] = await Promise.all([this.remote.listSessions(), this.remote.countFeedback()]);
      return {
        ...base,
        sessions: sessions.filter((object) => object.name.endsWith('.json')).length,
        feedback,
        backend: 'remote',
        remoteAvailable: true,
      };
    } catch (error) {
      logRemoteFailure('status check', error);
      return {
        ...base,
        sessions: localSessions,
        feedback: localFeedback,
        backend: 'local',
        remoteAvailable: false,
      };
    }
  }
}
