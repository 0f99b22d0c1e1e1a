import { StoreError, extractErrorMessage, withTimeout } from '@/lib/errors';
import type { FeedbackEntry, Session } from '@/types/database';
import { toStoreError } from './classify';
import { parseFeedbackEntry } from './feedbackCodec';
import { parseSession, serializeSession } from './sessionCodec';
import type { BlobBucket, SessionStore, StoredObject } from './types';

const SESSIONS_PREFIX = 'sessions';
const FEEDBACK_PREFIX = 'feedback';

export function sessionPath(sessionId: string): string {
  return `${SESSIONS_PREFIX}/${sessionId}.json`;
}

export function feedbackPath(entry: FeedbackEntry): string {
  return `${FEEDBACK_PREFIX}/${entry.timestamp}_${entry.feedback_id}.json`;
}

/**
 * Session and feedback documents in a remote bucket. Every call is bounded
 * by `timeoutMs` and fails with a classified `StoreError`.
 */
export class RemoteStore implements SessionStore {
  readonly name = 'remote';
  private readonly bucket: BlobBucket | null;
  private readonly timeoutMs: number;

  constructor(bucket: BlobBucket | null, timeoutMs: number) {
    this.bucket = bucket;
    this.timeoutMs = timeoutMs;
  }

  get configured(): boolean {
    return this.bucket !== null;
  }

  private async call<T>(context: string, operation: (bucket: BlobBucket) => Promise<T>): Promise<T> {
    const bucket = this.bucket;
    if (!bucket) {
      throw new StoreError('not_configured', `${context}: remote store is not configured`);
    }

    try {
      return await withTimeout(
        operation(bucket),
        this.timeoutMs,
        () => new StoreError('timeout', `${context}: timed out after ${this.timeoutMs}ms`)
      );
    } catch (error) {
      throw toStoreError(error, context);
    }
  }

  /**
   * Resolves to null when the document is missing or corrupt.
   */
  async get(sessionId: string): Promise<Session | null> {
    const path = sessionPath(sessionId);
    const json = await this.call(`get ${path}`, (bucket) => bucket.download(path));
    if (json === null) {
      return null;
    }

    const session = parseSession(json);
    if (!session || session.sessionId !== sessionId) {
      console.warn(`[store] Ignoring corrupt remote session document ${path}`);
      return null;
    }
    return session;
  }

  async put(session: Session, json: string = serializeSession(session)): Promise<void> {
    const path = sessionPath(session.sessionId);
    await this.call(`put ${path}`, (bucket) => bucket.upload(path, json));
  }

  async delete(sessionId: string): Promise<void> {
    const path = sessionPath(sessionId);
    await this.call(`delete ${path}`, (bucket) => bucket.remove([path]));
  }

  listSessions(): Promise<StoredObject[]> {
    return this.call('list sessions', (bucket) => bucket.list(SESSIONS_PREFIX));
  }

  /** Removes session documents by their listed names */
  deleteSessionObjects(names: string[]): Promise<number> {
    const paths = names.map((name) => `${SESSIONS_PREFIX}/${name}`);
    return this.call(`delete ${paths.length} sessions`, (bucket) => bucket.remove(paths));
  }

  async putFeedback(entry: FeedbackEntry): Promise<void> {
    const path = feedbackPath(entry);
    await this.call(`put ${path}`, (bucket) => bucket.upload(path, JSON.stringify(entry)));
  }

  /**
   * Downloads every feedback document. Documents that cannot be downloaded
   * or decoded are skipped; only a failed listing rejects.
   */
  async listFeedback(): Promise<FeedbackEntry[]> {
    const objects = await this.call('list feedback', (bucket) => bucket.list(FEEDBACK_PREFIX));
    const entries: FeedbackEntry[] = [];

    for (const object of objects) {
      if (!object.name.endsWith('.json')) {
        continue;
      }
      const path = `${FEEDBACK_PREFIX}/${object.name}`;

      let json: string | null;
      try {
        json = await this.call(`get ${path}`, (bucket) => bucket.download(path));
      } catch (error) {
        console.warn(`[store] Skipping feedback document ${path}: ${extractErrorMessage(error)}`);
        continue;
      }
      if (json === null) {
        continue;
      }

      const entry = parseFeedbackEntry(json);
      if (entry) {
        entries.push(entry);
      } else {
        console.warn(`[store] Skipping malformed feedback document ${path}`);
      }
    }

    return entries;
  }

  async countFeedback(): Promise<number> {
    const objects = await this.call('list feedback', (bucket) => bucket.list(FEEDBACK_PREFIX));
    return objects.filter((object) => object.name.endsWith('.json')).length;
  }
}
