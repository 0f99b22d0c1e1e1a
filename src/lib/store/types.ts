import type { Session } from '@/types/database';

/**
 * Per-session persistence capability shared by the remote and local legs.
 */
export interface SessionStore {
  readonly name: string;
  /** Resolves to null when the store has no usable record */
  get(sessionId: string): Promise<Session | null>;
  put(session: Session): Promise<void>;
  delete(sessionId: string): Promise<void>;
}

export interface StoredObject {
  /** Path relative to the listed prefix */
  name: string;
  updatedAt: string | null;
}

/**
 * Minimal JSON blob bucket. Implementations reject with a `StoreError`.
 */
export interface BlobBucket {
  /** Creates or replaces the object */
  upload(path: string, body: string): Promise<void>;
  /** Resolves to null when the object does not exist */
  download(path: string): Promise<string | null>;
  /** Resolves to the number of objects removed */
  remove(paths: string[]): Promise<number>;
  list(prefix: string): Promise<StoredObject[]>;
}
