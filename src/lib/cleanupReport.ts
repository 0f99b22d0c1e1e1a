import { IN_MEMORY_DB } from '@/lib/config';
import type { CleanupResult } from '@/lib/store/resilientStore';

/**
 * Lines printed before a cleanup run, describing which stores it can reach.
 * A script run against an in-memory local store opens its own empty
 * database, so only remote sessions are affected.
 */
export function cleanupScopeNotes(localDbPath: string, remoteAvailable: boolean): string[] {
  const notes: string[] = [];
  const localInMemory = localDbPath === IN_MEMORY_DB;

  if (localInMemory) {
    notes.push(
      'The local store is a fresh in-memory database and holds no sessions from the running server. ' +
        'Set LOCAL_DB_PATH to a file to clean local sessions.'
    );
  }
  if (!remoteAvailable) {
    notes.push(
      localInMemory
        ? 'Remote storage is not available, so there is nothing to clean.'
        : 'Remote storage is not available, only the local store will be cleaned.'
    );
  }
  return notes;
}

export function cleanupSummary(result: CleanupResult, localDbPath: string): string {
  if (localDbPath === IN_MEMORY_DB) {
    return `Deleted ${result.deleted} remote session(s).`;
  }
  return `Deleted ${result.deleted} remote and ${result.localDeleted} local session(s).`;
}
