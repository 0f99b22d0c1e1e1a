import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { StorageConfig } from '@/lib/config';
import { toStoreError } from './classify';
import type { BlobBucket, StoredObject } from './types';

const PAGE_SIZE = 1000;

/**
 * Supabase Storage bucket holding session and feedback documents.
 */
export class SupabaseBucket implements BlobBucket {
  private readonly client: SupabaseClient;
  private readonly bucket: string;

  constructor(url: string, key: string, bucket: string) {
    this.client = createClient(url, key, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
    this.bucket = bucket;
  }

  private get storage() {
    return this.client.storage.from(this.bucket);
  }

  async upload(path: string, body: string): Promise<void> {
    const { error } = await this.storage.upload(path, body, {
      contentType: 'application/json',
      upsert: true,
    });
    if (error) {
      throw toStoreError(error, `upload ${path}`);
    }
  }

  async download(path: string): Promise<string | null> {
    const { data, error } = await this.storage.download(path);
    if (error) {
      const failure = toStoreError(error, `download ${path}`);
      if (failure.kind === 'not_found') {
        return null;
      }
      throw failure;
    }
    return data ? await data.text() : null;
  }

  async remove(paths: string[]): Promise<number> {
    if (paths.length === 0) {
      return 0;
    }
    const { data, error } = await this.storage.remove(paths);
    if (error) {
      throw toStoreError(error, `remove ${paths.length} objects`);
    }
    return data?.length ?? 0;
  }

  async list(prefix: string): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.storage.list(prefix, {
        limit: PAGE_SIZE,
        offset,
        sortBy: { column: 'name', order: 'asc' },
      });
      if (error) {
        throw toStoreError(error, `list ${prefix}`);
      }

      const page = data ?? [];
      for (const file of page) {
        // Folder placeholders have no id
        if (file.id) {
          objects.push({ name: file.name, updatedAt: file.updated_at ?? file.created_at ?? null });
        }
      }

      if (page.length < PAGE_SIZE) {
        return objects;
      }
    }
  }
}

export function createSupabaseBucket(config: StorageConfig): SupabaseBucket | null {
  if (!config.supabaseUrl || !config.supabaseKey) {
    console.warn('[store] Supabase credentials not set, sessions will be kept in process only');
    return null;
  }
  return new SupabaseBucket(config.supabaseUrl, config.supabaseKey, config.bucket);
}
