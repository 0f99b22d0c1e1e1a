import { loadConfig, type AppConfig } from '@/lib/config';
import { Evaluator } from '@/lib/evaluator';
import { ContentGenerator } from '@/lib/generator';
import { createLLMClient } from '@/lib/llm/openAIClient';
import type { LLMClient } from '@/lib/llm/types';
import { QuizService } from '@/lib/quizService';
import { LocalFallbackStore } from '@/lib/store/localStore';
import { RemoteStore } from '@/lib/store/remoteStore';
import { ResilientStore } from '@/lib/store/resilientStore';
import { createSupabaseBucket } from '@/lib/store/supabaseBucket';
import type { BlobBucket } from '@/lib/store/types';

export interface Services {
  config: AppConfig;
  store: ResilientStore;
  quiz: QuizService;
}

export interface ServiceOverrides {
  llm?: LLMClient;
  /** null runs without a remote store */
  bucket?: BlobBucket | null;
  random?: () => number;
  now?: () => Date;
  newId?: () => string;
}

/**
 * Wire every component from one configuration object.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const llm = overrides.llm ?? createLLMClient(config.llm);
  const bucket = overrides.bucket !== undefined ? overrides.bucket : createSupabaseBucket(config.storage);

  const store = new ResilientStore(
    new RemoteStore(bucket, config.storage.timeoutMs),
    new LocalFallbackStore(config.storage.localDbPath),
    {
      maxSessionBytes: config.storage.maxSessionBytes,
      truncatedHistoryLength: config.storage.truncatedHistoryLength,
      now: overrides.now,
      newId: overrides.newId,
    }
  );

  const quiz = new QuizService(
    new ContentGenerator(llm, { random: overrides.random }),
    new Evaluator(llm),
    store,
    { now: overrides.now, newId: overrides.newId }
  );

  return { config, store, quiz };
}

let services: Services | null = null;

/**
 * Get or create the process-wide services.
 */
export function getServices(): Services {
  if (services) {
    return services;
  }

  services = createServices(loadConfig());
  return services;
}

/**
 * Replace the process-wide services, or drop them so the next call to
 * `getServices` builds fresh ones.
 */
export function setServices(next: Services | null): void {
  services = next;
}
