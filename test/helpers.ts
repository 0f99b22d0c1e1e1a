import type { AppConfig } from '@/lib/config';
import type { LLMChatRequest, LLMClient, LLMResponse } from '@/lib/llm/types';
import type { BlobBucket, StoredObject } from '@/lib/store/types';
import type { Question } from '@/types/questions';

type Reply = string | null | Error;

/**
 * Replays queued replies in order, then `defaultReply` for every later call.
 */
export class FakeLLMClient implements LLMClient {
  readonly name = 'fake';
  readonly requests: LLMChatRequest[] = [];
  private readonly replies: Reply[];
  private readonly defaultReply: Reply;

  constructor(replies: Reply[] = [], defaultReply: Reply = null) {
    this.replies = [...replies];
    this.defaultReply = defaultReply;
  }

  async generate(request: LLMChatRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const reply = this.replies.length > 0 ? this.replies.shift() : this.defaultReply;
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply ?? null, finishReason: 'stop' };
  }
}

type BucketOperation = 'upload' | 'download' | 'remove' | 'list';

/**
 * In-memory bucket. Set `failures[operation]` to make that operation reject,
 * or `failingDownloads` to make downloads of single paths reject.
 */
export class FakeBucket implements BlobBucket {
  readonly objects = new Map<string, { body: string; updatedAt: string }>();
  readonly failures: Partial<Record<BucketOperation, Error>> = {};
  readonly failingDownloads = new Map<string, Error>();
  now: () => Date = () => new Date('2026-03-01T12:00:00.000Z');

  failAll(error: Error): void {
    for (const operation of ['upload', 'download', 'remove', 'list'] as const) {
      this.failures[operation] = error;
    }
  }

  private check(operation: BucketOperation): void {
    const failure = this.failures[operation];
    if (failure) {
      throw failure;
    }
  }

  async upload(path: string, body: string): Promise<void> {
    this.check('upload');
    this.objects.set(path, { body, updatedAt: this.now().toISOString() });
  }

  async download(path: string): Promise<string | null> {
    this.check('download');
    const failure = this.failingDownloads.get(path);
    if (failure) {
      throw failure;
    }
    return this.objects.get(path)?.body ?? null;
  }

  async remove(paths: string[]): Promise<number> {
    this.check('remove');
    let removed = 0;
    for (const path of paths) {
      if (this.objects.delete(path)) {
        removed++;
      }
    }
    return removed;
  }

  async list(prefix: string): Promise<StoredObject[]> {
    this.check('list');
    const objects: StoredObject[] = [];
    for (const [path, object] of this.objects) {
      if (path.startsWith(`${prefix}/`)) {
        objects.push({ name: path.slice(prefix.length + 1), updatedAt: object.updatedAt });
      }
    }
    return objects;
  }
}

export const SAMPLE_REPLY = {
  question: 'Which neurotransmitter do motor neurons release at the neuromuscular junction?',
  choices: ['Option A: Dopamine', 'Option B: Acetylcholine', 'Option C: Serotonin', 'Option D: Glycine'],
  correct_answer: 'B',
  explanation: 'Motor neurons release acetylcholine onto nicotinic receptors of skeletal muscle.',
  category: 'Neural communication (electrical and chemical)',
};

export function questionReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...SAMPLE_REPLY, ...overrides });
}

export function makeQuestion(overrides: Partial<Question> = {}): Question {
  return {
    text: 'Which lobe contains the primary visual cortex?',
    choices: ['Option A: Frontal lobe', 'Option B: Occipital lobe', 'Option C: Temporal lobe', 'Option D: Parietal lobe'],
    correctChoice: 'B',
    explanation: 'The primary visual cortex lies along the calcarine sulcus of the occipital lobe.',
    category: 'Sensory system',
    ...overrides,
  };
}

export function testConfig(overrides: Partial<AppConfig['storage']> = {}): AppConfig {
  return {
    llm: {
      azureEndpoint: null,
      azureApiKey: null,
      azureApiVersion: '2024-02-15-preview',
      openAIApiKey: null,
      openAIBaseURL: null,
      model: 'test-model',
      timeoutMs: 1000,
    },
    storage: {
      supabaseUrl: null,
      supabaseKey: null,
      bucket: 'test-bucket',
      timeoutMs: 1000,
      localDbPath: ':memory:',
      maxSessionBytes: 50 * 1024,
      truncatedHistoryLength: 10,
      ...overrides,
    },
    session: {
      secret: 'test-secret',
      cookieName: 'quiz_session',
      retentionDays: 30,
    },
  };
}
