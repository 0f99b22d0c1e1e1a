export type LLMErrorKind = 'transient' | 'auth' | 'invalid_request' | 'not_configured' | 'unknown';

export type StoreFailureKind =
  | 'not_found'
  | 'quota'
  | 'auth'
  | 'timeout'
  | 'unavailable'
  | 'not_configured'
  | 'unknown';

/**
 * Extracts a printable message from anything thrown.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'An unknown error occurred';
}

/** Failure of a call to the language model provider */
export class LLMError extends Error {
  readonly kind: LLMErrorKind;

  constructor(kind: LLMErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMError';
    this.kind = kind;
  }

  /** Whether repeating the same call could succeed */
  get retryable(): boolean {
    return this.kind === 'transient' || this.kind === 'unknown';
  }
}

/** Failure of a call to the remote session store */
export class StoreError extends Error {
  readonly kind: StoreFailureKind;

  constructor(kind: StoreFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.kind = kind;
  }
}

/** A request the client got wrong; reported as a 4xx response */
export class QuizError extends Error {
  readonly status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'QuizError';
    this.status = status;
  }
}

/**
 * Rejects with `onTimeout()` if `promise` has not settled within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
