import { StoreError, extractErrorMessage, type StoreFailureKind } from '@/lib/errors';

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  for (const key of ['status', 'statusCode']) {
    const value: unknown = Reflect.get(error, key);
    const status = typeof value === 'string' ? Number(value) : value;
    if (typeof status === 'number' && Number.isInteger(status)) {
      return status;
    }
  }
  return undefined;
}

/**
 * Sort a storage failure into a kind. Quota and capacity failures are kept
 * apart from connectivity so they can be told apart in the logs.
 */
export function classifyStoreError(error: unknown): StoreFailureKind {
  if (error instanceof StoreError) {
    return error.kind;
  }

  const status = readStatus(error);
  const message = extractErrorMessage(error).toLowerCase();

  // Rate limiting is transient, not a capacity problem
  if (status === 429 || /rate.?limit|too many requests|throttl/.test(message)) {
    return 'unavailable';
  }
  if (status === 404 || /not found|does not exist|no such/.test(message)) {
    return 'not_found';
  }
  if (
    status === 402 ||
    status === 413 ||
    status === 507 ||
    /quota|exceeded the maximum|size limit|storage limit|limit reached|no space|out of space|too large|insufficient storage/.test(
      message
    )
  ) {
    return 'quota';
  }
  if (
    status === 401 ||
    status === 403 ||
    /unauthori[sz]ed|forbidden|jwt|permission|row-level security|invalid (api )?key|signature/.test(message)
  ) {
    return 'auth';
  }
  if (/timed? ?out|timeout|aborted/.test(message)) {
    return 'timeout';
  }
  if (
    (status !== undefined && status >= 500) ||
    /fetch failed|network|econnrefused|econnreset|enotfound|socket|unavailable/.test(message)
  ) {
    return 'unavailable';
  }
  return 'unknown';
}

export function toStoreError(error: unknown, context: string): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  return new StoreError(classifyStoreError(error), `${context}: ${extractErrorMessage(error)}`, { cause: error });
}
