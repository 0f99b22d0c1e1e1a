import { NextRequest, NextResponse } from 'next/server';
import { QuizError } from '@/lib/errors';
import { isRecord } from '@/lib/questionCodec';

/**
 * Read request fields from a JSON body or form data. An empty or
 * unreadable body yields no fields.
 */
export async function readFields(request: NextRequest): Promise<Record<string, unknown>> {
  const contentType = request.headers.get('content-type') ?? '';

  try {
    if (contentType.includes('application/json')) {
      const body: unknown = await request.json();
      return isRecord(body) ? body : {};
    }

    if (contentType.includes('form')) {
      const form = await request.formData();
      const fields: Record<string, unknown> = {};
      form.forEach((value, key) => {
        if (typeof value === 'string') {
          fields[key] = value;
        }
      });
      return fields;
    }
  } catch {
    throw new QuizError('Request body could not be parsed');
  }

  return {};
}

/**
 * Client errors keep their message and status; anything else is logged and
 * reported as a 500.
 */
export function errorResponse(error: unknown, context: string): NextResponse {
  if (error instanceof QuizError) {
    return NextResponse.json({ error: error.message }, { status: error.status });
  }

  console.error(`[${context}] Unexpected error:`, error);
  return NextResponse.json({ error: 'Internal server error' }, { status: 500 });
}
