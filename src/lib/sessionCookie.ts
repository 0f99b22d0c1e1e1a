import { createHmac, timingSafeEqual } from 'crypto';
import type { NextRequest, NextResponse } from 'next/server';
import type { SessionConfig } from '@/lib/config';

function sign(sessionId: string, secret: string): string {
  return createHmac('sha256', secret).update(sessionId).digest('base64url');
}

export function encodeSessionCookie(sessionId: string, secret: string): string {
  return `${sessionId}.${sign(sessionId, secret)}`;
}

/**
 * Returns the session id from a signed cookie value, or null when the value
 * is missing or its signature does not match.
 */
export function decodeSessionCookie(value: string | undefined, secret: string): string | null {
  if (!value) {
    return null;
  }

  const dot = value.lastIndexOf('.');
  if (dot <= 0) {
    return null;
  }

  const sessionId = value.slice(0, dot);
  const given = Buffer.from(value.slice(dot + 1));
  const expected = Buffer.from(sign(sessionId, secret));
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    return null;
  }
  return sessionId;
}

export function readSessionId(request: NextRequest, config: SessionConfig): string | null {
  return decodeSessionCookie(request.cookies.get(config.cookieName)?.value, config.secret);
}

export function attachSessionCookie(response: NextResponse, sessionId: string, config: SessionConfig): NextResponse {
  response.cookies.set(config.cookieName, encodeSessionCookie(sessionId, config.secret), {
    httpOnly: true,
    sameSite: 'lax',
    secure: process.env.NODE_ENV === 'production',
    path: '/',
    maxAge: config.retentionDays * 24 * 60 * 60,
  });
  return response;
}
