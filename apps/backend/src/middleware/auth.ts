import type { FastifyReply, FastifyRequest } from 'fastify';
import type { UserProfile } from '@sharebox/shared';
import { isAppError, unauthorized } from '../utils/errors.js';

declare module 'fastify' {
  interface FastifyRequest {
    user: UserProfile | null;
  }
}

export const SESSION_COOKIE = 'sharebox_session';

async function resolveSessionUser(request: FastifyRequest): Promise<UserProfile | null> {
  // @fastify/cookie populates request.cookies; signed cookies are under unsignCookie
  const rawCookie = request.cookies[SESSION_COOKIE];
  if (!rawCookie) {
    return null;
  }

  const unsigned = request.unsignCookie(rawCookie);
  if (!unsigned.valid || !unsigned.value) {
    return null;
  }

  return request.server.services.auth.validateSession(unsigned.value);
}

export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const user = await resolveSessionUser(request);
  if (!user) {
    throw unauthorized('Authentication required');
  }
  request.user = user;
}

/**
 * For token-keyed routes: anonymous callers pass through with
 * `request.user = null`, and so do callers whose session is stale.
 */
export async function optionalAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  try {
    request.user = await resolveSessionUser(request);
  } catch (err) {
    if (!isAppError(err, 'UNAUTHORIZED')) {
      throw err;
    }
    request.user = null;
  }
}

/** The authenticated caller; only valid behind `requireAuth`. */
export function currentUser(request: FastifyRequest): UserProfile {
  if (!request.user) {
    throw unauthorized('Authentication required');
  }
  return request.user;
}
