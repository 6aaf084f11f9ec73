import type { FastifyInstance, FastifyReply } from 'fastify';
import { changePasswordSchema, loginSchema, registerSchema } from '@sharebox/shared';
import { config } from '../config/index.js';
import { SESSION_COOKIE, currentUser, requireAuth } from '../middleware/auth.js';
import { parseInput } from '../middleware/validate.js';

function setSessionCookie(reply: FastifyReply, userId: string): void {
  reply.setCookie(SESSION_COOKIE, userId, {
    httpOnly: true,
    secure: config.nodeEnv === 'production',
    sameSite: 'lax',
    path: '/',
    signed: true,
  });
}

function clearSessionCookie(reply: FastifyReply): void {
  reply.clearCookie(SESSION_COOKIE, { path: '/' });
}

export async function authRoutes(app: FastifyInstance): Promise<void> {
  const authService = app.services.auth;

  // POST /register
  app.post('/register', async (request, reply) => {
    const { username, email, password } = parseInput(registerSchema, request.body);
    const user = await authService.createUser(username, email, password);
    setSessionCookie(reply, user.id);
    return reply.status(201).send({ data: user, meta: null, errors: null });
  });

  // POST /login
  app.post('/login', async (request, reply) => {
    const { identifier, password } = parseInput(loginSchema, request.body);
    const { user } = await authService.authenticate(identifier, password);
    setSessionCookie(reply, user.id);
    return reply.status(200).send({ data: user, meta: null, errors: null });
  });

  // POST /logout
  app.post('/logout', async (_request, reply) => {
    clearSessionCookie(reply);
    return reply.status(200).send({ data: null, meta: null, errors: null });
  });

  // GET /me
  app.get('/me', { preHandler: [requireAuth] }, async (request, reply) => {
    return reply.status(200).send({ data: currentUser(request), meta: null, errors: null });
  });

  // POST /change-password
  app.post('/change-password', { preHandler: [requireAuth] }, async (request, reply) => {
    const body = parseInput(changePasswordSchema, request.body);
    await authService.changePassword(
      currentUser(request).id,
      body.currentPassword,
      body.newPassword,
      body.confirmPassword,
    );
    return reply.status(200).send({ data: null, meta: null, errors: null });
  });
}
