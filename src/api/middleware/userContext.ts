import { FastifyRequest, FastifyReply } from 'fastify';
import { env } from '@/config/env';

const USER_ID_RE = /^[A-Za-z0-9._:-]{1,128}$/;

// No sessions: X-User-Id selects the user, otherwise the configured default.
export async function userContextMiddleware(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
  const header = request.headers['x-user-id'];
  const raw = Array.isArray(header) ? header[0] : header;

  if (raw !== undefined && !USER_ID_RE.test(raw)) {
    return reply.status(400).send({ error: 'ValidationError', message: 'Invalid X-User-Id header' });
  }
  request.userId = raw ?? env.DEFAULT_USER_ID;
}
