import { FastifyRequest } from 'fastify';
import { ValidationError } from '@/contracts';
import { checkoutBodySchema, idempotencyTokenSchema } from '@/api/validators/checkout';

const TOKEN_HEADERS = ['idempotency-key', 'x-idempotency-key'] as const;

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Reads the checkout idempotency token from the Idempotency-Key (or
 * X-Idempotency-Key) header or the body's idempotencyToken. Undefined when
 * the client sent none.
 */
export function resolveIdempotencyToken(request: FastifyRequest): string | undefined {
  const body = checkoutBodySchema.safeParse(request.body ?? {});
  if (!body.success) {
    throw new ValidationError('Invalid idempotencyToken', body.error.errors);
  }

  let fromHeader: string | undefined;
  for (const name of TOKEN_HEADERS) {
    const raw = headerValue(request, name);
    if (raw === undefined) continue;
    const parsed = idempotencyTokenSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${name} header`, parsed.error.errors);
    }
    fromHeader = parsed.data;
    break;
  }

  const fromBody = body.data.idempotencyToken;
  if (fromHeader !== undefined && fromBody !== undefined && fromHeader !== fromBody) {
    throw new ValidationError('Idempotency token in header and body disagree');
  }
  return fromHeader ?? fromBody;
}
