import { FastifyReply, FastifyRequest } from 'fastify';
import {
  EmptyCartError,
  NotFoundError,
  OrderFailedError,
  TransientStoreError,
  ValidationError,
} from '@/contracts';

export function sendError(request: FastifyRequest, reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ValidationError) {
    return reply.status(400).send({ error: 'ValidationError', message: err.message, details: err.details });
  }
  if (err instanceof EmptyCartError) {
    return reply.status(400).send({ error: 'EmptyCart', message: err.message });
  }
  if (err instanceof NotFoundError) {
    return reply.status(404).send({ error: 'NotFound', message: err.message });
  }
  if (err instanceof OrderFailedError) {
    return reply.status(409).send({ error: 'OrderFailed', message: err.message, orderId: err.orderId });
  }
  if (err instanceof TransientStoreError) {
    request.log.warn({ operation: err.operation, error: err.message }, 'Transient store failure');
    return reply.status(503).send({
      error: 'TransientStoreError',
      message: 'A backing store is temporarily unavailable; retry with the same idempotency token',
    });
  }

  request.log.error({ error: String(err) }, 'Unexpected error');
  return reply.status(500).send({ error: 'InternalError', message: 'An unexpected error occurred' });
}
