import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { userContextMiddleware } from '@/api/middleware/userContext';
import { resolveIdempotencyToken } from '@/api/middleware/idempotency';
import { sendError } from '@/api/errors';
import { serializeCheckoutResult } from '@/api/serializers';
import { checkout } from '@/orchestrator/checkoutService';

export async function checkoutRoutes(fastify: FastifyInstance): Promise<void> {
  // POST /checkout: convert the cart into an order.
  // Retrying with the same idempotency token returns the first result and never creates a second order.
  fastify.post('/checkout', {
    preHandler: userContextMiddleware,
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const idempotencyToken = resolveIdempotencyToken(request);
      const result = await checkout(fastify.stores, request.userId, idempotencyToken);
      request.log.info({ orderId: result.orderId, userId: request.userId, replayable: idempotencyToken !== undefined }, 'Checkout succeeded');
      return reply.send(serializeCheckoutResult(result));
    } catch (err) {
      return sendError(request, reply, err);
    }
  });
}
